import type { ConnectionPool } from '@/application/interfaces/ConnectionPool';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { normalizeSymbol } from '@/domain/models/InstrumentSymbol';
import { KeyedSerialQueue } from '@/infra/concurrency/KeyedSerialQueue';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

const EMPTY: ReadonlySet<string> = new Set<string>();

export interface SubscriptionStats {
  /** 1 つ以上の銘柄を購読している購読者数 */
  subscribers: number;
  /** 1 人以上の購読者がいる銘柄数 */
  symbols: number;
  /** 購読関係（subscriberId × symbol）の総数 */
  subscriptions: number;
}

export interface SubscriptionRegistryOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * キーごとの集合。変更は元の Set に対して行い、読み取りには変更がない限り同じスナップショットを返す。
 */
class SnapshotIndex {
  private readonly members = new Map<string, Set<string>>();
  private readonly snapshots = new Map<string, ReadonlySet<string>>();

  get(key: string): ReadonlySet<string> {
    const cached = this.snapshots.get(key);
    if (cached) {
      return cached;
    }
    const members = this.members.get(key);
    if (!members) {
      return EMPTY;
    }
    const snapshot: ReadonlySet<string> = new Set(members);
    this.snapshots.set(key, snapshot);
    return snapshot;
  }

  has(key: string, value: string): boolean {
    return this.members.get(key)?.has(value) ?? false;
  }

  sizeOf(key: string): number {
    return this.members.get(key)?.size ?? 0;
  }

  add(key: string, value: string): void {
    let members = this.members.get(key);
    if (!members) {
      members = new Set();
      this.members.set(key, members);
    }
    members.add(value);
    this.snapshots.delete(key);
  }

  /**
   * @returns 値が存在して削除した場合 true
   */
  remove(key: string, value: string): boolean {
    const members = this.members.get(key);
    if (!members?.delete(value)) {
      return false;
    }
    if (members.size === 0) {
      this.members.delete(key);
    }
    this.snapshots.delete(key);
    return true;
  }

  get size(): number {
    return this.members.size;
  }
}

/**
 * アプリケーション層: 購読者と銘柄の二重インデックス
 *
 * 銘柄側のインデックスが空 → 非空になったときに pool.acquire、非空 → 空で pool.release を呼ぶ。
 * 変更は購読者キー → 銘柄キーの順に直列化する（逆順に取る箇所はない）。
 * 同じ購読者の subscribe が他の購読者の acquire 待ちでも、unsubscribeAll はその完了を待ってから解除する。
 * subscribersOf / symbolsOf が返す Set はその時点のスナップショットで、後の変更の影響を受けない。
 */
export class SubscriptionRegistry {
  private readonly bySymbol = new SnapshotIndex();
  private readonly bySubscriber = new SnapshotIndex();
  private readonly subscriberQueue = new KeyedSerialQueue();
  private readonly symbolQueue = new KeyedSerialQueue();
  private readonly logger: Logger;
  private subscriptionCount = 0;

  constructor(
    private readonly pool: ConnectionPool,
    private readonly options: SubscriptionRegistryOptions = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'SubscriptionRegistry' });
  }

  /**
   * 購読を追加する。すでに購読済みなら何もしない。
   * 上流の確保に失敗した場合は追加を取り消してエラーを投げる。
   * @throws {UnsupportedSymbolError}
   * @throws {ConnectFailureError}
   */
  async subscribe(subscriberId: string, rawSymbol: string): Promise<void> {
    const symbol = normalizeSymbol(rawSymbol);

    await this.subscriberQueue.run(subscriberId, () =>
      this.symbolQueue.run(symbol, async () => {
        if (this.bySubscriber.has(subscriberId, symbol)) {
          return;
        }

        const firstSubscriber = this.bySymbol.sizeOf(symbol) === 0;
        this.link(subscriberId, symbol);

        if (!firstSubscriber) {
          return;
        }
        try {
          await this.pool.acquire(symbol);
        } catch (error) {
          this.unlink(subscriberId, symbol);
          this.logger.warn('Subscribe rolled back', { subscriberId, symbol, err: error });
          throw error;
        }
      })
    );

    this.logger.debug('Subscribed', { subscriberId, symbol });
  }

  /**
   * 購読を解除する。銘柄の購読者がいなくなった場合のみ pool.release を呼ぶ。
   */
  async unsubscribe(subscriberId: string, rawSymbol: string): Promise<void> {
    const symbol = normalizeSymbol(rawSymbol);
    await this.subscriberQueue.run(subscriberId, () => this.remove(subscriberId, symbol));
  }

  /**
   * 購読者のすべての購読を解除する（接続切断時）。
   * 先に受け付けた同じ購読者の変更がすべて終わってから対象を決める。
   */
  async unsubscribeAll(subscriberId: string): Promise<void> {
    await this.subscriberQueue.run(subscriberId, async () => {
      const symbols = [...this.bySubscriber.get(subscriberId)];
      await Promise.all(symbols.map((symbol) => this.remove(subscriberId, symbol)));
    });
  }

  subscribersOf(symbol: string): ReadonlySet<string> {
    return this.bySymbol.get(normalizeSymbol(symbol));
  }

  symbolsOf(subscriberId: string): ReadonlySet<string> {
    return this.bySubscriber.get(subscriberId);
  }

  subscriberCount(symbol: string): number {
    return this.bySymbol.sizeOf(normalizeSymbol(symbol));
  }

  stats(): SubscriptionStats {
    return {
      subscribers: this.bySubscriber.size,
      symbols: this.bySymbol.size,
      subscriptions: this.subscriptionCount,
    };
  }

  /**
   * 購読者キーの区間の中から呼ぶ。
   */
  private remove(subscriberId: string, symbol: string): Promise<void> {
    return this.symbolQueue.run(symbol, async () => {
      if (!this.unlink(subscriberId, symbol)) {
        return;
      }
      this.logger.debug('Unsubscribed', { subscriberId, symbol });
      if (this.bySymbol.sizeOf(symbol) === 0) {
        await this.pool.release(symbol);
      }
    });
  }

  private link(subscriberId: string, symbol: string): void {
    this.bySymbol.add(symbol, subscriberId);
    this.bySubscriber.add(subscriberId, symbol);
    this.subscriptionCount++;
    this.options.metricsCollector?.setSubscriptions(this.subscriptionCount);
  }

  /**
   * @returns 関係が存在して削除した場合 true
   */
  private unlink(subscriberId: string, symbol: string): boolean {
    if (!this.bySubscriber.remove(subscriberId, symbol)) {
      return false;
    }
    this.bySymbol.remove(symbol, subscriberId);
    this.subscriptionCount--;
    this.options.metricsCollector?.setSubscriptions(this.subscriptionCount);
    return true;
  }
}
