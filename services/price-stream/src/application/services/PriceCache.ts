import type { Logger } from '@/application/interfaces/Logger';
import { PriceTimeoutError, PriceWaitAbortedError } from '@/domain/errors/PriceStreamError';
import { normalizeSymbol } from '@/domain/models/InstrumentSymbol';
import type { PriceTick } from '@/domain/models/PriceTick';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

interface Waiter {
  resolve(tick: PriceTick): void;
}

/**
 * アプリケーション層: 銘柄ごとの最新価格キャッシュ
 *
 * - get(): 最新ティックを O(1) で返す
 * - onTick(): 無条件に上書き（後勝ち）し、その銘柄の待機者をすべて解決する
 * - awaitNext(): 初回値を待つ。待機者を登録してからキャッシュを再確認するので、
 *   キャッシュミスと登録の間に届いたティックを取りこぼさない
 */
export class PriceCache {
  private readonly prices = new Map<string, PriceTick>();
  private readonly waiters = new Map<string, Set<Waiter>>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'PriceCache' });
  }

  get(symbol: string): PriceTick | undefined {
    return this.prices.get(normalizeSymbol(symbol));
  }

  onTick(tick: PriceTick): void {
    const symbol = normalizeSymbol(tick.symbol);
    this.prices.set(symbol, tick);

    const pending = this.waiters.get(symbol);
    if (!pending) {
      return;
    }
    this.waiters.delete(symbol);
    this.logger.debug('Resolving waiters', { symbol, count: pending.size });
    for (const waiter of pending) {
      waiter.resolve(tick);
    }
  }

  /**
   * 次のティックを待つ（キャッシュ済みなら即座に返す）。
   * @param symbol 銘柄コード
   * @param timeoutMs 待機上限（ミリ秒）
   * @param signal 呼び出し側のキャンセル
   * @throws {PriceTimeoutError} timeoutMs 以内にティックが届かなかった場合
   * @throws {PriceWaitAbortedError} signal が中断された場合
   */
  awaitNext(symbol: string, timeoutMs: number, signal?: AbortSignal): Promise<PriceTick> {
    const key = normalizeSymbol(symbol);
    if (signal?.aborted) {
      return Promise.reject(new PriceWaitAbortedError(key));
    }

    return new Promise<PriceTick>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
        const set = this.waiters.get(key);
        if (set) {
          set.delete(waiter);
          if (set.size === 0) {
            this.waiters.delete(key);
          }
        }
      };

      const waiter: Waiter = {
        resolve: (tick) => {
          cleanup();
          resolve(tick);
        },
      };

      const onAbort = () => {
        cleanup();
        reject(new PriceWaitAbortedError(key));
      };

      // 1. 先に待機者を登録する
      let set = this.waiters.get(key);
      if (!set) {
        set = new Set();
        this.waiters.set(key, set);
      }
      set.add(waiter);

      // 2. 登録後にキャッシュを再確認する
      const cached = this.prices.get(key);
      if (cached) {
        waiter.resolve(cached);
        return;
      }

      timer = setTimeout(() => {
        cleanup();
        this.logger.warn('Timed out waiting for price', { symbol: key, timeoutMs });
        reject(new PriceTimeoutError(key, timeoutMs));
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * 待機中の waiter 数（銘柄指定なしなら全銘柄の合計）。
   */
  pendingWaiters(symbol?: string): number {
    if (symbol !== undefined) {
      return this.waiters.get(normalizeSymbol(symbol))?.size ?? 0;
    }
    let total = 0;
    for (const set of this.waiters.values()) {
      total += set.size;
    }
    return total;
  }

  size(): number {
    return this.prices.size;
  }

  clear(): void {
    this.prices.clear();
  }
}
