import type { ConnectionPool } from '@/application/interfaces/ConnectionPool';
import type { FeedAdapterResolver } from '@/application/interfaces/FeedAdapter';
import type { FeedConnector, FeedConnectorFactory } from '@/application/interfaces/FeedConnector';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TickPublisher } from '@/application/interfaces/TickPublisher';
import { ConnectFailureError, PriceStreamError } from '@/domain/errors/PriceStreamError';
import type { ConnectorState } from '@/domain/models/ConnectorState';
import { normalizeSymbol } from '@/domain/models/InstrumentSymbol';
import type { PriceTick } from '@/domain/models/PriceTick';
import { KeyedSerialQueue } from '@/infra/concurrency/KeyedSerialQueue';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface FeedConnectionPoolOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  /** 現在時刻（エポックミリ秒）。テストで差し替える */
  clock?: () => number;
}

interface PoolEntry {
  state: ConnectorState;
  readonly connector: FeedConnector;
}

/**
 * アプリケーション層: 銘柄ごとの上流接続プール
 *
 * 1 銘柄につき上流接続は最大 1 本。参照カウントが 0 → 1 で接続し、1 → 0 で切断する。
 * 同じ銘柄の acquire / release は KeyedSerialQueue で直列化するため、
 * 0 → 1 と 1 → 0 を観測する呼び出しはそれぞれ必ず 1 つだけになる。
 */
export class FeedConnectionPool implements ConnectionPool {
  private readonly entries = new Map<string, PoolEntry>();
  private readonly queue = new KeyedSerialQueue();
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    private readonly adapters: FeedAdapterResolver,
    private readonly createConnector: FeedConnectorFactory,
    private readonly tickPublisher: TickPublisher,
    private readonly options: FeedConnectionPoolOptions = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'FeedConnectionPool' });
    this.clock = options.clock ?? Date.now;
  }

  async acquire(rawSymbol: string): Promise<void> {
    const symbol = normalizeSymbol(rawSymbol);

    await this.queue.run(symbol, async () => {
      const existing = this.entries.get(symbol);
      if (existing) {
        // サーバーの正常クローズや再試行の打ち切りで止まったコネクタは、ここで接続し直す
        if (existing.connector.status === 'disconnected') {
          await this.restart(symbol, existing);
        }
        existing.state = { ...existing.state, refCount: existing.state.refCount + 1 };
        this.logger.debug('Connector reused', { symbol, refCount: existing.state.refCount });
        return;
      }

      // マッピングがなければここで UnsupportedSymbolError。何も生成しない
      const adapter = this.adapters.resolve(symbol);
      const connector = this.createConnector(symbol, adapter, (tick) => this.handleTick(tick));
      const entry: PoolEntry = {
        connector,
        state: { symbol, refCount: 1, status: 'connecting', lastActivity: this.clock() },
      };
      this.entries.set(symbol, entry);
      this.reportActiveConnectors();

      try {
        await connector.connect();
        connector.sendSubscribe(symbol);
      } catch (error) {
        this.entries.delete(symbol);
        this.reportActiveConnectors();
        await this.disposeConnector(connector);
        this.logger.error('Failed to start connector', { symbol, err: error });
        throw error instanceof PriceStreamError ? error : new ConnectFailureError(symbol, error);
      }

      entry.state = { ...entry.state, status: 'connected', lastActivity: this.clock() };
      this.logger.info('Connector started', { symbol, adapter: adapter.name });
    });
  }

  async release(rawSymbol: string): Promise<void> {
    let symbol: string;
    try {
      symbol = normalizeSymbol(rawSymbol);
    } catch (error) {
      this.logger.error('Release called with invalid symbol', { symbol: rawSymbol, err: error });
      return;
    }

    await this.queue.run(symbol, async () => {
      const entry = this.entries.get(symbol);
      if (!entry || entry.state.refCount <= 0) {
        this.logger.error('Release without matching acquire', { symbol });
        return;
      }

      if (entry.state.refCount > 1) {
        entry.state = { ...entry.state, refCount: entry.state.refCount - 1 };
        this.logger.debug('Connector released', { symbol, refCount: entry.state.refCount });
        return;
      }

      this.entries.delete(symbol);
      this.reportActiveConnectors();
      entry.connector.sendUnsubscribe(symbol);
      await this.disposeConnector(entry.connector);
      this.logger.info('Connector stopped', { symbol });
    });
  }

  refCount(symbol: string): number {
    return this.entries.get(normalizeSymbol(symbol))?.state.refCount ?? 0;
  }

  /**
   * 銘柄の状態のスナップショット。status はコネクタの現在値を反映する。
   */
  stateOf(symbol: string): ConnectorState | undefined {
    const entry = this.entries.get(normalizeSymbol(symbol));
    if (!entry) {
      return undefined;
    }
    return Object.freeze({ ...entry.state, status: entry.connector.status });
  }

  activeSymbols(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * 参照カウントに関係なくすべてのコネクタを切断する（シャットダウン用）。
   */
  async close(): Promise<void> {
    const symbols = this.activeSymbols();
    await Promise.all(
      symbols.map((symbol) =>
        this.queue.run(symbol, async () => {
          const entry = this.entries.get(symbol);
          if (!entry) {
            return;
          }
          this.entries.delete(symbol);
          await this.disposeConnector(entry.connector);
        })
      )
    );
    this.reportActiveConnectors();
    this.logger.info('Connection pool closed', { symbols });
  }

  /**
   * 止まったコネクタを接続し直して購読を再送する。失敗しても既存の参照カウントは変えない。
   * @throws {ConnectFailureError}
   */
  private async restart(symbol: string, entry: PoolEntry): Promise<void> {
    this.logger.warn('Connector is down, restarting', { symbol, refCount: entry.state.refCount });
    try {
      await entry.connector.connect();
      entry.connector.sendSubscribe(symbol);
    } catch (error) {
      this.logger.error('Failed to restart connector', { symbol, err: error });
      throw error instanceof PriceStreamError ? error : new ConnectFailureError(symbol, error);
    }
    entry.state = { ...entry.state, status: 'connected', lastActivity: this.clock() };
    this.logger.info('Connector restarted', { symbol });
  }

  private handleTick(tick: PriceTick): void {
    const entry = this.entries.get(tick.symbol);
    if (entry) {
      entry.state = { ...entry.state, lastActivity: this.clock() };
    }
    this.tickPublisher.publish(tick);
  }

  private async disposeConnector(connector: FeedConnector): Promise<void> {
    try {
      await connector.disconnect();
    } catch (error) {
      this.logger.warn('Connector disconnect failed', { symbol: connector.symbol, err: error });
    }
  }

  private reportActiveConnectors(): void {
    this.options.metricsCollector?.setActiveConnectors(this.entries.size);
  }
}
