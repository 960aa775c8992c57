import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { SubscriberSink } from '@/application/interfaces/SubscriberSink';
import type { TickPublisher, Unsubscribe } from '@/application/interfaces/TickPublisher';
import type { PriceTick } from '@/domain/models/PriceTick';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * 配信対象の購読者を引くための読み取り専用ビュー（SubscriptionRegistry が満たす）。
 */
export interface SubscriberLookup {
  subscribersOf(symbol: string): ReadonlySet<string>;
}

export interface BroadcastDispatcherOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * 配信メッセージの形式。PriceHub のクライアントはこの JSON を受け取る。
 */
export function serializePriceMessage(tick: PriceTick): string {
  return JSON.stringify({ type: 'price', data: tick });
}

/**
 * アプリケーション層: ティックを購読者ごとの配信先にファンアウトする
 *
 * - 購読者がいない銘柄のティックでは何もしない
 * - シリアライズは 1 ティックにつき 1 回
 * - 配信先ごとに失敗を隔離する。同期例外も非同期の reject もログとメトリクスに記録するだけで、
 *   他の購読者への配信とティックの送信元には影響しない
 */
export class BroadcastDispatcher {
  private readonly sinks = new Map<string, SubscriberSink>();
  private readonly logger: Logger;
  private unsubscribeFromBus: Unsubscribe | null = null;

  constructor(
    private readonly tickPublisher: TickPublisher,
    private readonly subscribers: SubscriberLookup,
    private readonly options: BroadcastDispatcherOptions = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'BroadcastDispatcher' });
  }

  start(): void {
    if (this.unsubscribeFromBus) {
      return;
    }
    this.unsubscribeFromBus = this.tickPublisher.subscribe((tick) => this.dispatch(tick));
  }

  stop(): void {
    this.unsubscribeFromBus?.();
    this.unsubscribeFromBus = null;
  }

  registerSink(subscriberId: string, sink: SubscriberSink): void {
    this.sinks.set(subscriberId, sink);
  }

  unregisterSink(subscriberId: string): void {
    this.sinks.delete(subscriberId);
  }

  get sinkCount(): number {
    return this.sinks.size;
  }

  /**
   * 1 ティックを購読者へ配信する。配信の完了は待たない。
   */
  dispatch(tick: PriceTick): void {
    const targets = this.subscribers.subscribersOf(tick.symbol);
    if (targets.size === 0) {
      return;
    }

    const payload = serializePriceMessage(tick);
    for (const subscriberId of targets) {
      const sink = this.sinks.get(subscriberId);
      if (!sink) {
        this.logger.debug('No sink registered, skipping', { subscriberId, symbol: tick.symbol });
        continue;
      }
      this.deliver(subscriberId, sink, tick, payload);
    }
  }

  private deliver(subscriberId: string, sink: SubscriberSink, tick: PriceTick, payload: string): void {
    let result: void | Promise<void>;
    try {
      result = sink(tick, payload);
    } catch (error) {
      this.recordFailure(subscriberId, tick, error);
      return;
    }

    if (result instanceof Promise) {
      void result.then(
        () => this.options.metricsCollector?.incrementDelivered(tick.symbol),
        (error: unknown) => this.recordFailure(subscriberId, tick, error)
      );
      return;
    }
    this.options.metricsCollector?.incrementDelivered(tick.symbol);
  }

  private recordFailure(subscriberId: string, tick: PriceTick, error: unknown): void {
    this.options.metricsCollector?.incrementDeliveryFailed(tick.symbol);
    this.logger.warn('Delivery failed', { subscriberId, symbol: tick.symbol, err: error });
  }
}
