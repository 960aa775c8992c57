import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly ticksCounter: Counter;
  private readonly deliveredCounter: Counter;
  private readonly deliveryFailedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly connectorsGauge: Gauge;
  private readonly subscriptionsGauge: Gauge;

  constructor() {
    this.register = new Registry();

    this.ticksCounter = new Counter({
      name: 'price_stream_ticks_received_total',
      help: 'Total number of price ticks received from upstream feeds',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.deliveredCounter = new Counter({
      name: 'price_stream_deliveries_total',
      help: 'Total number of ticks handed to subscriber sinks',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.deliveryFailedCounter = new Counter({
      name: 'price_stream_delivery_failures_total',
      help: 'Total number of failed subscriber deliveries',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'price_stream_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'price_stream_reconnects_total',
      help: 'Total number of upstream reconnection attempts',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    // 上流接続数は「関心のある銘柄数」と一致するはず
    this.connectorsGauge = new Gauge({
      name: 'price_stream_active_connectors',
      help: 'Number of live upstream connectors',
      registers: [this.register],
    });

    this.subscriptionsGauge = new Gauge({
      name: 'price_stream_subscriptions',
      help: 'Number of (subscriber, symbol) subscription relations',
      registers: [this.register],
    });
  }

  incrementTicksReceived(symbol: string): void {
    this.ticksCounter.inc({ symbol });
  }

  incrementDelivered(symbol: string): void {
    this.deliveredCounter.inc({ symbol });
  }

  incrementDeliveryFailed(symbol: string): void {
    this.deliveryFailedCounter.inc({ symbol });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(symbol: string): void {
    this.reconnectCounter.inc({ symbol });
  }

  setActiveConnectors(count: number): void {
    this.connectorsGauge.set(count);
  }

  setSubscriptions(count: number): void {
    this.subscriptionsGauge.set(count);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
