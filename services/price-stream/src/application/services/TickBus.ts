import type { Logger } from '@/application/interfaces/Logger';
import type { TickListener, TickPublisher, Unsubscribe } from '@/application/interfaces/TickPublisher';
import type { PriceTick } from '@/domain/models/PriceTick';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * アプリケーション層: ティックのパブリッシュ/サブスクライブ・チャネル
 *
 * コネクタ → (PriceCache, BroadcastDispatcher) の一方向の配信路。
 * リスナーは登録順に同期で呼ばれるため、同じ銘柄のティック順序は受信順のまま保たれる。
 * 1 つのリスナーが例外を投げても残りのリスナーには配信する。
 */
export class TickBus implements TickPublisher {
  private readonly listeners = new Set<TickListener>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'TickBus' });
  }

  publish(tick: PriceTick): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(tick);
      } catch (error) {
        this.logger.error('Tick listener failed', { err: error, symbol: tick.symbol });
      }
    }
  }

  subscribe(listener: TickListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
