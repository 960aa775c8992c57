import type { PriceTick } from '@/domain/models/PriceTick';

/**
 * ティックの購読解除関数。
 */
export type Unsubscribe = () => void;

/**
 * ティックを受け取るリスナー。
 */
export type TickListener = (tick: PriceTick) => void;

/**
 * ティックのパブリッシュ/サブスクライブ・チャネル（application/services/TickBus で実装される）。
 */
export interface TickPublisher {
  /**
   * ティックを配信する。リスナーの完了は待たない。
   */
  publish(tick: PriceTick): void;

  /**
   * すべての銘柄のティックを購読する。
   * @returns 購読解除関数
   */
  subscribe(listener: TickListener): Unsubscribe;
}
