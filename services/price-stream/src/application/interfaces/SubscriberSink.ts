import type { PriceTick } from '@/domain/models/PriceTick';

/**
 * 購読者 1 人分の配信先（トランスポート層が登録する）。
 *
 * `payload` は BroadcastDispatcher が 1 ティックにつき 1 回だけシリアライズした JSON。
 * 戻り値が Promise の場合、失敗はディスパッチャ側でログに記録される（await はしない）。
 */
export type SubscriberSink = (tick: PriceTick, payload: string) => void | Promise<void>;
