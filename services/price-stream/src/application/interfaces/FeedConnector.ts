import type { ConnectorStatus } from '@/domain/models/ConnectorState';
import type { PriceTick } from '@/domain/models/PriceTick';
import type { FeedAdapter } from './FeedAdapter';

/**
 * 1 銘柄分の上流接続を所有するコネクタの契約。
 * 実装は infra/feed/UpstreamFeedConnector。FeedConnectionPool だけが生成・破棄する。
 */
export interface FeedConnector {
  readonly symbol: string;
  readonly status: ConnectorStatus;

  /**
   * 上流へ接続する。接続済みなら何もしない。
   * @throws {ConnectFailureError}
   */
  connect(): Promise<void>;

  /**
   * 購読を開始する。
   * @throws {UnsupportedSymbolError} マッピングがない場合
   * @throws {ConnectionUnavailableError} 未接続の場合
   */
  sendSubscribe(symbol: string): void;

  sendUnsubscribe(symbol: string): void;

  /**
   * 接続を閉じ、再接続も止める。未接続でも安全に呼べる。
   */
  disconnect(): Promise<void>;
}

/**
 * コネクタの生成関数。受信したティックは publish に流す。
 */
export type FeedConnectorFactory = (
  symbol: string,
  adapter: FeedAdapter,
  publish: (tick: PriceTick) => void
) => FeedConnector;
