import type { PriceTick } from '@/domain/models/PriceTick';

/**
 * アダプタが 1 フレームを解釈した結果。
 * - tick: 正規化された価格
 * - ack: 購読リクエストへの応答など（配信対象外）
 * - ignored: 未知・不正なフレーム（reason をログに出して破棄する）
 */
export type FeedFrame =
  | { kind: 'tick'; tick: PriceTick }
  | { kind: 'ack'; raw: unknown }
  | { kind: 'ignored'; reason: string };

/**
 * アプリケーション層: 取引所フィードアダプタの共通インターフェイス
 *
 * 責務: 取引所固有のプロトコル（銘柄マッピング、制御メッセージ、受信メッセージ形式）を隠蔽する。
 * 接続そのものは UpstreamFeedConnector が WebSocketConnection 経由で行う。
 */
export interface FeedAdapter {
  /** アダプタ名（ログ・メトリクス用、例: 'binance'） */
  readonly name: string;

  /** 接続先 WebSocket エンドポイント URL */
  readonly url: string;

  /**
   * 銘柄に取引所側のマッピングがあるかどうか。
   * @param symbol 正規化済みの銘柄コード
   */
  supports(symbol: string): boolean;

  /**
   * 銘柄を取引所側の購読トークンに変換する。
   * @throws {UnsupportedSymbolError} マッピングがない場合
   */
  toVendorSymbol(symbol: string): string;

  /**
   * 購読開始の制御メッセージを組み立てる。
   */
  subscribeFrame(vendorSymbol: string): string;

  /**
   * 購読停止の制御メッセージを組み立てる。
   */
  unsubscribeFrame(vendorSymbol: string): string;

  /**
   * 受信フレームを解釈する。例外は投げない。
   * @param data WebSocket から受信したテキスト
   */
  parse(data: string): FeedFrame;
}

/**
 * 銘柄から担当アダプタを引く。
 */
export interface FeedAdapterResolver {
  /**
   * @throws {UnsupportedSymbolError} どのアダプタも対応していない場合
   */
  resolve(symbol: string): FeedAdapter;
}
