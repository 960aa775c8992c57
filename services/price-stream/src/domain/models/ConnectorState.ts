/**
 * 上流コネクタの接続状態。
 *
 * disconnected → connecting → connected → disconnected
 * 一時的な受信エラー時のみ connected → connecting に戻る（再接続中）。
 */
export type ConnectorStatus = 'disconnected' | 'connecting' | 'connected';

/**
 * 銘柄ごとのコネクタ状態（FeedConnectionPool が排他的に保持する）。
 * 状態遷移は常に新しい値で置き換え、既存オブジェクトは書き換えない。
 */
export interface ConnectorState {
  readonly symbol: string;
  /** この銘柄に関心を持っている利用者数（0 未満にはならない） */
  readonly refCount: number;
  readonly status: ConnectorStatus;
  /** 最後にティック受信またはライフサイクルイベントがあった時刻（エポックミリ秒） */
  readonly lastActivity: number;
}
