/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: 確立済みの WebSocket 接続のイベント処理と送受信を抽象化する。
 * 実装は `ws` ライブラリ（WsWebSocketConnection）。テストではインメモリの偽物に差し替える。
 */
export interface WebSocketConnection {
  /** 送信可能な状態か */
  readonly isOpen: boolean;

  /**
   * テキストフレームを受信したときに呼ばれるコールバック
   * バイナリで届いた場合も UTF-8 文字列に変換して渡す
   */
  onMessage(callback: (data: string) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   * code は WebSocket のクローズコード（1000 が正常終了）
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * ソケットエラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  /**
   * メッセージを送信する
   */
  send(data: string): void;

  /**
   * クローズハンドシェイクを行い、完了（またはタイムアウトで強制切断）まで待つ
   */
  close(code?: number, reason?: string): Promise<void>;

  /**
   * 登録済みのコールバックをすべて解除する
   */
  removeAllListeners(): void;

  /**
   * ハンドシェイクなしで接続を強制終了する
   */
  terminate(): void;
}

/**
 * URL を受け取り、オープン済みの接続を返す関数。
 * 失敗時は reject する。
 */
export type WebSocketOpener = (url: string) => Promise<WebSocketConnection>;
