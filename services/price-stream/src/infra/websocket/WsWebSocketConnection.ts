import WebSocket from 'ws';
import type { WebSocketConnection } from './interfaces/WebSocketConnection';

const DEFAULT_CLOSE_TIMEOUT_MS = 1000;

/**
 * `ws` の受信データ（Buffer / ArrayBuffer / Buffer[]）を UTF-8 文字列に変換する。
 */
export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

/**
 * `ws` ライブラリを使った WebSocket 接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private messageCallbacks: Array<(data: string) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  constructor(
    private readonly socket: WebSocket,
    private readonly closeTimeoutMs = DEFAULT_CLOSE_TIMEOUT_MS
  ) {
    this.socket.on('message', (data) => {
      const text = rawDataToString(data);
      for (const cb of this.messageCallbacks) {
        cb(text);
      }
    });

    this.socket.on('close', (code, reason) => {
      const text = reason.toString('utf-8');
      for (const cb of this.closeCallbacks) {
        cb(code, text);
      }
    });

    this.socket.on('error', (error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  onMessage(callback: (data: string) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  close(code = 1000, reason = 'client closing'): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      // 相手がクローズフレームを返さない場合は強制切断する
      const timer = setTimeout(() => {
        this.socket.terminate();
      }, this.closeTimeoutMs);

      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      if (this.socket.readyState === WebSocket.CONNECTING) {
        this.socket.terminate();
      } else {
        this.socket.close(code, reason);
      }
    });
  }

  removeAllListeners(): void {
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}
