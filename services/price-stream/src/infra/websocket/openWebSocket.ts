import WebSocket from 'ws';
import type { WebSocketConnection } from './interfaces/WebSocketConnection';
import { WsWebSocketConnection } from './WsWebSocketConnection';

export interface OpenWebSocketOptions {
  /** ハンドシェイクのタイムアウト（ミリ秒） */
  handshakeTimeoutMs?: number;
}

/**
 * WebSocket 接続を確立する。
 * @param url WebSocket エンドポイント URL
 * @returns 接続が確立されたら解決される
 */
export function openWebSocket(url: string, options?: OpenWebSocketOptions): Promise<WebSocketConnection> {
  return new Promise<WebSocketConnection>((resolve, reject) => {
    const socket = new WebSocket(url, { handshakeTimeout: options?.handshakeTimeoutMs ?? 10000 });

    const onOpen = () => {
      socket.off('error', onError);
      resolve(new WsWebSocketConnection(socket));
    };

    // 失敗後に再度 error が発火しても未処理例外にならないよう、リスナーは外さない
    const onError = (error: Error) => {
      socket.off('open', onOpen);
      reject(new Error(`WebSocket connection failed: ${error.message}`, { cause: error }));
    };

    socket.once('open', onOpen);
    socket.on('error', onError);
  });
}

