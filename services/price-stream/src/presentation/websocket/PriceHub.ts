import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import WebSocket, { WebSocketServer } from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import type { BroadcastDispatcher } from '@/application/services/BroadcastDispatcher';
import type { SubscriptionRegistry } from '@/application/services/SubscriptionRegistry';
import { PriceStreamError } from '@/domain/errors/PriceStreamError';
import { normalizeSymbol } from '@/domain/models/InstrumentSymbol';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { rawDataToString } from '@/infra/websocket/WsWebSocketConnection';

export const PRICE_HUB_PATH = '/priceHub';

/**
 * クライアントから受け付けるコマンド。
 */
export type HubCommand =
  | { action: 'subscribe'; symbol: string }
  | { action: 'unsubscribe'; symbol: string }
  | { action: 'subscriptions' };

/**
 * サーバーからの応答（価格配信 `{ type: 'price' }` は BroadcastDispatcher が組み立てる）。
 */
export type HubReply =
  | { type: 'subscribed'; symbol: string }
  | { type: 'unsubscribed'; symbol: string }
  | { type: 'subscriptions'; symbols: string[] }
  | { type: 'error'; code: string; message: string; symbol?: string };

/**
 * 1 接続分の送信口。実体は ws のソケットだが、テストでは偽物を渡す。
 */
export interface HubClient {
  send(data: string): Promise<void>;
}

export interface PriceHubOptions {
  path?: string;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 受信テキストをコマンドとして解釈する。
 * @returns 解釈できない場合は理由の文字列
 */
export function parseHubCommand(data: string): HubCommand | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return 'invalid json';
  }
  if (!isRecord(parsed)) {
    return 'command must be an object';
  }

  const { action, symbol } = parsed;
  if (action === 'subscriptions') {
    return { action };
  }
  if (action !== 'subscribe' && action !== 'unsubscribe') {
    return `unknown action: ${String(action)}`;
  }
  if (typeof symbol !== 'string' || symbol.trim() === '') {
    return 'symbol is required';
  }
  return { action, symbol };
}

/**
 * プレゼンテーション層: 価格配信用 WebSocket ハブ
 *
 * 責務:
 * - 接続ごとに購読者 ID を払い出し、BroadcastDispatcher に配信先を登録する
 * - subscribe / unsubscribe / subscriptions コマンドを SubscriptionRegistry に委譲する
 * - 切断時に配信先を外し、すべての購読を解除する（完了まで待つ）
 */
export class PriceHub {
  private readonly clients = new Map<string, HubClient>();
  private readonly pendingCloses = new Set<Promise<void>>();
  private readonly logger: Logger;
  private wss: WebSocketServer | null = null;

  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly dispatcher: BroadcastDispatcher,
    private readonly options: PriceHubOptions = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'PriceHub' });
  }

  /**
   * HTTP サーバーにアタッチしてアップグレードを受け付ける。
   */
  attach(server: Server): void {
    const path = this.options.path ?? PRICE_HUB_PATH;
    this.wss = new WebSocketServer({ server, path });
    this.wss.on('connection', (socket) => this.accept(socket));
    this.wss.on('error', (error) => this.logger.error('WebSocket server error', { err: error }));
    this.logger.info('Price hub attached', { path });
  }

  /**
   * 新しい接続を登録する。
   * @returns 払い出した購読者 ID
   */
  openSession(client: HubClient): string {
    const subscriberId = randomUUID();
    this.clients.set(subscriberId, client);
    this.dispatcher.registerSink(subscriberId, (_tick, payload) => client.send(payload));
    this.logger.info('Client connected', { subscriberId });
    return subscriberId;
  }

  /**
   * 受信したコマンドを処理して応答を返す。
   */
  async handleMessage(subscriberId: string, data: string): Promise<void> {
    const client = this.clients.get(subscriberId);
    if (!client) {
      return;
    }

    const command = parseHubCommand(data);
    const reply: HubReply =
      typeof command === 'string'
        ? { type: 'error', code: 'BAD_COMMAND', message: command }
        : await this.execute(subscriberId, command);

    try {
      await client.send(JSON.stringify(reply));
    } catch (error) {
      this.logger.warn('Failed to send reply', { subscriberId, err: error });
    }
  }

  /**
   * 接続を閉じた購読者の後始末。すべての購読解除が終わるまで待つ。
   */
  async closeSession(subscriberId: string): Promise<void> {
    if (!this.clients.delete(subscriberId)) {
      return;
    }
    this.dispatcher.unregisterSink(subscriberId);
    try {
      await this.registry.unsubscribeAll(subscriberId);
    } catch (error) {
      this.logger.error('Failed to clean up subscriptions', { subscriberId, err: error });
    }
    this.logger.info('Client disconnected', { subscriberId });
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * すべての接続を閉じ、後始末の完了を待つ。
   */
  async stop(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    if (wss) {
      for (const socket of wss.clients) {
        socket.close(1001, 'server shutting down');
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    await Promise.all([...this.clients.keys()].map((id) => this.closeSession(id)));
    await Promise.all([...this.pendingCloses]);
  }

  private accept(socket: WebSocket): void {
    const subscriberId = this.openSession({
      send: (data) =>
        new Promise<void>((resolve, reject) => {
          if (socket.readyState !== WebSocket.OPEN) {
            reject(new Error('socket is not open'));
            return;
          }
          socket.send(data, (error) => (error ? reject(error) : resolve()));
        }),
    });

    socket.on('message', (data) => {
      void this.handleMessage(subscriberId, rawDataToString(data));
    });
    socket.on('error', (error) => {
      this.logger.warn('Client socket error', { subscriberId, err: error });
    });
    socket.once('close', () => {
      const pending = this.closeSession(subscriberId);
      this.pendingCloses.add(pending);
      void pending.finally(() => this.pendingCloses.delete(pending));
    });
  }

  private async execute(subscriberId: string, command: HubCommand): Promise<HubReply> {
    if (command.action === 'subscriptions') {
      return { type: 'subscriptions', symbols: [...this.registry.symbolsOf(subscriberId)] };
    }

    let symbol = command.symbol;
    try {
      symbol = normalizeSymbol(command.symbol);
      if (command.action === 'subscribe') {
        await this.registry.subscribe(subscriberId, symbol);
        return { type: 'subscribed', symbol };
      }
      await this.registry.unsubscribe(subscriberId, symbol);
      return { type: 'unsubscribed', symbol };
    } catch (error) {
      if (error instanceof PriceStreamError) {
        return { type: 'error', code: error.code, message: error.message, symbol };
      }
      this.logger.error('Command failed', { subscriberId, command, err: error });
      return { type: 'error', code: 'INTERNAL', message: 'unexpected error', symbol };
    }
  }
}
