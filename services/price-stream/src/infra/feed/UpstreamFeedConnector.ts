import PQueue from 'p-queue';
import type { FeedAdapter } from '@/application/interfaces/FeedAdapter';
import type { FeedConnector } from '@/application/interfaces/FeedConnector';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConnectFailureError, ConnectionUnavailableError } from '@/domain/errors/PriceStreamError';
import type { ConnectorStatus } from '@/domain/models/ConnectorState';
import type { PriceTick } from '@/domain/models/PriceTick';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { RetryPolicy } from '@/infra/reconnect/BackoffStrategy';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';
import type { WebSocketConnection, WebSocketOpener } from '@/infra/websocket/interfaces/WebSocketConnection';
import { openWebSocket } from '@/infra/websocket/openWebSocket';

const NORMAL_CLOSURE = 1000;

export interface UpstreamFeedConnectorOptions {
  /** 接続を開く関数（テストではインメモリの偽物を返す） */
  openConnection?: WebSocketOpener;
  /** 一時的な切断時の再接続ポリシー */
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: 1 銘柄分の上流フィード接続
 *
 * 責務:
 * - WebSocket 接続の確立と破棄（connect / reconnect / disconnect は直列化する）
 * - アダプタを使った購読コマンドの送信と受信フレームの正規化
 * - 一時的な切断からの再接続（ReconnectManager に委譲）
 *
 * 状態: disconnected → connecting → connected → disconnected
 * 異常切断時のみ connected → connecting（再接続中）に戻る。
 */
export class UpstreamFeedConnector implements FeedConnector {
  private connection: WebSocketConnection | null = null;
  private currentStatus: ConnectorStatus = 'disconnected';
  private stopped = true;
  private readonly subscribedSymbols = new Set<string>();
  private readonly lifecycle = new PQueue({ concurrency: 1 });
  private readonly reconnectManager: ReconnectManager;
  private readonly openConnection: WebSocketOpener;
  private readonly logger: Logger;

  /**
   * @param symbol 担当する銘柄（正規化済み）
   * @param adapter 取引所アダプタ
   * @param publish 正規化したティックの配信先
   */
  constructor(
    readonly symbol: string,
    private readonly adapter: FeedAdapter,
    private readonly publish: (tick: PriceTick) => void,
    private readonly options: UpstreamFeedConnectorOptions = {}
  ) {
    this.openConnection = options.openConnection ?? ((url) => openWebSocket(url));
    this.logger = (options.logger ?? LoggerFactory.create()).child({
      component: 'UpstreamFeedConnector',
      symbol,
      adapter: adapter.name,
    });
    this.reconnectManager = new ReconnectManager(() => this.reconnect(), {
      policy: options.retryPolicy,
      label: symbol,
      logger: this.logger,
      metricsCollector: options.metricsCollector,
      onExhausted: () => this.handleRetriesExhausted(),
    });
  }

  get status(): ConnectorStatus {
    return this.currentStatus;
  }

  /**
   * 上流へ接続する。接続済みなら何もしない。
   * 既存の接続があれば、リスナーを外してクローズ完了を待ってから新規接続する。
   * @throws {ConnectFailureError} 接続できなかった場合
   */
  async connect(): Promise<void> {
    await this.lifecycle.add(async () => {
      if (this.currentStatus === 'connected' && this.connection?.isOpen) {
        this.logger.debug('Already connected');
        return;
      }

      this.stopped = false;
      try {
        await this.open();
      } catch (error) {
        this.stopped = true;
        this.currentStatus = 'disconnected';
        throw error;
      }
      this.reconnectManager.reset();
    });
  }

  /**
   * 購読コマンドを送信する。送信済みの銘柄は再接続後に再送される。
   * @throws {UnsupportedSymbolError} アダプタにマッピングがない場合
   * @throws {ConnectionUnavailableError} 接続済みでない場合
   */
  sendSubscribe(symbol: string): void {
    const vendorSymbol = this.adapter.toVendorSymbol(symbol);
    const connection = this.connection;
    if (this.currentStatus !== 'connected' || !connection?.isOpen) {
      throw new ConnectionUnavailableError(symbol);
    }

    connection.send(this.adapter.subscribeFrame(vendorSymbol));
    this.subscribedSymbols.add(symbol);
    this.logger.info('Subscription sent', { vendorSymbol });
  }

  /**
   * 購読停止コマンドを送信する。未接続の場合は再送対象から外すだけ。
   */
  sendUnsubscribe(symbol: string): void {
    const wasSubscribed = this.subscribedSymbols.delete(symbol);
    const connection = this.connection;
    if (!wasSubscribed || this.currentStatus !== 'connected' || !connection?.isOpen) {
      return;
    }

    connection.send(this.adapter.unsubscribeFrame(this.adapter.toVendorSymbol(symbol)));
    this.logger.info('Unsubscription sent', { symbol });
  }

  /**
   * 再接続を止め、接続を閉じてクローズ完了まで待つ。未接続でも安全に呼べる。
   */
  async disconnect(): Promise<void> {
    this.stopped = true;
    this.reconnectManager.stop();

    await this.lifecycle.add(async () => {
      this.reconnectManager.stop();
      await this.teardown();
      this.subscribedSymbols.clear();
      this.currentStatus = 'disconnected';
      this.logger.info('Disconnected');
    });
  }

  /**
   * 接続を開いてイベントハンドラを設定する。lifecycle キューの中からのみ呼ぶ。
   * @throws {ConnectFailureError}
   */
  private async open(): Promise<void> {
    await this.teardown();
    this.currentStatus = 'connecting';
    this.logger.info('Connecting', { url: this.adapter.url });

    let connection: WebSocketConnection;
    try {
      connection = await this.openConnection(this.adapter.url);
    } catch (error) {
      this.options.metricsCollector?.incrementError('connect_failure');
      this.logger.error('Connect failed', { err: error });
      throw new ConnectFailureError(this.symbol, error);
    }

    this.connection = connection;
    connection.onMessage((data) => {
      if (this.connection === connection) {
        this.handleFrame(data);
      }
    });
    connection.onClose((code, reason) => {
      if (this.connection === connection) {
        this.handleClose(code, reason);
      }
    });
    connection.onError((error) => {
      if (this.connection === connection) {
        this.logger.warn('Socket error', { err: error });
      }
    });

    this.currentStatus = 'connected';
    this.logger.info('Connected');
  }

  /**
   * ReconnectManager から呼ばれる再接続処理。成功したら購読を再送する。
   */
  private async reconnect(): Promise<void> {
    await this.lifecycle.add(async () => {
      if (this.stopped) {
        return;
      }

      try {
        await this.open();
      } catch (error) {
        // 再試行中は connecting のまま。諦めるかどうかは ReconnectManager が決める
        this.currentStatus = 'connecting';
        throw error;
      }
      const connection = this.connection;
      if (!connection) {
        return;
      }
      for (const symbol of this.subscribedSymbols) {
        connection.send(this.adapter.subscribeFrame(this.adapter.toVendorSymbol(symbol)));
      }
      this.logger.info('Reconnected', { resubscribed: [...this.subscribedSymbols] });
    });
  }

  private async teardown(): Promise<void> {
    const previous = this.connection;
    if (!previous) {
      return;
    }
    this.connection = null;
    previous.removeAllListeners();
    try {
      await previous.close();
    } catch (error) {
      this.logger.warn('Close failed, terminating socket', { err: error });
      previous.terminate();
    }
  }

  private handleFrame(data: string): void {
    const frame = this.adapter.parse(data);
    switch (frame.kind) {
      case 'tick':
        this.options.metricsCollector?.incrementTicksReceived(frame.tick.symbol);
        this.publish(frame.tick);
        return;
      case 'ack':
        this.logger.debug('Control message acknowledged', { message: frame.raw });
        return;
      case 'ignored':
        this.options.metricsCollector?.incrementError('parse_error');
        this.logger.warn('Dropped upstream frame', { reason: frame.reason });
        return;
    }
  }

  private handleClose(code: number, reason: string): void {
    this.connection = null;

    if (code === NORMAL_CLOSURE) {
      // サーバーからの正常終了はストリームの終わりとして扱い、再接続しない
      this.currentStatus = 'disconnected';
      this.logger.warn('Socket closed by server', { code, reason });
      return;
    }

    this.currentStatus = 'connecting';
    this.logger.warn('Socket closed unexpectedly, reconnecting', { code, reason });
    this.reconnectManager.scheduleReconnect();
  }

  private handleRetriesExhausted(): void {
    this.stopped = true;
    this.currentStatus = 'disconnected';
    this.options.metricsCollector?.incrementError('reconnect_exhausted');
  }
}
