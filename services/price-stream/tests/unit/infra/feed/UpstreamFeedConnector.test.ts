import { createFakeOpener } from '@test/unit/helpers/fakes/FakeWebSocketConnection';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConnectFailureError,
  ConnectionUnavailableError,
  UnsupportedSymbolError,
} from '@/domain/errors/PriceStreamError';
import type { PriceTick } from '@/domain/models/PriceTick';
import { BinanceFeedAdapter } from '@/infra/adapters/binance/BinanceFeedAdapter';
import { UpstreamFeedConnector } from '@/infra/feed/UpstreamFeedConnector';
import type { RetryPolicy } from '@/infra/reconnect/BackoffStrategy';

const TRADE = JSON.stringify({ e: 'aggTrade', E: 1700000000000, s: 'BTCUSDT', p: '43000.5' });

/**
 * 単体テスト: UpstreamFeedConnector
 *
 * - 接続・購読コマンド送信
 * - 受信フレームの振り分け（tick / ack / 破棄）
 * - 異常切断からの再接続と購読の再送
 * - 正常クローズ、disconnect()、再試行の打ち切り
 */
describe('UpstreamFeedConnector', () => {
  let fake: ReturnType<typeof createFakeOpener>;
  let published: PriceTick[];
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;

  const createConnector = (retryPolicy?: RetryPolicy) =>
    new UpstreamFeedConnector('BTCUSD', new BinanceFeedAdapter(), (tick) => published.push(tick), {
      openConnection: fake.opener,
      retryPolicy,
      logger: loggerMock,
      metricsCollector: metricsMock,
    });

  beforeEach(() => {
    fake = createFakeOpener();
    published = [];
    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('connect()', () => {
    it('アダプタの URL に接続して connected になる', async () => {
      const connector = createConnector();
      expect(connector.status).toBe('disconnected');

      await connector.connect();

      expect(fake.opener).toHaveBeenCalledWith('wss://stream.binance.com:443/stream');
      expect(connector.status).toBe('connected');
    });

    it('接続済みなら何もしない', async () => {
      const connector = createConnector();

      await connector.connect();
      await connector.connect();

      expect(fake.opener).toHaveBeenCalledTimes(1);
    });

    it('接続に失敗すると ConnectFailureError で disconnected のまま', async () => {
      const connector = createConnector();
      fake.failNext();

      const error = await connector.connect().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConnectFailureError);
      expect(error instanceof ConnectFailureError && error.cause).toBeInstanceOf(Error);
      expect(connector.status).toBe('disconnected');
      expect(metricsMock.incrementError).toHaveBeenCalledWith('connect_failure');
    });

    it('同時に呼ばれても接続は 1 本だけ', async () => {
      const connector = createConnector();

      await Promise.all([connector.connect(), connector.connect(), connector.connect()]);

      expect(fake.opener).toHaveBeenCalledTimes(1);
    });
  });

  describe('sendSubscribe() / sendUnsubscribe()', () => {
    it('SUBSCRIBE コマンドを送信する', async () => {
      const connector = createConnector();
      await connector.connect();

      connector.sendSubscribe('BTCUSD');

      expect(fake.connections[0]?.sent).toEqual([
        '{"method":"SUBSCRIBE","params":["btcusdt@aggTrade"],"id":1}',
      ]);
    });

    it('未接続なら ConnectionUnavailableError', () => {
      const connector = createConnector();

      expect(() => connector.sendSubscribe('BTCUSD')).toThrow(ConnectionUnavailableError);
    });

    it('マッピングのない銘柄は UnsupportedSymbolError（接続状態より先に判定する）', () => {
      const connector = createConnector();

      expect(() => connector.sendSubscribe('EURUSD')).toThrow(UnsupportedSymbolError);
    });

    it('購読中の銘柄なら UNSUBSCRIBE を送信する', async () => {
      const connector = createConnector();
      await connector.connect();
      connector.sendSubscribe('BTCUSD');

      connector.sendUnsubscribe('BTCUSD');

      expect(fake.connections[0]?.sent[1]).toBe('{"method":"UNSUBSCRIBE","params":["btcusdt@aggTrade"],"id":2}');
    });

    it('購読していない銘柄の UNSUBSCRIBE は送信しない', async () => {
      const connector = createConnector();
      await connector.connect();

      connector.sendUnsubscribe('BTCUSD');

      expect(fake.connections[0]?.sent).toEqual([]);
    });
  });

  describe('受信', () => {
    it('aggTrade フレームをティックとして publish する', async () => {
      const connector = createConnector();
      await connector.connect();

      fake.connections[0]?.emitMessage(TRADE);

      expect(published).toEqual([{ symbol: 'BTCUSD', value: '43000.5', observedAt: 1700000000000 }]);
      expect(metricsMock.incrementTicksReceived).toHaveBeenCalledWith('BTCUSD');
    });

    it('ack は publish せず debug ログに残す', async () => {
      const connector = createConnector();
      await connector.connect();

      fake.connections[0]?.emitMessage('{"result":null,"id":1}');

      expect(published).toEqual([]);
      expect(loggerMock.debug).toHaveBeenCalledWith('Control message acknowledged', {
        message: { result: null, id: 1 },
      });
    });

    it('不正なフレームは破棄して warn ログとメトリクスに記録する', async () => {
      const connector = createConnector();
      await connector.connect();

      fake.connections[0]?.emitMessage('{broken');

      expect(published).toEqual([]);
      expect(loggerMock.warn).toHaveBeenCalledWith('Dropped upstream frame', { reason: 'invalid json' });
      expect(metricsMock.incrementError).toHaveBeenCalledWith('parse_error');
    });
  });

  describe('切断と再接続', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('異常切断すると connecting になり、1 秒後に再接続して購読を再送する', async () => {
      const connector = createConnector();
      await connector.connect();
      connector.sendSubscribe('BTCUSD');

      fake.connections[0]?.emitClose(1006, 'abnormal');
      expect(connector.status).toBe('connecting');

      await vi.advanceTimersByTimeAsync(1000);
      await vi.waitFor(() => expect(connector.status).toBe('connected'));

      expect(fake.opener).toHaveBeenCalledTimes(2);
      expect(fake.connections[1]?.sent).toEqual([
        '{"method":"SUBSCRIBE","params":["btcusdt@aggTrade"],"id":2}',
      ]);
      await connector.disconnect();
    });

    it('再接続後は古い接続からのフレームを無視する', async () => {
      const connector = createConnector();
      await connector.connect();
      const stale = fake.connections[0];

      stale?.emitClose(1006);
      await vi.advanceTimersByTimeAsync(1000);
      await vi.waitFor(() => expect(connector.status).toBe('connected'));

      stale?.emitMessage(TRADE);
      expect(published).toEqual([]);

      fake.connections[1]?.emitMessage(TRADE);
      expect(published).toHaveLength(1);
      await connector.disconnect();
    });

    it('サーバーからの正常クローズ (1000) では再接続しない', async () => {
      const connector = createConnector();
      await connector.connect();

      fake.connections[0]?.emitClose(1000, 'bye');
      await vi.advanceTimersByTimeAsync(5000);

      expect(connector.status).toBe('disconnected');
      expect(fake.opener).toHaveBeenCalledTimes(1);
      expect(loggerMock.warn).toHaveBeenCalledWith('Socket closed by server', { code: 1000, reason: 'bye' });
    });

    it('再試行回数を使い切ると disconnected になりメトリクスに記録する', async () => {
      const connector = createConnector({ mode: 'fixed', baseDelayMs: 100, maxDelayMs: 100, maxAttempts: 2 });
      await connector.connect();
      fake.failNext(2);

      fake.connections[0]?.emitClose(1006);
      await vi.advanceTimersByTimeAsync(100);
      await vi.advanceTimersByTimeAsync(100);
      await vi.waitFor(() => expect(connector.status).toBe('disconnected'));

      expect(fake.opener).toHaveBeenCalledTimes(3);
      expect(metricsMock.incrementError).toHaveBeenCalledWith('reconnect_exhausted');
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('disconnect()', () => {
    it('接続を閉じて disconnected になる', async () => {
      const connector = createConnector();
      await connector.connect();
      const connection = fake.connections[0];

      await connector.disconnect();

      expect(connection?.close).toHaveBeenCalledTimes(1);
      expect(connection?.listenerCount).toBe(0);
      expect(connector.status).toBe('disconnected');
    });

    it('未接続でも安全に呼べる', async () => {
      const connector = createConnector();

      await expect(connector.disconnect()).resolves.toBeUndefined();
      expect(connector.status).toBe('disconnected');
    });

    it('予約済みの再接続を取り消す', async () => {
      vi.useFakeTimers();
      const connector = createConnector();
      await connector.connect();

      fake.connections[0]?.emitClose(1006);
      await connector.disconnect();
      await vi.advanceTimersByTimeAsync(5000);

      expect(fake.opener).toHaveBeenCalledTimes(1);
      expect(connector.status).toBe('disconnected');
    });

    it('close が失敗したら terminate する', async () => {
      const connector = createConnector();
      await connector.connect();
      const connection = fake.connections[0];
      connection?.close.mockRejectedValueOnce(new Error('close failed'));

      await connector.disconnect();

      expect(connection?.terminate).toHaveBeenCalledTimes(1);
    });
  });
});
