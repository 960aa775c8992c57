import { createServer } from 'node:http';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import WebSocket from 'ws';
import type { ConnectionPool } from '@/application/interfaces/ConnectionPool';
import { BroadcastDispatcher } from '@/application/services/BroadcastDispatcher';
import { SubscriptionRegistry } from '@/application/services/SubscriptionRegistry';
import { TickBus } from '@/application/services/TickBus';
import { UnsupportedSymbolError } from '@/domain/errors/PriceStreamError';
import { createPriceTick } from '@/domain/models/PriceTick';
import { rawDataToString } from '@/infra/websocket/WsWebSocketConnection';
import { type HubClient, parseHubCommand, PriceHub } from '@/presentation/websocket/PriceHub';

class RecordingClient implements HubClient {
  readonly messages: unknown[] = [];
  send = vi.fn(async (data: string): Promise<void> => {
    this.messages.push(JSON.parse(data));
  });
}

describe('parseHubCommand', () => {
  it('subscribe / unsubscribe / subscriptions を解釈する', () => {
    expect(parseHubCommand('{"action":"subscribe","symbol":"BTCUSD"}')).toEqual({ action: 'subscribe', symbol: 'BTCUSD' });
    expect(parseHubCommand('{"action":"unsubscribe","symbol":"btcusd"}')).toEqual({
      action: 'unsubscribe',
      symbol: 'btcusd',
    });
    expect(parseHubCommand('{"action":"subscriptions"}')).toEqual({ action: 'subscriptions' });
  });

  it('解釈できないコマンドは理由を返す', () => {
    expect(parseHubCommand('nope')).toBe('invalid json');
    expect(parseHubCommand('"subscribe"')).toBe('command must be an object');
    expect(parseHubCommand('{"action":"buy"}')).toBe('unknown action: buy');
    expect(parseHubCommand('{"action":"subscribe"}')).toBe('symbol is required');
    expect(parseHubCommand('{"action":"subscribe","symbol":"  "}')).toBe('symbol is required');
  });
});

/**
 * 単体テスト: PriceHub
 *
 * ws のソケットの代わりに HubClient の偽物を使い、コマンド処理・配信・切断時の後始末を確認する。
 */
describe('PriceHub', () => {
  let pool: { acquire: Mock<ConnectionPool['acquire']>; release: Mock<ConnectionPool['release']> };
  let bus: TickBus;
  let registry: SubscriptionRegistry;
  let dispatcher: BroadcastDispatcher;
  let hub: PriceHub;

  beforeEach(() => {
    pool = {
      acquire: vi.fn<ConnectionPool['acquire']>(async () => {}),
      release: vi.fn<ConnectionPool['release']>(async () => {}),
    };
    bus = new TickBus(new LoggerMock());
    registry = new SubscriptionRegistry(pool, { logger: new LoggerMock() });
    dispatcher = new BroadcastDispatcher(bus, registry, { logger: new LoggerMock() });
    dispatcher.start();
    hub = new PriceHub(registry, dispatcher, { logger: new LoggerMock() });
  });

  it('subscribe で購読して subscribed を返し、以後の価格を配信する', async () => {
    const client = new RecordingClient();
    const id = hub.openSession(client);

    await hub.handleMessage(id, '{"action":"subscribe","symbol":"btcusd"}');
    bus.publish(createPriceTick('BTCUSD', '43000.5', 1700000000000));
    await vi.waitFor(() => expect(client.messages).toHaveLength(2));

    expect(client.messages).toEqual([
      { type: 'subscribed', symbol: 'BTCUSD' },
      { type: 'price', data: { symbol: 'BTCUSD', value: '43000.5', observedAt: 1700000000000 } },
    ]);
    expect(pool.acquire).toHaveBeenCalledWith('BTCUSD');
  });

  it('購読していない銘柄の価格は届かない', async () => {
    const client = new RecordingClient();
    hub.openSession(client);

    bus.publish(createPriceTick('BTCUSD', '1', 1));

    expect(client.send).not.toHaveBeenCalled();
  });

  it('未対応の銘柄は error を返し、接続は維持する', async () => {
    pool.acquire.mockRejectedValueOnce(new UnsupportedSymbolError('EURUSD'));
    const client = new RecordingClient();
    const id = hub.openSession(client);

    await hub.handleMessage(id, '{"action":"subscribe","symbol":"EURUSD"}');
    await hub.handleMessage(id, '{"action":"subscriptions"}');

    expect(client.messages).toEqual([
      { type: 'error', code: 'UNSUPPORTED_SYMBOL', message: 'Symbol EURUSD is not supported', symbol: 'EURUSD' },
      { type: 'subscriptions', symbols: [] },
    ]);
    expect(hub.clientCount).toBe(1);
  });

  it('不正なコマンドには BAD_COMMAND を返す', async () => {
    const client = new RecordingClient();
    const id = hub.openSession(client);

    await hub.handleMessage(id, '{"action":"dance"}');

    expect(client.messages).toEqual([{ type: 'error', code: 'BAD_COMMAND', message: 'unknown action: dance' }]);
  });

  it('unsubscribe と subscriptions', async () => {
    const client = new RecordingClient();
    const id = hub.openSession(client);

    await hub.handleMessage(id, '{"action":"subscribe","symbol":"BTCUSD"}');
    await hub.handleMessage(id, '{"action":"subscribe","symbol":"ETHUSD"}');
    await hub.handleMessage(id, '{"action":"unsubscribe","symbol":"BTCUSD"}');
    await hub.handleMessage(id, '{"action":"subscriptions"}');

    expect(client.messages.slice(2)).toEqual([
      { type: 'unsubscribed', symbol: 'BTCUSD' },
      { type: 'subscriptions', symbols: ['ETHUSD'] },
    ]);
    expect(pool.release).toHaveBeenCalledWith('BTCUSD');
  });

  it('切断すると配信先を外し、すべての購読を解除する', async () => {
    const client = new RecordingClient();
    const id = hub.openSession(client);
    await hub.handleMessage(id, '{"action":"subscribe","symbol":"BTCUSD"}');
    await hub.handleMessage(id, '{"action":"subscribe","symbol":"ETHUSD"}');

    await hub.closeSession(id);

    expect(registry.symbolsOf(id).size).toBe(0);
    expect(pool.release.mock.calls.map(([symbol]) => symbol).sort()).toEqual(['BTCUSD', 'ETHUSD']);
    expect(dispatcher.sinkCount).toBe(0);
    expect(hub.clientCount).toBe(0);
  });

  it('同じ銘柄を購読する 2 つの接続のうち片方が切れても、もう片方には配信が続く', async () => {
    const a = new RecordingClient();
    const b = new RecordingClient();
    const idA = hub.openSession(a);
    const idB = hub.openSession(b);
    await hub.handleMessage(idA, '{"action":"subscribe","symbol":"BTCUSD"}');
    await hub.handleMessage(idB, '{"action":"subscribe","symbol":"BTCUSD"}');

    await hub.closeSession(idA);
    bus.publish(createPriceTick('BTCUSD', '7', 7));
    await vi.waitFor(() => expect(b.messages).toHaveLength(2));

    expect(a.messages).toHaveLength(1);
    expect(pool.release).not.toHaveBeenCalled();
  });

  it('他の接続の acquire 待ちで止まっている購読も、切断の後始末で解除される', async () => {
    let openGate = () => {};
    pool.acquire.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          openGate = resolve;
        })
    );
    const first = hub.openSession(new RecordingClient());
    const second = hub.openSession(new RecordingClient());

    const firstSubscribe = hub.handleMessage(first, '{"action":"subscribe","symbol":"BTCUSD"}');
    const secondSubscribe = hub.handleMessage(second, '{"action":"subscribe","symbol":"BTCUSD"}');
    const secondClosed = hub.closeSession(second);

    await vi.waitFor(() => expect(pool.acquire).toHaveBeenCalledTimes(1));
    openGate();
    await Promise.all([firstSubscribe, secondSubscribe, secondClosed]);
    await hub.closeSession(first);

    expect(registry.subscriberCount('BTCUSD')).toBe(0);
    expect(registry.stats()).toEqual({ subscribers: 0, symbols: 0, subscriptions: 0 });
    expect(pool.release).toHaveBeenCalledTimes(1);
    expect(pool.release).toHaveBeenCalledWith('BTCUSD');
  });

  it('閉じたセッションのメッセージは無視する', async () => {
    const client = new RecordingClient();
    const id = hub.openSession(client);
    await hub.closeSession(id);

    await hub.handleMessage(id, '{"action":"subscriptions"}');

    expect(client.send).not.toHaveBeenCalled();
  });
});

describe('PriceHub（ws サーバー経由）', () => {
  it('HTTP サーバーにアタッチして購読・配信・切断の後始末まで行う', async () => {
    const pool = {
      acquire: vi.fn<ConnectionPool['acquire']>(async () => {}),
      release: vi.fn<ConnectionPool['release']>(async () => {}),
    };
    const bus = new TickBus(new LoggerMock());
    const registry = new SubscriptionRegistry(pool, { logger: new LoggerMock() });
    const dispatcher = new BroadcastDispatcher(bus, registry, { logger: new LoggerMock() });
    dispatcher.start();
    const hub = new PriceHub(registry, dispatcher, { logger: new LoggerMock() });
    const server = createServer();
    hub.attach(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;

    const client = new WebSocket(`ws://127.0.0.1:${port}/priceHub`);
    const received: unknown[] = [];
    client.on('message', (data) => received.push(JSON.parse(rawDataToString(data))));
    await new Promise<void>((resolve) => client.once('open', () => resolve()));

    client.send(JSON.stringify({ action: 'subscribe', symbol: 'BTCUSD' }));
    await vi.waitFor(() => expect(received).toEqual([{ type: 'subscribed', symbol: 'BTCUSD' }]));

    bus.publish(createPriceTick('BTCUSD', '42', 42));
    await vi.waitFor(() => expect(received).toHaveLength(2));
    expect(received[1]).toEqual({ type: 'price', data: { symbol: 'BTCUSD', value: '42', observedAt: 42 } });

    client.close();
    await vi.waitFor(() => expect(pool.release).toHaveBeenCalledWith('BTCUSD'));
    expect(registry.stats().subscriptions).toBe(0);

    await hub.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });
});
