import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import type { ConnectionPool } from '@/application/interfaces/ConnectionPool';
import { PriceCache } from '@/application/services/PriceCache';
import { GetCurrentPriceUsecase } from '@/application/usecases/GetCurrentPriceUsecase';
import {
  ConnectFailureError,
  InvalidSymbolError,
  PriceWaitAbortedError,
  UnsupportedSymbolError,
} from '@/domain/errors/PriceStreamError';
import { createPriceTick } from '@/domain/models/PriceTick';

/**
 * 単体テスト: GetCurrentPriceUsecase
 *
 * - キャッシュヒット
 * - コールドリード（acquire → 初回ティック待ち）
 * - not_found / unsupported の変換
 * - 銘柄ごとに 1 回だけ acquire し、dispose() で解放する
 */
describe('GetCurrentPriceUsecase', () => {
  let cache: PriceCache;
  let pool: { acquire: Mock<ConnectionPool['acquire']>; release: Mock<ConnectionPool['release']> };
  let usecase: GetCurrentPriceUsecase;

  beforeEach(() => {
    vi.useFakeTimers();
    cache = new PriceCache(new LoggerMock());
    pool = {
      acquire: vi.fn<ConnectionPool['acquire']>(async () => {}),
      release: vi.fn<ConnectionPool['release']>(async () => {}),
    };
    usecase = new GetCurrentPriceUsecase(cache, pool, { coldReadTimeoutMs: 10000, logger: new LoggerMock() });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('キャッシュにあれば acquire せずに返す', async () => {
    const tick = createPriceTick('BTCUSD', '43000', 1);
    cache.onTick(tick);

    await expect(usecase.execute('btcusd')).resolves.toEqual({ status: 'ok', price: tick });
    expect(pool.acquire).not.toHaveBeenCalled();
  });

  it('キャッシュになければ acquire して初回ティックを待つ', async () => {
    const pending = usecase.execute('BTCUSD');
    await vi.waitFor(() => expect(pool.acquire).toHaveBeenCalledWith('BTCUSD'));

    const tick = createPriceTick('BTCUSD', '43001', 2);
    cache.onTick(tick);

    await expect(pending).resolves.toEqual({ status: 'ok', price: tick });
    expect(usecase.heldSymbols).toEqual(['BTCUSD']);
  });

  it('待機時間内にティックが届かなければ not_found', async () => {
    const pending = usecase.execute('BTCUSD');
    const assertion = expect(pending).resolves.toEqual({ status: 'not_found', symbol: 'BTCUSD' });
    await vi.waitFor(() => expect(cache.pendingWaiters('BTCUSD')).toBe(1));

    await vi.advanceTimersByTimeAsync(10000);

    await assertion;
  });

  it('未対応の銘柄は unsupported で、保持しない', async () => {
    pool.acquire.mockRejectedValueOnce(new UnsupportedSymbolError('EURUSD'));

    await expect(usecase.execute('EURUSD')).resolves.toEqual({ status: 'unsupported', symbol: 'EURUSD' });
    expect(usecase.heldSymbols).toEqual([]);
  });

  it('接続失敗はそのまま投げ、次のリクエストで再度 acquire する', async () => {
    pool.acquire.mockRejectedValueOnce(new ConnectFailureError('BTCUSD'));

    await expect(usecase.execute('BTCUSD')).rejects.toBeInstanceOf(ConnectFailureError);

    const pending = usecase.execute('BTCUSD');
    await vi.waitFor(() => expect(pool.acquire).toHaveBeenCalledTimes(2));
    cache.onTick(createPriceTick('BTCUSD', '1', 1));
    await expect(pending).resolves.toMatchObject({ status: 'ok' });
  });

  it('空の銘柄コードは InvalidSymbolError', async () => {
    await expect(usecase.execute('  ')).rejects.toBeInstanceOf(InvalidSymbolError);
  });

  it('AbortSignal で中断すると PriceWaitAbortedError', async () => {
    const controller = new AbortController();
    const pending = usecase.execute('BTCUSD', controller.signal);
    const assertion = expect(pending).rejects.toBeInstanceOf(PriceWaitAbortedError);
    await vi.waitFor(() => expect(pool.acquire).toHaveBeenCalled());

    controller.abort();

    await assertion;
  });

  it('同じ銘柄の同時リクエストでも acquire は 1 回だけ', async () => {
    const first = usecase.execute('BTCUSD');
    const second = usecase.execute('BTCUSD');
    await vi.waitFor(() => expect(cache.pendingWaiters('BTCUSD')).toBe(2));

    cache.onTick(createPriceTick('BTCUSD', '5', 5));
    await Promise.all([first, second]);

    expect(pool.acquire).toHaveBeenCalledTimes(1);
  });

  it('dispose() で保持している銘柄をすべて release する', async () => {
    const pending = usecase.execute('BTCUSD');
    await vi.waitFor(() => expect(pool.acquire).toHaveBeenCalled());
    cache.onTick(createPriceTick('BTCUSD', '5', 5));
    await pending;

    await usecase.dispose();

    expect(pool.release).toHaveBeenCalledTimes(1);
    expect(pool.release).toHaveBeenCalledWith('BTCUSD');
    expect(usecase.heldSymbols).toEqual([]);
  });
});
