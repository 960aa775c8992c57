import type { ConnectionPool } from '@/application/interfaces/ConnectionPool';
import type { Logger } from '@/application/interfaces/Logger';
import type { PriceCache } from '@/application/services/PriceCache';
import { PriceTimeoutError, UnsupportedSymbolError } from '@/domain/errors/PriceStreamError';
import { normalizeSymbol } from '@/domain/models/InstrumentSymbol';
import type { PriceTick } from '@/domain/models/PriceTick';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export type GetCurrentPriceResult =
  | { status: 'ok'; price: PriceTick }
  | { status: 'not_found'; symbol: string }
  | { status: 'unsupported'; symbol: string };

export interface GetCurrentPriceUsecaseOptions {
  /** キャッシュミス時に初回ティックを待つ上限（ミリ秒） */
  coldReadTimeoutMs: number;
  logger?: Logger;
}

/**
 * アプリケーション層: 現在価格の取得ユースケース（REST のコールドリード）
 *
 * キャッシュにあれば即座に返す。なければ上流を確保して初回ティックを待つ。
 * 確保した銘柄はユースケースの寿命の間保持し、dispose() でまとめて解放する。
 */
export class GetCurrentPriceUsecase {
  private readonly held = new Map<string, Promise<void>>();
  private readonly logger: Logger;

  constructor(
    private readonly cache: PriceCache,
    private readonly pool: ConnectionPool,
    private readonly options: GetCurrentPriceUsecaseOptions
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'GetCurrentPriceUsecase' });
  }

  async execute(rawSymbol: string, signal?: AbortSignal): Promise<GetCurrentPriceResult> {
    // 1. 正規化してキャッシュを確認
    const symbol = normalizeSymbol(rawSymbol);
    const cached = this.cache.get(symbol);
    if (cached) {
      return { status: 'ok', price: cached };
    }

    try {
      // 2. 上流を確保（銘柄ごとに 1 回だけ）
      await this.hold(symbol);

      // 3. 初回ティックを待つ
      const price = await this.cache.awaitNext(symbol, this.options.coldReadTimeoutMs, signal);
      return { status: 'ok', price };
    } catch (error) {
      if (error instanceof UnsupportedSymbolError) {
        return { status: 'unsupported', symbol };
      }
      if (error instanceof PriceTimeoutError) {
        return { status: 'not_found', symbol };
      }
      throw error;
    }
  }

  /**
   * 保持しているすべての銘柄を解放する。
   */
  async dispose(): Promise<void> {
    const entries = [...this.held.entries()];
    this.held.clear();

    await Promise.all(
      entries.map(async ([symbol, acquisition]) => {
        try {
          await acquisition;
        } catch {
          // 確保に失敗した銘柄は解放しない
          return;
        }
        await this.pool.release(symbol);
      })
    );
    this.logger.info('Released cold-read symbols', { symbols: entries.map(([symbol]) => symbol) });
  }

  get heldSymbols(): string[] {
    return [...this.held.keys()];
  }

  private hold(symbol: string): Promise<void> {
    const existing = this.held.get(symbol);
    if (existing) {
      return existing;
    }

    const acquisition = this.pool.acquire(symbol).catch((error: unknown) => {
      // 失敗した確保は保持しない（次のリクエストで再試行する）
      if (this.held.get(symbol) === acquisition) {
        this.held.delete(symbol);
      }
      throw error;
    });
    this.held.set(symbol, acquisition);
    return acquisition;
  }
}
