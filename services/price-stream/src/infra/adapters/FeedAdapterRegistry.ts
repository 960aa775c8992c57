import type { FeedAdapter, FeedAdapterResolver } from '@/application/interfaces/FeedAdapter';
import { UnsupportedSymbolError } from '@/domain/errors/PriceStreamError';

/**
 * 利用可能なフィードアダプタの一覧。銘柄ごとに最初に対応したアダプタを返す。
 */
export class FeedAdapterRegistry implements FeedAdapterResolver {
  constructor(private readonly adapters: readonly FeedAdapter[]) {}

  resolve(symbol: string): FeedAdapter {
    const adapter = this.adapters.find((candidate) => candidate.supports(symbol));
    if (!adapter) {
      throw new UnsupportedSymbolError(symbol);
    }
    return adapter;
  }
}
