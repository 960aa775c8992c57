import type { FeedAdapter, FeedFrame } from '@/application/interfaces/FeedAdapter';
import { UnsupportedSymbolError } from '@/domain/errors/PriceStreamError';
import { createPriceTick } from '@/domain/models/PriceTick';
import type { BinanceCommand } from './messages/BinanceCommand';

export const BINANCE_STREAM_URL = 'wss://stream.binance.com:443/stream';

/**
 * 自システムの銘柄コード → Binance の銘柄（小文字）
 */
export const DEFAULT_BINANCE_SYMBOLS: Readonly<Record<string, string>> = {
  BTCUSD: 'btcusdt',
};

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

export interface BinanceFeedAdapterOptions {
  url?: string;
  symbolMap?: Readonly<Record<string, string>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * インフラ層: Binance aggTrade ストリームのアダプタ
 *
 * 責務: 銘柄マッピング、SUBSCRIBE/UNSUBSCRIBE コマンドの組み立て、
 * 受信フレーム（combined 形式と生の aggTrade 形式の両方）から PriceTick への変換。
 */
export class BinanceFeedAdapter implements FeedAdapter {
  readonly name = 'binance';
  readonly url: string;
  private readonly toVendor = new Map<string, string>();
  private readonly fromVendor = new Map<string, string>();
  private requestId = 0;

  constructor(options?: BinanceFeedAdapterOptions) {
    this.url = options?.url ?? BINANCE_STREAM_URL;
    for (const [symbol, vendor] of Object.entries(options?.symbolMap ?? DEFAULT_BINANCE_SYMBOLS)) {
      this.toVendor.set(symbol.toUpperCase(), vendor.toLowerCase());
      this.fromVendor.set(vendor.toLowerCase(), symbol.toUpperCase());
    }
  }

  supports(symbol: string): boolean {
    return this.toVendor.has(symbol.toUpperCase());
  }

  toVendorSymbol(symbol: string): string {
    const vendor = this.toVendor.get(symbol.toUpperCase());
    if (!vendor) {
      throw new UnsupportedSymbolError(symbol);
    }
    return vendor;
  }

  subscribeFrame(vendorSymbol: string): string {
    return this.command('SUBSCRIBE', vendorSymbol);
  }

  unsubscribeFrame(vendorSymbol: string): string {
    return this.command('UNSUBSCRIBE', vendorSymbol);
  }

  parse(data: string): FeedFrame {
    let message: unknown;
    try {
      message = JSON.parse(data);
    } catch {
      return { kind: 'ignored', reason: 'invalid json' };
    }

    if (!isRecord(message)) {
      return { kind: 'ignored', reason: 'not an object' };
    }

    // SUBSCRIBE への応答: {"result":null,"id":1}
    if ('result' in message || 'id' in message) {
      return { kind: 'ack', raw: message };
    }

    // combined 形式: {"stream":"btcusdt@aggTrade","data":{...}}
    if (typeof message.stream === 'string' && isRecord(message.data)) {
      const vendorSymbol = message.stream.split('@')[0] ?? '';
      return this.toTickFrame(vendorSymbol, message.data);
    }

    // 生の aggTrade 形式: {"e":"aggTrade","s":"BTCUSDT","p":"...","E":...}
    if (typeof message.s === 'string' && 'p' in message && 'E' in message) {
      return this.toTickFrame(message.s, message);
    }

    return { kind: 'ignored', reason: 'unrecognized frame' };
  }

  private toTickFrame(vendorSymbol: string, data: Record<string, unknown>): FeedFrame {
    const symbol = this.fromVendor.get(vendorSymbol.toLowerCase());
    if (!symbol) {
      return { kind: 'ignored', reason: `unknown vendor symbol: ${vendorSymbol}` };
    }

    const price = data.p;
    if (typeof price !== 'string' || !DECIMAL_PATTERN.test(price)) {
      return { kind: 'ignored', reason: 'malformed price' };
    }

    const eventTime = data.E;
    if (typeof eventTime !== 'number' || !Number.isFinite(eventTime)) {
      return { kind: 'ignored', reason: 'malformed event time' };
    }

    return { kind: 'tick', tick: createPriceTick(symbol, price, eventTime) };
  }

  private command(method: BinanceCommand['method'], vendorSymbol: string): string {
    this.requestId += 1;
    const command: BinanceCommand = {
      method,
      params: [`${vendorSymbol}@aggTrade`],
      id: this.requestId,
    };
    return JSON.stringify(command);
  }
}
