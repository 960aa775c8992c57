/**
 * ドメインエラーの種別。
 * 呼び出し側は code か instanceof で分岐できる。
 */
export enum PriceStreamErrorCode {
  /** アダプタに対応する銘柄マッピングがない（恒久的、再試行しない） */
  UNSUPPORTED_SYMBOL = 'UNSUPPORTED_SYMBOL',
  /** 銘柄コードが空 */
  INVALID_SYMBOL = 'INVALID_SYMBOL',
  /** 上流への接続確立に失敗した */
  CONNECT_FAILURE = 'CONNECT_FAILURE',
  /** 未接続の状態で送信しようとした */
  CONNECTION_UNAVAILABLE = 'CONNECTION_UNAVAILABLE',
  /** 待機時間内にティックが届かなかった */
  TIMEOUT = 'TIMEOUT',
  /** 呼び出し側の AbortSignal で待機が中断された */
  ABORTED = 'ABORTED',
}

/**
 * price-stream のドメインエラー基底クラス。
 */
export class PriceStreamError extends Error {
  constructor(
    message: string,
    public readonly code: PriceStreamErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PriceStreamError';
  }
}

export class UnsupportedSymbolError extends PriceStreamError {
  constructor(public readonly symbol: string) {
    super(`Symbol ${symbol} is not supported`, PriceStreamErrorCode.UNSUPPORTED_SYMBOL);
    this.name = 'UnsupportedSymbolError';
  }
}

export class InvalidSymbolError extends PriceStreamError {
  constructor(public readonly symbol: string) {
    super(`Invalid symbol: "${symbol}"`, PriceStreamErrorCode.INVALID_SYMBOL);
    this.name = 'InvalidSymbolError';
  }
}

export class ConnectFailureError extends PriceStreamError {
  constructor(
    public readonly symbol: string,
    cause?: unknown
  ) {
    super(`Failed to connect upstream feed for ${symbol}`, PriceStreamErrorCode.CONNECT_FAILURE, { cause });
    this.name = 'ConnectFailureError';
  }
}

export class ConnectionUnavailableError extends PriceStreamError {
  constructor(public readonly symbol: string) {
    super(`Upstream connection for ${symbol} is not available`, PriceStreamErrorCode.CONNECTION_UNAVAILABLE);
    this.name = 'ConnectionUnavailableError';
  }
}

export class PriceTimeoutError extends PriceStreamError {
  constructor(
    public readonly symbol: string,
    public readonly timeoutMs: number
  ) {
    super(`No price for ${symbol} within ${timeoutMs}ms`, PriceStreamErrorCode.TIMEOUT);
    this.name = 'PriceTimeoutError';
  }
}

export class PriceWaitAbortedError extends PriceStreamError {
  constructor(public readonly symbol: string) {
    super(`Waiting for ${symbol} was aborted`, PriceStreamErrorCode.ABORTED);
    this.name = 'PriceWaitAbortedError';
  }
}
