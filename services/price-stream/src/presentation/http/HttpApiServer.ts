import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { GetCurrentPriceResult, GetCurrentPriceUsecase } from '@/application/usecases/GetCurrentPriceUsecase';
import type { GetInstrumentsUsecase } from '@/application/usecases/GetInstrumentsUsecase';
import { InvalidSymbolError } from '@/domain/errors/PriceStreamError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface HttpApiResponse {
  statusCode: number;
  contentType: string;
  body: string;
}

/**
 * /health で返す稼働状況の取得元。
 */
export interface HealthSource {
  activeConnectors(): number;
  subscriptionStats(): { subscribers: number; symbols: number; subscriptions: number };
}

export interface HttpApiServerDeps {
  getCurrentPrice: GetCurrentPriceUsecase;
  getInstruments: GetInstrumentsUsecase;
  metricsCollector: MetricsCollector;
  health: HealthSource;
  logger?: Logger;
}

function json(statusCode: number, payload: unknown): HttpApiResponse {
  return { statusCode, contentType: 'application/json', body: JSON.stringify(payload) };
}

function error(statusCode: number, code: string, message: string): HttpApiResponse {
  return json(statusCode, { error: { code, message } });
}

/**
 * プレゼンテーション層: HTTP API サーバー
 *
 * エンドポイント:
 * - GET /api/prices?symbol=X  現在価格（キャッシュミス時は初回ティックを待つ）
 * - GET /api/instruments      銘柄一覧
 * - GET /health               稼働状況
 * - GET /metrics              Prometheus 形式のメトリクス
 *
 * PriceHub は同じ http.Server で WebSocket のアップグレードを受ける。
 */
export class HttpApiServer {
  readonly server: Server;
  private readonly logger: Logger;

  constructor(private readonly deps: HttpApiServerDeps) {
    this.logger = (deps.logger ?? LoggerFactory.create()).child({ component: 'HttpApiServer' });
    this.server = createServer((req, res) => {
      void this.handle(req, res);
    });
  }

  /**
   * 指定ポートで待ち受けを開始する。
   * @returns 実際に割り当てられたポート（0 を渡した場合に使う）
   */
  async start(port: number): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    const address = this.server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    this.logger.info('HTTP server started', { port: boundPort });
    return boundPort;
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeIdleConnections();
    });
    this.logger.info('HTTP server stopped');
  }

  /**
   * メソッドとパスからレスポンスを組み立てる。
   * @param signal クライアント切断時に中断される
   */
  async route(method: string, rawUrl: string, signal?: AbortSignal): Promise<HttpApiResponse> {
    if (method !== 'GET') {
      return error(405, 'METHOD_NOT_ALLOWED', `${method} is not allowed`);
    }

    const url = new URL(rawUrl, 'http://localhost');
    switch (url.pathname) {
      case '/api/prices':
        return this.getPrice(url.searchParams.get('symbol'), signal);
      case '/api/instruments':
        return json(200, this.deps.getInstruments.execute());
      case '/health':
        return json(200, {
          status: 'ok',
          connectors: this.deps.health.activeConnectors(),
          subscribers: this.deps.health.subscriptionStats(),
        });
      case '/metrics': {
        const metrics = await this.deps.metricsCollector.getMetrics();
        return {
          statusCode: 200,
          contentType: this.deps.metricsCollector.getRegistry().contentType,
          body: metrics,
        };
      }
      default:
        return error(404, 'NOT_FOUND', 'unknown path');
    }
  }

  private async getPrice(symbol: string | null, signal?: AbortSignal): Promise<HttpApiResponse> {
    if (symbol === null || symbol.trim() === '') {
      return error(400, 'MISSING_SYMBOL', 'query parameter "symbol" is required');
    }

    let result: GetCurrentPriceResult;
    try {
      result = await this.deps.getCurrentPrice.execute(symbol, signal);
    } catch (err) {
      if (err instanceof InvalidSymbolError) {
        return error(400, err.code, err.message);
      }
      throw err;
    }

    switch (result.status) {
      case 'ok':
        return json(200, result.price);
      case 'not_found':
        return error(404, 'PRICE_NOT_FOUND', `No price available for ${result.symbol}`);
      case 'unsupported':
        return error(422, 'UNSUPPORTED_SYMBOL', `Symbol ${result.symbol} is not supported`);
    }
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    let response: HttpApiResponse;
    try {
      response = await this.route(req.method ?? 'GET', req.url ?? '/', controller.signal);
    } catch (err) {
      if (controller.signal.aborted) {
        this.logger.debug('Request aborted by client', { url: req.url });
        return;
      }
      this.logger.error('Request failed', { url: req.url, err });
      response = error(500, 'INTERNAL', 'unexpected error');
    }

    if (res.writableEnded || res.destroyed) {
      return;
    }
    res.statusCode = response.statusCode;
    res.setHeader('Content-Type', response.contentType);
    res.end(response.body);
  }
}
