import 'dotenv/config';
import process from 'node:process';
import type { FeedConnectorFactory } from '@/application/interfaces/FeedConnector';
import { BroadcastDispatcher } from '@/application/services/BroadcastDispatcher';
import { FeedConnectionPool } from '@/application/services/FeedConnectionPool';
import { PriceCache } from '@/application/services/PriceCache';
import { SubscriptionRegistry } from '@/application/services/SubscriptionRegistry';
import { TickBus } from '@/application/services/TickBus';
import { GetCurrentPriceUsecase } from '@/application/usecases/GetCurrentPriceUsecase';
import { GetInstrumentsUsecase } from '@/application/usecases/GetInstrumentsUsecase';
import { BinanceFeedAdapter } from '@/infra/adapters/binance/BinanceFeedAdapter';
import { FeedAdapterRegistry } from '@/infra/adapters/FeedAdapterRegistry';
import { loadConfig } from '@/infra/config/AppConfig';
import { UpstreamFeedConnector } from '@/infra/feed/UpstreamFeedConnector';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { InMemoryInstrumentRepository } from '@/infra/repositories/InMemoryInstrumentRepository';
import { HttpApiServer } from '@/presentation/http/HttpApiServer';
import { PriceHub } from '@/presentation/websocket/PriceHub';

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と配線
 * - シグナルハンドリングとグレースフルシャットダウン
 *
 * 注意: 購読や配信のロジックは main.ts に置かず、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  // 不正な設定はここで落とす
  const config = loadConfig();
  const logger = LoggerFactory.create();
  const metricsCollector = new PrometheusMetricsCollector();

  // インフラ層: アダプタとコネクタの生成方法
  const adapters = new FeedAdapterRegistry([new BinanceFeedAdapter({ url: config.feedUrl })]);
  const createConnector: FeedConnectorFactory = (symbol, adapter, publish) =>
    new UpstreamFeedConnector(symbol, adapter, publish, {
      retryPolicy: config.retryPolicy,
      logger,
      metricsCollector,
    });

  // アプリケーション層: ティックの流れ（コネクタ → TickBus → キャッシュ / ディスパッチャ）
  const tickBus = new TickBus(logger);
  const cache = new PriceCache(logger);
  tickBus.subscribe((tick) => cache.onTick(tick));

  const pool = new FeedConnectionPool(adapters, createConnector, tickBus, { logger, metricsCollector });
  const registry = new SubscriptionRegistry(pool, { logger, metricsCollector });
  const dispatcher = new BroadcastDispatcher(tickBus, registry, { logger, metricsCollector });
  dispatcher.start();

  const getCurrentPrice = new GetCurrentPriceUsecase(cache, pool, {
    coldReadTimeoutMs: config.coldReadTimeoutMs,
    logger,
  });
  const getInstruments = new GetInstrumentsUsecase(new InMemoryInstrumentRepository());

  // プレゼンテーション層: HTTP API と WebSocket ハブは同じサーバーを共有する
  const httpApi = new HttpApiServer({
    getCurrentPrice,
    getInstruments,
    metricsCollector,
    health: {
      activeConnectors: () => pool.activeSymbols().length,
      subscriptionStats: () => registry.stats(),
    },
    logger,
  });
  const hub = new PriceHub(registry, dispatcher, { logger });
  hub.attach(httpApi.server);
  await httpApi.start(config.port);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down price-stream...', { signal });
    try {
      await hub.stop();
      await httpApi.stop();
      dispatcher.stop();
      await getCurrentPrice.dispose();
      await pool.close();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { err: error });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap price-stream', { err: error });
  process.exit(1);
});
