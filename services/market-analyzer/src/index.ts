import '@trading-analytics/shared-utils/env-loader';
import { createLogger } from '@trading-analytics/shared-utils';
import { loadAnalyzerConfig } from './config/env.js';
import { createJobScheduler } from './scheduler.js';
import { createMarketAnalyzer } from './service.js';
import { createStore } from './store.js';
import { toJsonSafe } from './utils/json.js';

const logger = createLogger('market-analyzer');

const MINUTE_MS = 60_000;

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

async function main(): Promise<void> {
  const config = loadAnalyzerConfig();
  const store = createStore(config);
  await store.init();

  const analyzer = createMarketAnalyzer(store, config);

  // --dashboard <watchlistId>: 대시보드 JSON 한 번 출력
  const watchlistId = readFlag(process.argv.slice(2), '--dashboard');
  if (watchlistId) {
    const dashboard = await analyzer.getWatchlistDashboard(watchlistId);
    console.log(JSON.stringify(toJsonSafe(dashboard), null, 2));
    return;
  }

  logger.info('market-analyzer 시작', {
    store: config.store,
    loopMode: config.loopMode,
    lookbackDays: config.indicatorLookbackDays,
    signalTtlHours: config.signalTtlHours,
  });

  const scheduler = createJobScheduler(logger);

  // 시작 시 1회: 만료 정리 → 지표 → 시그널
  await scheduler.run('expiry-sweep', () => analyzer.deactivateExpiredSignals());
  await scheduler.run('indicators', () => analyzer.computeIndicators());
  await scheduler.run('signals', () => analyzer.computeSignals());

  if (!config.loopMode) return;

  scheduler.every('expiry-sweep', config.expirySweepIntervalMin * MINUTE_MS, () =>
    analyzer.deactivateExpiredSignals(),
  );
  scheduler.every('indicators', config.indicatorIntervalMin * MINUTE_MS, () => analyzer.computeIndicators());
  scheduler.every('signals', config.signalIntervalMin * MINUTE_MS, () => analyzer.computeSignals());

  const shutdown = () => {
    logger.info('종료 시그널 수신, 루프 중지');
    scheduler.stop();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((e: unknown) => {
  logger.error('market-analyzer 치명적 오류', e);
  process.exit(1);
});
