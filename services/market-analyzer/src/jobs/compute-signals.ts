import type { AssetRecord, IndicatorSnapshot, MarketDataStore, NewSignal } from '@trading-analytics/db-client';
import {
  createLogger,
  isoDaysBefore,
  isoHoursAfter,
  keepLatestByKey,
  nowIso,
  toMillis,
} from '@trading-analytics/shared-utils';
import { scoreSignal, SIGNAL_STRATEGY, type IndicatorReadings } from '@trading-analytics/trading-utils';
import { resolveTargetAssets } from './targets.js';
import { createBatchResult, toBatchError, type BatchResult } from './types.js';

const logger = createLogger('market-analyzer');

export const DEFAULT_INDICATOR_MAX_AGE_DAYS = 2;

export interface ComputeSignalsOptions {
  assetId?: string;
  /** 이 기간보다 오래된 지표 스냅샷은 보지 않는다 */
  maxAgeDays?: number;
  /** 설정 시 expires_at = generated_at + ttlHours */
  ttlHours?: number | null;
  now?: string;
}

type AssetOutcome = 'no_indicators' | 'no_rules' | 'created';

/**
 * 이름별 최신 스냅샷 → 규칙 입력
 */
export function toReadings(latest: Iterable<IndicatorSnapshot>): IndicatorReadings {
  const readings: IndicatorReadings = {};
  for (const s of latest) {
    readings[s.name] = {
      name: s.name,
      primary: s.primary_value,
      secondary: s.secondary_value,
      tertiary: s.tertiary_value,
    };
  }
  return readings;
}

async function generateSignalForAsset(
  store: MarketDataStore,
  asset: AssetRecord,
  options: { since: string; now: string; ttlHours: number | null },
): Promise<AssetOutcome> {
  const snapshots = await store.indicators.getIndicatorsSince(asset.id, options.since);
  if (snapshots.length === 0) return 'no_indicators';

  const latest = [...keepLatestByKey(snapshots, (s) => s.name, (s) => toMillis(s.ts)).values()];
  const decision = scoreSignal(toReadings(latest));

  if (decision.indicatorsUsed.length === 0) return 'no_rules';

  // 참고한 지표 중 가장 최근 시각
  const signalTs = latest.reduce((a, b) => (toMillis(b.ts) > toMillis(a.ts) ? b : a)).ts;

  const [priceCandle] = await store.candles.getCandles(asset.id, '1d', { until: signalTs, limit: 1 });

  const signal: NewSignal = {
    asset_id: asset.id,
    ts: signalTs,
    signal_type: decision.signalType,
    strength: decision.strength,
    confidence: decision.confidence,
    price: priceCandle ? priceCandle.close : null,
    strategy: SIGNAL_STRATEGY,
    rationale: decision.rationale,
    indicators_used: decision.indicatorsUsed,
    timeframe: '1d',
    generated_at: options.now,
    expires_at: options.ttlHours === null ? null : isoHoursAfter(options.now, options.ttlHours),
  };

  const saved = await store.signals.supersede(signal);
  logger.info('시그널 생성', {
    symbol: asset.symbol,
    signal_type: saved.signal_type,
    confidence: saved.confidence,
    buyVotes: decision.buyVotes,
    sellVotes: decision.sellVotes,
  });

  return 'created';
}

/**
 * 시그널 배치
 * - 자산별 최근 지표(이름별 최신 1건)로 RSI / 이동평균 / MACD 투표
 * - 새 시그널 저장과 기존 활성 시그널 비활성화는 store.signals.supersede 한 번으로 처리
 */
export async function computeSignals(
  store: MarketDataStore,
  options: ComputeSignalsOptions = {},
): Promise<BatchResult> {
  const now = options.now ?? nowIso();
  const since = isoDaysBefore(now, options.maxAgeDays ?? DEFAULT_INDICATOR_MAX_AGE_DAYS);
  const ttlHours = options.ttlHours ?? null;

  const result = createBatchResult();
  const assets = await resolveTargetAssets(store, options.assetId, result);

  logger.info('시그널 계산 시작', { assets: assets.length, since });

  for (const asset of assets) {
    try {
      const outcome = await generateSignalForAsset(store, asset, { since, now, ttlHours });

      switch (outcome) {
        case 'no_indicators':
          logger.info('최근 지표 없음, 스킵', { symbol: asset.symbol });
          result.skipped++;
          break;
        case 'no_rules':
          result.processed++;
          break;
        case 'created':
          result.processed++;
          result.created++;
          break;
      }
    } catch (error: unknown) {
      logger.error('시그널 계산 실패', { symbol: asset.symbol, error });
      result.errors.push(toBatchError(asset, error));
    }
  }

  logger.info('시그널 계산 종료', {
    processed: result.processed,
    created: result.created,
    skipped: result.skipped,
    errors: result.errors.length,
  });

  return result;
}
