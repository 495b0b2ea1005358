import type Big from 'big.js';
import type { CandleRecord, MarketDataStore, NewIndicatorSnapshot } from '@trading-analytics/db-client';
import { createLogger, InsufficientDataError, isoDaysBefore, nowIso } from '@trading-analytics/shared-utils';
import {
  calculateATR,
  calculateBollingerBands,
  calculateMA,
  calculateMACD,
  calculateOBV,
  calculateRSI,
  INDICATOR_CATALOG,
  INDICATOR_NAMES,
  type Candle,
  type IndicatorName,
} from '@trading-analytics/trading-utils';
import { toCandle } from '../utils/candles.js';
import { resolveTargetAssets } from './targets.js';
import { createBatchResult, toBatchError, type BatchResult } from './types.js';

const logger = createLogger('market-analyzer');

export const DEFAULT_LOOKBACK_DAYS = 100;
/** 이보다 캔들이 적은 자산은 지표 계산을 건너뛴다 */
export const MIN_CANDLES = 20;

export interface ComputeIndicatorsOptions {
  assetId?: string;
  lookbackDays?: number;
  now?: string;
}

interface IndicatorValues {
  primary: Big | null;
  secondary?: Big;
  tertiary?: Big;
}

const COMPUTERS: Record<IndicatorName, (candles: Candle[]) => IndicatorValues> = {
  SMA_20: (candles) => ({ primary: calculateMA(candles, 20, 'SMA') }),
  SMA_50: (candles) => ({ primary: calculateMA(candles, 50, 'SMA') }),
  EMA_20: (candles) => ({ primary: calculateMA(candles, 20, 'EMA') }),
  EMA_50: (candles) => ({ primary: calculateMA(candles, 50, 'EMA') }),
  RSI_14: (candles) => ({ primary: calculateRSI(candles, 14).value }),
  MACD_12_26_9: (candles) => {
    const macd = calculateMACD(candles, 12, 26, 9);
    return { primary: macd.macd, secondary: macd.signal, tertiary: macd.histogram };
  },
  BBANDS_20_2: (candles) => {
    const bands = calculateBollingerBands(candles, 20, 2);
    return { primary: bands.middle, secondary: bands.upper, tertiary: bands.lower };
  },
  ATR_14: (candles) => ({ primary: calculateATR(candles, 14).atr }),
  OBV: (candles) => ({ primary: calculateOBV(candles) }),
};

function finiteOrNull(value: Big | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const n = value.toNumber();
  return Number.isFinite(n) ? n : null;
}

/**
 * 캔들 윈도우 → 마지막 캔들 시각의 지표 스냅샷
 * - 기간이 부족하거나 값이 정의되지 않는 지표(RSI 평균손실 0 등)는 제외
 * - 그 외 예외는 호출자에게 전파 (자산 단위 실패)
 */
export function buildIndicatorSnapshots(assetId: string, records: CandleRecord[]): NewIndicatorSnapshot[] {
  const last = records[records.length - 1];
  if (!last) return [];

  const candles = records.map(toCandle);
  const snapshots: NewIndicatorSnapshot[] = [];

  for (const name of INDICATOR_NAMES) {
    let values: IndicatorValues;
    try {
      values = COMPUTERS[name](candles);
    } catch (error: unknown) {
      if (error instanceof InsufficientDataError) {
        logger.debug('지표 기간 부족', { asset_id: assetId, name, required: error.required, actual: error.actual });
        continue;
      }
      throw error;
    }

    const primary = finiteOrNull(values.primary);
    if (primary === null) continue;

    const definition = INDICATOR_CATALOG[name];
    snapshots.push({
      asset_id: assetId,
      ts: last.ts,
      indicator_type: definition.type,
      name,
      primary_value: primary,
      secondary_value: finiteOrNull(values.secondary),
      tertiary_value: finiteOrNull(values.tertiary),
      parameters: { ...definition.parameters },
      timeframe: '1d',
    });
  }

  return snapshots;
}

/**
 * 지표 배치
 * - 자산별 최근 lookbackDays 일 일봉 → 지표 계산 → 스냅샷 저장
 * - 자산 하나의 실패는 errors 에 남기고 다음 자산으로 진행
 */
export async function computeIndicators(
  store: MarketDataStore,
  options: ComputeIndicatorsOptions = {},
): Promise<BatchResult> {
  const now = options.now ?? nowIso();
  const lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
  const since = isoDaysBefore(now, lookbackDays);

  const result = createBatchResult();
  const assets = await resolveTargetAssets(store, options.assetId, result);

  logger.info('지표 계산 시작', { assets: assets.length, lookbackDays });

  for (const asset of assets) {
    try {
      const candles = await store.candles.getCandles(asset.id, '1d', { since, until: now });

      if (candles.length < MIN_CANDLES) {
        logger.info('캔들 부족으로 스킵', { symbol: asset.symbol, candles: candles.length, required: MIN_CANDLES });
        result.skipped++;
        continue;
      }

      const snapshots = buildIndicatorSnapshots(asset.id, candles);
      const saved = await store.indicators.putIndicators(snapshots);

      result.created += saved.length;
      result.processed++;
      logger.debug('지표 계산 완료', { symbol: asset.symbol, indicators: saved.length });
    } catch (error: unknown) {
      logger.error('지표 계산 실패', { symbol: asset.symbol, error });
      result.errors.push(toBatchError(asset, error));
    }
  }

  logger.info('지표 계산 종료', {
    processed: result.processed,
    created: result.created,
    skipped: result.skipped,
    errors: result.errors.length,
  });

  return result;
}
