import Big from 'big.js';
import type { AssetRecord, CandleStore, MarketDataStore, WatchlistRecord } from '@trading-analytics/db-client';
import { createLogger, isoDaysBefore, nowIso } from '@trading-analytics/shared-utils';
import {
  calculateCloseAverage,
  calculatePercentChange,
  calculateWatchlistIndex,
  roundTo,
  selectSparkline,
} from '@trading-analytics/trading-utils';
import { toCandle } from '../utils/candles.js';
import type { AssetPerformance, DataStatus, WatchlistDashboard } from './types.js';

const logger = createLogger('market-analyzer');

const MA_PERIOD = 200;
const SPARKLINE_DAYS = 30;

const HORIZONS = [
  { key: 'change_1d', days: 1 },
  { key: 'change_1w', days: 7 },
  { key: 'change_1m', days: 30 },
  { key: 'change_1y', days: 365 },
] as const;

type ChangeKey = (typeof HORIZONS)[number]['key'];

interface AssetEvaluation {
  record: AssetPerformance;
  /** 현재가 / MA200 (MA200 이 양수일 때만) */
  ratio: Big | null;
}

function emptyRecord(asset: AssetRecord, status: DataStatus): AssetPerformance {
  return {
    asset_id: asset.id,
    symbol: asset.symbol,
    name: asset.name,
    asset_type: asset.asset_type,
    sector: asset.sector,
    industry: asset.industry,
    last_price: null,
    last_updated: null,
    change_1d: null,
    change_1w: null,
    change_1m: null,
    change_1y: null,
    sparkline: [],
    ma_200: null,
    data_status: status,
  };
}

/**
 * t 이하의 가장 최근 일봉 종가 (없으면 null)
 */
async function priceAtOrBefore(candles: CandleStore, assetId: string, t: string): Promise<number | null> {
  const [row] = await candles.getCandles(assetId, '1d', { until: t, limit: 1 });
  return row ? row.close : null;
}

/**
 * 자산 1건 성과
 * - 기준 시각은 벽시계가 아니라 자산의 최신 캔들 시각(T0)
 */
export async function evaluateAssetPerformance(
  store: MarketDataStore,
  asset: AssetRecord,
): Promise<AssetEvaluation> {
  const [latest] = await store.candles.getCandles(asset.id, '1d', { limit: 1 });
  if (!latest) return { record: emptyRecord(asset, 'no_data'), ratio: null };

  const anchor = latest.ts;
  const current = latest.close;

  const changes: Partial<Record<ChangeKey, number | null>> = {};
  for (const horizon of HORIZONS) {
    const previous = await priceAtOrBefore(store.candles, asset.id, isoDaysBefore(anchor, horizon.days));
    changes[horizon.key] = calculatePercentChange(current, previous);
  }

  const history = (await store.candles.getCandles(asset.id, '1d', { until: anchor, limit: MA_PERIOD })).map(toCandle);
  const ma200 = calculateCloseAverage(history, MA_PERIOD);

  return {
    record: {
      ...emptyRecord(asset, 'ok'),
      last_price: roundTo(new Big(current)),
      last_updated: anchor,
      change_1d: changes.change_1d ?? null,
      change_1w: changes.change_1w ?? null,
      change_1m: changes.change_1m ?? null,
      change_1y: changes.change_1y ?? null,
      sparkline: selectSparkline(history, anchor, SPARKLINE_DAYS),
      ma_200: ma200 ? roundTo(ma200) : null,
    },
    ratio: ma200 && ma200.gt(0) ? new Big(current).div(ma200) : null,
  };
}

/**
 * 워치리스트 대시보드
 * - 자산별 실패/데이터 없음은 해당 레코드 상태로만 표시하고 나머지 결과는 유지
 * - 읽기 전용, 공유 상태 없음
 */
export async function getWatchlistDashboard(
  store: MarketDataStore,
  watchlist: WatchlistRecord,
  options: { now?: string } = {},
): Promise<WatchlistDashboard> {
  const evaluations = await Promise.all(
    watchlist.assets.map(async (asset): Promise<AssetEvaluation> => {
      try {
        return await evaluateAssetPerformance(store, asset);
      } catch (error: unknown) {
        logger.error('자산 성과 계산 실패', { symbol: asset.symbol, error });
        return { record: emptyRecord(asset, 'error'), ratio: null };
      }
    }),
  );

  const ratios = evaluations.flatMap((e) => (e.ratio ? [e.ratio] : []));

  return {
    watchlist: {
      id: watchlist.id,
      name: watchlist.name,
      description: watchlist.description,
      item_count: watchlist.assets.length,
    },
    assets: evaluations.map((e) => e.record),
    index: calculateWatchlistIndex(ratios),
    generated_at: options.now ?? nowIso(),
  };
}
