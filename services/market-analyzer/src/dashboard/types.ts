import type { AssetType } from '@trading-analytics/trading-utils';

/**
 * - ok: 최신 캔들 기준으로 계산됨
 * - no_data: 일봉 캔들이 하나도 없음
 * - error: 저장소 조회 실패 (다른 자산 결과는 유지)
 */
export type DataStatus = 'ok' | 'no_data' | 'error';

export interface AssetPerformance {
  asset_id: string;
  symbol: string;
  name: string;
  asset_type: AssetType;
  sector: string | null;
  industry: string | null;
  last_price: number | null;
  /** 기준(anchor) 캔들 시각 */
  last_updated: string | null;
  change_1d: number | null;
  change_1w: number | null;
  change_1m: number | null;
  change_1y: number | null;
  sparkline: number[];
  ma_200: number | null;
  data_status: DataStatus;
}

export interface WatchlistInfo {
  id: string;
  name: string;
  description: string | null;
  item_count: number;
}

export interface WatchlistDashboard {
  watchlist: WatchlistInfo | null;
  assets: AssetPerformance[];
  /** 평균(현재가 / MA200) × 100 */
  index: number | null;
  generated_at: string;
}
