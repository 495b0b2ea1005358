import type {
  AssetType,
  CandleInterval,
  IndicatorType,
  SignalStrength,
  SignalType,
} from '@trading-analytics/trading-utils';

/**
 * OHLCV 캔들 (candles 테이블)
 * - (asset_id, interval, ts) 유일
 */
export interface CandleRecord {
  asset_id: string;
  interval: CandleInterval;
  ts: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  trades: number | null;
  vwap: number | null;
}

export interface NewIndicatorSnapshot {
  asset_id: string;
  ts: string;
  indicator_type: IndicatorType;
  name: string;
  primary_value: number | null;
  secondary_value: number | null;
  tertiary_value: number | null;
  parameters: Record<string, number>;
  timeframe: CandleInterval;
}

/**
 * 지표 스냅샷 (technical_indicators 테이블)
 */
export interface IndicatorSnapshot extends NewIndicatorSnapshot {
  id: string;
  computed_at: string;
}

export interface NewSignal {
  asset_id: string;
  ts: string;
  signal_type: SignalType;
  strength: SignalStrength;
  confidence: number;
  price: number | null;
  strategy: string;
  rationale: string;
  indicators_used: string[];
  timeframe: CandleInterval;
  generated_at: string;
  expires_at: string | null;
}

/**
 * 트레이딩 시그널 (signals 테이블)
 * - 자산당 is_active=true 는 최대 1건
 */
export interface SignalRecord extends NewSignal {
  id: string;
  is_active: boolean;
}

export interface AssetRecord {
  id: string;
  symbol: string;
  name: string;
  asset_type: AssetType;
  sector: string | null;
  industry: string | null;
  is_active: boolean;
}

/**
 * 워치리스트 + position 순으로 정렬된 자산 목록
 */
export interface WatchlistRecord {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  is_default: boolean;
  assets: AssetRecord[];
}

export interface CandleQuery {
  /** ts >= since */
  since?: string;
  /** ts <= until */
  until?: string;
  /** 조건에 맞는 최신 N개 (결과는 여전히 오름차순) */
  limit?: number;
}

export interface IndicatorFilter {
  assetId: string;
  name?: string;
  indicatorType?: IndicatorType;
  start?: string;
  end?: string;
  limit?: number;
}

export interface SignalFilter {
  assetIds?: string[];
  signalType?: SignalType;
  isActive?: boolean;
  start?: string;
  end?: string;
  limit?: number;
}

export interface WatchlistCounts {
  watchlists: number;
  items: number;
}
