import type { CandleInterval } from '@trading-analytics/trading-utils';
import type {
  AssetRecord,
  CandleQuery,
  CandleRecord,
  IndicatorFilter,
  IndicatorSnapshot,
  NewIndicatorSnapshot,
  NewSignal,
  SignalFilter,
  SignalRecord,
  WatchlistCounts,
  WatchlistRecord,
} from './types.js';

export interface CandleStore {
  /** ts 오름차순 */
  getCandles(assetId: string, interval: CandleInterval, query?: CandleQuery): Promise<CandleRecord[]>;
}

export interface IndicatorStore {
  /**
   * 스냅샷 추가. (asset_id, name, ts) 가 이미 있는 행은 수정하지 않는다.
   * @returns 새로 추가된 행만
   */
  putIndicators(snapshots: NewIndicatorSnapshot[]): Promise<IndicatorSnapshot[]>;
  getIndicatorsSince(assetId: string, since: string): Promise<IndicatorSnapshot[]>;
  listIndicators(filter: IndicatorFilter): Promise<IndicatorSnapshot[]>;
}

export interface SignalStore {
  /**
   * 자산의 활성 시그널을 모두 비활성화하고 새 시그널을 활성 상태로 저장한다.
   * 두 단계는 하나의 원자적 작업이어야 한다.
   */
  supersede(signal: NewSignal): Promise<SignalRecord>;
  /** @returns 실제로 비활성화된 건수 */
  deactivate(ids: string[]): Promise<number>;
  /** expires_at <= now 인 활성 시그널을 한 번에 비활성화 */
  deactivateExpired(now: string): Promise<number>;
  getActiveSignal(assetId: string): Promise<SignalRecord | null>;
  /** ts 내림차순 */
  listSignals(filter: SignalFilter): Promise<SignalRecord[]>;
}

export interface AssetStore {
  getAsset(assetId: string): Promise<AssetRecord | null>;
  listActiveAssets(): Promise<AssetRecord[]>;
}

export interface WatchlistStore {
  getWatchlist(watchlistId: string): Promise<WatchlistRecord | null>;
  /** is_default 우선, 없으면 가장 먼저 만든 워치리스트 */
  getDefaultWatchlist(userId: string): Promise<WatchlistRecord | null>;
  countWatchlists(userId: string): Promise<WatchlistCounts>;
}

/**
 * 분석 파이프라인이 사용하는 저장소 핸들
 * - init() 이후에만 사용한다.
 */
export interface MarketDataStore {
  readonly kind: 'supabase' | 'memory';
  candles: CandleStore;
  indicators: IndicatorStore;
  signals: SignalStore;
  assets: AssetStore;
  watchlists: WatchlistStore;
  init(): Promise<void>;
}
