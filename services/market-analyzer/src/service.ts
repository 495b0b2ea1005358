import type {
  CandleRecord,
  IndicatorSnapshot,
  MarketDataStore,
  SignalRecord,
} from '@trading-analytics/db-client';
import { keepLatestByKey, NotFoundError, nowIso, toMillis } from '@trading-analytics/shared-utils';
import {
  INDICATOR_TYPES,
  parseCandleInterval,
  parseIndicatorType,
  parseSignalType,
  SIGNAL_STRENGTHS,
  SIGNAL_TYPES,
  toEnumEntries,
  type EnumEntry,
  type IndicatorType,
  type SignalStrength,
  type SignalType,
} from '@trading-analytics/trading-utils';
import { getAnalysisSummary, type AnalysisSummary } from './analysis/summary.js';
import type { AnalyzerConfig } from './config/env.js';
import type { WatchlistDashboard } from './dashboard/types.js';
import { getWatchlistDashboard } from './dashboard/watchlist-dashboard.js';
import { computeIndicators } from './jobs/compute-indicators.js';
import { computeSignals } from './jobs/compute-signals.js';
import { deactivateExpiredSignals, type ExpirySweepResult } from './jobs/deactivate-expired-signals.js';
import type { BatchResult } from './jobs/types.js';

export type AnalyzerJobConfig = Pick<
  AnalyzerConfig,
  'indicatorLookbackDays' | 'signalIndicatorMaxAgeDays' | 'signalTtlHours'
>;

/**
 * 외부 입력(HTTP 쿼리 등)에서 온 문자열 필터
 * - 열거형 토큰은 저장소 조회 전에 검증한다 (InvalidEnumError)
 */
export interface SignalQuery {
  assetId?: string;
  signalType?: string;
  isActive?: boolean;
  start?: string;
  end?: string;
  limit?: number;
}

export interface IndicatorQuery {
  assetId: string;
  name?: string;
  indicatorType?: string;
  start?: string;
  end?: string;
  limit?: number;
}

export interface CandleQueryInput {
  assetId: string;
  interval?: string;
  start?: string;
  end?: string;
  limit?: number;
}

export interface QuickStats {
  watchlist_count: number;
  asset_count: number;
  last_updated: string;
}

export interface SignalTypeListing {
  signal_types: EnumEntry<SignalType>[];
  signal_strengths: EnumEntry<SignalStrength>[];
}

export interface MarketAnalyzer {
  computeIndicators(options?: { assetId?: string; lookbackDays?: number }): Promise<BatchResult>;
  computeSignals(options?: { assetId?: string }): Promise<BatchResult>;
  deactivateExpiredSignals(): Promise<ExpirySweepResult>;
  getWatchlistDashboard(watchlistId: string): Promise<WatchlistDashboard>;
  getDefaultWatchlistDashboard(userId: string): Promise<WatchlistDashboard>;
  /** assetIds 를 생략하면 활성 시그널이 있는 모든 자산 */
  getLatestSignals(assetIds?: string[]): Promise<SignalRecord[]>;
  listSignals(query: SignalQuery): Promise<SignalRecord[]>;
  listIndicators(query: IndicatorQuery): Promise<IndicatorSnapshot[]>;
  getCandles(query: CandleQueryInput): Promise<CandleRecord[]>;
  getAnalysisSummary(assetId: string): Promise<AnalysisSummary>;
  listIndicatorTypes(): EnumEntry<IndicatorType>[];
  listSignalTypes(): SignalTypeListing;
  quickStats(userId: string): Promise<QuickStats>;
}

/**
 * 분석 코어의 조회/실행 진입점 (HTTP/CLI 계층이 사용)
 * - store.init() 이 끝난 저장소를 받는다.
 */
export function createMarketAnalyzer(store: MarketDataStore, config: AnalyzerJobConfig): MarketAnalyzer {
  return {
    computeIndicators(options = {}) {
      return computeIndicators(store, {
        assetId: options.assetId,
        lookbackDays: options.lookbackDays ?? config.indicatorLookbackDays,
      });
    },

    computeSignals(options = {}) {
      return computeSignals(store, {
        assetId: options.assetId,
        maxAgeDays: config.signalIndicatorMaxAgeDays,
        ttlHours: config.signalTtlHours,
      });
    },

    deactivateExpiredSignals() {
      return deactivateExpiredSignals(store);
    },

    async getWatchlistDashboard(watchlistId: string) {
      const watchlist = await store.watchlists.getWatchlist(watchlistId);
      if (!watchlist) throw new NotFoundError('Watchlist', watchlistId);
      return getWatchlistDashboard(store, watchlist);
    },

    async getDefaultWatchlistDashboard(userId: string) {
      const watchlist = await store.watchlists.getDefaultWatchlist(userId);
      if (!watchlist) {
        return { watchlist: null, assets: [], index: null, generated_at: nowIso() };
      }
      return getWatchlistDashboard(store, watchlist);
    },

    async getLatestSignals(assetIds?: string[]) {
      if (assetIds?.length === 0) return [];

      const active = await store.signals.listSignals({ assetIds, isActive: true });
      const latest = keepLatestByKey(active, (s) => s.asset_id, (s) => toMillis(s.ts));

      // 전체 조회는 ts 내림차순
      if (assetIds === undefined) {
        return [...latest.values()].sort((a, b) => toMillis(b.ts) - toMillis(a.ts));
      }

      return assetIds.flatMap((id) => {
        const signal = latest.get(id);
        return signal ? [signal] : [];
      });
    },

    async listSignals(query: SignalQuery) {
      const signalType = query.signalType === undefined ? undefined : parseSignalType(query.signalType);

      return store.signals.listSignals({
        assetIds: query.assetId === undefined ? undefined : [query.assetId],
        signalType,
        isActive: query.isActive,
        start: query.start,
        end: query.end,
        limit: query.limit ?? 100,
      });
    },

    async listIndicators(query: IndicatorQuery) {
      const indicatorType =
        query.indicatorType === undefined ? undefined : parseIndicatorType(query.indicatorType);

      return store.indicators.listIndicators({
        assetId: query.assetId,
        name: query.name,
        indicatorType,
        start: query.start,
        end: query.end,
        limit: query.limit ?? 100,
      });
    },

    async getCandles(query: CandleQueryInput) {
      const interval = parseCandleInterval(query.interval ?? '1d');

      return store.candles.getCandles(query.assetId, interval, {
        since: query.start,
        until: query.end,
        limit: query.limit,
      });
    },

    getAnalysisSummary(assetId: string) {
      return getAnalysisSummary(store, assetId, { maxAgeDays: config.signalIndicatorMaxAgeDays });
    },

    listIndicatorTypes() {
      return toEnumEntries(INDICATOR_TYPES);
    },

    listSignalTypes() {
      return {
        signal_types: toEnumEntries(SIGNAL_TYPES),
        signal_strengths: toEnumEntries(SIGNAL_STRENGTHS),
      };
    },

    async quickStats(userId: string) {
      const counts = await store.watchlists.countWatchlists(userId);
      return {
        watchlist_count: counts.watchlists,
        asset_count: counts.items,
        last_updated: nowIso(),
      };
    },
  };
}
