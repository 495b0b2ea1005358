import { createLogger, keepLatestByKey, nowIso, toIsoString, toMillis } from '@trading-analytics/shared-utils';
import type { CandleInterval } from '@trading-analytics/trading-utils';
import type { MarketDataStore } from './store.js';
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
  WatchlistRecord,
} from './types.js';

const logger = createLogger('db-client');

export interface MemoryWatchlistSeed {
  id: string;
  user_id: string;
  name: string;
  description?: string | null;
  is_default?: boolean;
  /** position 순서 */
  asset_ids: string[];
}

export interface MemoryStoreSeed {
  assets?: AssetRecord[];
  candles?: CandleRecord[];
  indicators?: IndicatorSnapshot[];
  signals?: SignalRecord[];
  watchlists?: MemoryWatchlistSeed[];
}

function withinRange(ts: string, since?: string, until?: string): boolean {
  const t = toMillis(ts);
  if (since !== undefined && t < toMillis(since)) return false;
  if (until !== undefined && t > toMillis(until)) return false;
  return true;
}

function byTsAsc<T extends { ts: string }>(a: T, b: T): number {
  return toMillis(a.ts) - toMillis(b.ts);
}

function byTsDesc<T extends { ts: string }>(a: T, b: T): number {
  return toMillis(b.ts) - toMillis(a.ts);
}

function takeLimit<T>(rows: T[], limit?: number): T[] {
  return limit === undefined ? rows : rows.slice(0, Math.max(0, Math.floor(limit)));
}

/**
 * 프로세스 내 저장소
 * - 테스트와 ANALYZER_STORE=memory 로컬 실행용
 * - 반환 값은 복사본이므로 호출자가 수정해도 내부 상태는 바뀌지 않는다.
 * - supersede 는 await 없이 한 번에 실행되므로 이벤트 루프 안에서 원자적이다.
 */
export function createMemoryStore(seed: MemoryStoreSeed = {}): MarketDataStore {
  const assets = new Map<string, AssetRecord>();
  for (const asset of seed.assets ?? []) assets.set(asset.id, { ...asset });

  const candles: CandleRecord[] = (seed.candles ?? []).map((c) => ({ ...c, ts: toIsoString(c.ts) }));

  const indicators = new Map<string, IndicatorSnapshot>();
  const indicatorKey = (s: { asset_id: string; name: string; ts: string }) =>
    `${s.asset_id}|${s.name}|${toIsoString(s.ts)}`;
  for (const snapshot of seed.indicators ?? []) {
    indicators.set(indicatorKey(snapshot), structuredClone(snapshot));
  }

  const signals: SignalRecord[] = (seed.signals ?? []).map((s) => structuredClone(s));
  const watchlists: MemoryWatchlistSeed[] = (seed.watchlists ?? []).map((w) => structuredClone(w));

  let nextIndicatorId = indicators.size + 1;
  let nextSignalId = signals.length + 1;

  const resolveWatchlist = (w: MemoryWatchlistSeed): WatchlistRecord => {
    const resolved: AssetRecord[] = [];
    for (const assetId of w.asset_ids) {
      const asset = assets.get(assetId);
      if (asset) resolved.push({ ...asset });
    }
    return {
      id: w.id,
      user_id: w.user_id,
      name: w.name,
      description: w.description ?? null,
      is_default: w.is_default ?? false,
      assets: resolved,
    };
  };

  return {
    kind: 'memory',

    candles: {
      async getCandles(assetId: string, interval: CandleInterval, query: CandleQuery = {}) {
        const rows = candles
          .filter(
            (c) => c.asset_id === assetId && c.interval === interval && withinRange(c.ts, query.since, query.until),
          )
          .sort(byTsAsc);

        const limited =
          query.limit === undefined ? rows : rows.slice(Math.max(0, rows.length - Math.max(0, Math.floor(query.limit))));
        return limited.map((c) => ({ ...c }));
      },
    },

    indicators: {
      async putIndicators(snapshots: NewIndicatorSnapshot[]) {
        const computedAt = nowIso();
        const saved: IndicatorSnapshot[] = [];

        for (const snapshot of snapshots) {
          const key = indicatorKey(snapshot);
          // 기존 행은 그대로 두고 새 키만 추가
          if (indicators.has(key)) continue;

          const row: IndicatorSnapshot = {
            ...structuredClone(snapshot),
            ts: toIsoString(snapshot.ts),
            id: String(nextIndicatorId++),
            computed_at: computedAt,
          };
          indicators.set(key, row);
          saved.push(structuredClone(row));
        }

        return saved;
      },

      async getIndicatorsSince(assetId: string, since: string) {
        return [...indicators.values()]
          .filter((s) => s.asset_id === assetId && withinRange(s.ts, since))
          .sort(byTsDesc)
          .map((s) => structuredClone(s));
      },

      async listIndicators(filter: IndicatorFilter) {
        const rows = [...indicators.values()]
          .filter(
            (s) =>
              s.asset_id === filter.assetId &&
              (filter.name === undefined || s.name === filter.name) &&
              (filter.indicatorType === undefined || s.indicator_type === filter.indicatorType) &&
              withinRange(s.ts, filter.start, filter.end),
          )
          .sort(byTsDesc);
        return takeLimit(rows, filter.limit).map((s) => structuredClone(s));
      },
    },

    signals: {
      async supersede(signal: NewSignal) {
        let superseded = 0;
        for (const existing of signals) {
          if (existing.asset_id === signal.asset_id && existing.is_active) {
            existing.is_active = false;
            superseded++;
          }
        }

        const row: SignalRecord = {
          ...structuredClone(signal),
          ts: toIsoString(signal.ts),
          id: String(nextSignalId++),
          is_active: true,
        };
        signals.push(row);

        logger.debug('시그널 교체', { asset_id: signal.asset_id, superseded });
        return structuredClone(row);
      },

      async deactivate(ids: string[]) {
        const targets = new Set(ids);
        let count = 0;
        for (const s of signals) {
          if (targets.has(s.id) && s.is_active) {
            s.is_active = false;
            count++;
          }
        }
        return count;
      },

      async deactivateExpired(now: string) {
        const nowMs = toMillis(now);
        let count = 0;
        for (const s of signals) {
          if (s.is_active && s.expires_at !== null && toMillis(s.expires_at) <= nowMs) {
            s.is_active = false;
            count++;
          }
        }
        return count;
      },

      async getActiveSignal(assetId: string) {
        const latest = keepLatestByKey(
          signals.filter((s) => s.asset_id === assetId && s.is_active),
          (s) => s.asset_id,
          (s) => toMillis(s.ts),
        ).get(assetId);
        return latest ? structuredClone(latest) : null;
      },

      async listSignals(filter: SignalFilter) {
        const assetIds = filter.assetIds ? new Set(filter.assetIds) : null;
        const rows = signals
          .filter(
            (s) =>
              (assetIds === null || assetIds.has(s.asset_id)) &&
              (filter.signalType === undefined || s.signal_type === filter.signalType) &&
              (filter.isActive === undefined || s.is_active === filter.isActive) &&
              withinRange(s.ts, filter.start, filter.end),
          )
          .sort(byTsDesc);
        return takeLimit(rows, filter.limit).map((s) => structuredClone(s));
      },
    },

    assets: {
      async getAsset(assetId: string) {
        const asset = assets.get(assetId);
        return asset ? { ...asset } : null;
      },

      async listActiveAssets() {
        return [...assets.values()]
          .filter((a) => a.is_active)
          .sort((a, b) => a.symbol.localeCompare(b.symbol))
          .map((a) => ({ ...a }));
      },
    },

    watchlists: {
      async getWatchlist(watchlistId: string) {
        const found = watchlists.find((w) => w.id === watchlistId);
        return found ? resolveWatchlist(found) : null;
      },

      async getDefaultWatchlist(userId: string) {
        const owned = watchlists.filter((w) => w.user_id === userId);
        const found = owned.find((w) => w.is_default === true) ?? owned[0];
        return found ? resolveWatchlist(found) : null;
      },

      async countWatchlists(userId: string) {
        const owned = watchlists.filter((w) => w.user_id === userId);
        return {
          watchlists: owned.length,
          items: owned.reduce((sum, w) => sum + w.asset_ids.length, 0),
        };
      },
    },

    async init(): Promise<void> {
      logger.info('메모리 저장소 준비 완료', { assets: assets.size, candles: candles.length });
    },
  };
}
