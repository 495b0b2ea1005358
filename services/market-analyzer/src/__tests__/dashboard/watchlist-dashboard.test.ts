import { describe, it, expect } from 'vitest';
import { createMemoryStore, type MarketDataStore } from '@trading-analytics/db-client';
import { getWatchlistDashboard } from '../../dashboard/watchlist-dashboard.js';
import { asset, candle, dailyCandles } from '../fixtures.js';

const T0 = '2026-05-31T00:00:00.000Z';
const NOW = '2026-06-15T09:00:00.000Z';

const scenarioCandles = [
  candle('s1', '2026-05-01T00:00:00.000Z', 80), // T0 - 30d
  candle('s1', '2026-05-24T00:00:00.000Z', 90), // T0 - 7d
  candle('s1', '2026-05-30T00:00:00.000Z', 100), // T0 - 1d
  candle('s1', T0, 110),
];

const flat200 = dailyCandles('x', T0, Array.from({ length: 200 }, () => 100));
const jump200 = dailyCandles('y', T0, [...Array.from({ length: 199 }, () => 100), 150]);

function seedStore(): MarketDataStore {
  return createMemoryStore({
    assets: [asset('s1'), asset('empty'), asset('x'), asset('y')],
    candles: [...scenarioCandles, ...flat200, ...jump200],
    watchlists: [{ id: 'wl-1', user_id: 'u1', name: 'Core', asset_ids: ['s1', 'empty', 'x', 'y'] }],
  });
}

async function dashboardOf(store: MarketDataStore) {
  const watchlist = await store.watchlists.getWatchlist('wl-1');
  if (!watchlist) throw new Error('fixture watchlist missing');
  return getWatchlistDashboard(store, watchlist, { now: NOW });
}

describe('getWatchlistDashboard', () => {
  it('변화율은 벽시계가 아니라 최신 캔들 기준이어야 함', async () => {
    const dashboard = await dashboardOf(seedStore());
    const s1 = dashboard.assets[0];

    expect(s1).toMatchObject({
      asset_id: 's1',
      symbol: 'S1',
      last_price: 110,
      last_updated: T0,
      change_1d: 10,
      change_1w: 22.22,
      change_1m: 37.5,
      change_1y: null,
      sparkline: [80, 90, 100, 110],
      ma_200: null,
      data_status: 'ok',
    });
  });

  it('캔들이 없는 자산은 no_data 로 표시하고 다른 자산은 유지해야 함', async () => {
    const dashboard = await dashboardOf(seedStore());

    expect(dashboard.assets.map((a) => a.data_status)).toEqual(['ok', 'no_data', 'ok', 'ok']);
    expect(dashboard.assets[1]).toEqual({
      asset_id: 'empty',
      symbol: 'EMPTY',
      name: 'EMPTY Inc.',
      asset_type: 'stock',
      sector: 'Technology',
      industry: null,
      last_price: null,
      last_updated: null,
      change_1d: null,
      change_1w: null,
      change_1m: null,
      change_1y: null,
      sparkline: [],
      ma_200: null,
      data_status: 'no_data',
    });
  });

  it('MA200 이 있는 자산만으로 지수를 계산해야 함', async () => {
    const dashboard = await dashboardOf(seedStore());
    const [, , x, y] = dashboard.assets;

    expect(x?.ma_200).toBe(100);
    // (199 × 100 + 150) / 200
    expect(y?.ma_200).toBe(100.25);
    expect(y?.change_1d).toBe(50);
    expect(y?.sparkline).toHaveLength(31);
    // mean(100/100, 150/100.25) × 100
    expect(dashboard.index).toBe(124.81);
  });

  it('워치리스트 정보와 생성 시각', async () => {
    const dashboard = await dashboardOf(seedStore());

    expect(dashboard.watchlist).toEqual({ id: 'wl-1', name: 'Core', description: null, item_count: 4 });
    expect(dashboard.generated_at).toBe(NOW);
  });

  it('MA200 대상이 없으면 index 는 null', async () => {
    const store = createMemoryStore({
      assets: [asset('s1')],
      candles: scenarioCandles,
      watchlists: [{ id: 'wl-1', user_id: 'u1', name: 'Core', asset_ids: ['s1'] }],
    });

    expect((await dashboardOf(store)).index).toBeNull();
  });

  it('한 자산의 조회 실패는 error 상태로만 표시해야 함', async () => {
    const base = seedStore();
    const store: MarketDataStore = {
      ...base,
      candles: {
        getCandles: async (assetId, interval, query) => {
          if (assetId === 'x') throw new Error('timeout');
          return base.candles.getCandles(assetId, interval, query);
        },
      },
    };

    const dashboard = await dashboardOf(store);

    expect(dashboard.assets.map((a) => a.data_status)).toEqual(['ok', 'no_data', 'error', 'ok']);
    // y 만 남음: 150 / 100.25 × 100
    expect(dashboard.index).toBe(149.63);
  });
});
