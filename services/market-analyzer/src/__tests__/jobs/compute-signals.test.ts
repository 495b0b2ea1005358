import { describe, it, expect } from 'vitest';
import { createMemoryStore } from '@trading-analytics/db-client';
import { computeSignals } from '../../jobs/compute-signals.js';
import { deactivateExpiredSignals } from '../../jobs/deactivate-expired-signals.js';
import { asset, candle, snapshot } from '../fixtures.js';

const NOW = '2026-05-05T12:00:00.000Z';
const PREV_DAY = '2026-05-04T00:00:00.000Z';
const LAST_DAY = '2026-05-05T00:00:00.000Z';

describe('computeSignals', () => {
  it('RSI 과매도 + SMA20>SMA50 → buy / moderate / 60', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      candles: [candle('a1', PREV_DAY, 95), candle('a1', LAST_DAY, 97)],
      indicators: [
        snapshot('a1', 'RSI_14', LAST_DAY, 25),
        snapshot('a1', 'SMA_20', PREV_DAY, 110),
        snapshot('a1', 'SMA_50', PREV_DAY, 100),
      ],
    });

    const result = await computeSignals(store, { now: NOW });
    const signal = await store.signals.getActiveSignal('a1');

    expect(result).toEqual({ processed: 1, created: 1, skipped: 0, errors: [] });
    expect(signal).toMatchObject({
      ts: LAST_DAY,
      signal_type: 'buy',
      strength: 'moderate',
      confidence: 60,
      price: 97,
      strategy: 'RSI_MA_MACD_Combined',
      rationale: 'RSI oversold (25.0); SMA 20 above SMA 50 (bullish trend)',
      indicators_used: ['RSI_14', 'SMA_20', 'SMA_50'],
      timeframe: '1d',
      generated_at: NOW,
      expires_at: null,
      is_active: true,
    });
  });

  it('이름별로 가장 최근 스냅샷만 사용해야 함', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [snapshot('a1', 'RSI_14', LAST_DAY, 80), snapshot('a1', 'RSI_14', PREV_DAY, 20)],
    });

    await computeSignals(store, { now: NOW });

    expect((await store.signals.getActiveSignal('a1'))?.signal_type).toBe('sell');
  });

  it('동률(RSI 중립, SMA 동일, MACD 없음) → hold / 50', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [
        snapshot('a1', 'RSI_14', LAST_DAY, 50),
        snapshot('a1', 'SMA_20', LAST_DAY, 100),
        snapshot('a1', 'SMA_50', LAST_DAY, 100),
      ],
    });

    await computeSignals(store, { now: NOW });
    const signal = await store.signals.getActiveSignal('a1');

    expect(signal?.signal_type).toBe('hold');
    expect(signal?.strength).toBe('weak');
    expect(signal?.confidence).toBe(50);
    expect(signal?.rationale).toBe('No clear signals');
    expect(signal?.price).toBeNull();
  });

  it('3개 규칙 모두 매도 → strong_sell / 75', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [
        snapshot('a1', 'RSI_14', LAST_DAY, 75),
        snapshot('a1', 'SMA_20', LAST_DAY, 90),
        snapshot('a1', 'SMA_50', LAST_DAY, 100),
        snapshot('a1', 'MACD_12_26_9', LAST_DAY, -2, -1),
      ],
    });

    await computeSignals(store, { now: NOW });
    const signal = await store.signals.getActiveSignal('a1');

    expect(signal?.signal_type).toBe('strong_sell');
    expect(signal?.confidence).toBe(75);
    expect(signal?.indicators_used).toEqual(['RSI_14', 'SMA_20', 'SMA_50', 'MACD_12_26_9']);
  });

  it('두 번 실행하면 활성 시그널은 정확히 1건이어야 함', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [snapshot('a1', 'RSI_14', PREV_DAY, 25)],
    });

    await computeSignals(store, { now: NOW });
    await store.indicators.putIndicators([
      {
        asset_id: 'a1',
        ts: LAST_DAY,
        indicator_type: 'rsi',
        name: 'RSI_14',
        primary_value: 75,
        secondary_value: null,
        tertiary_value: null,
        parameters: { period: 14 },
        timeframe: '1d',
      },
    ]);
    await computeSignals(store, { now: NOW });

    const active = await store.signals.listSignals({ assetIds: ['a1'], isActive: true });
    const all = await store.signals.listSignals({ assetIds: ['a1'] });

    expect(active).toHaveLength(1);
    expect(active[0]?.signal_type).toBe('sell');
    expect(all.map((s) => s.signal_type)).toEqual(['sell', 'buy']);
  });

  it('동시에 두 번 실행해도 활성 시그널은 정확히 1건이어야 함', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [snapshot('a1', 'RSI_14', LAST_DAY, 25)],
    });

    const results = await Promise.all([computeSignals(store, { now: NOW }), computeSignals(store, { now: NOW })]);

    expect(results.map((r) => r.created)).toEqual([1, 1]);
    expect(await store.signals.listSignals({ assetIds: ['a1'], isActive: true })).toHaveLength(1);
    expect(await store.signals.listSignals({ assetIds: ['a1'] })).toHaveLength(2);
  });

  it('규칙에 쓰이는 지표가 없으면 처리만 하고 시그널은 만들지 않아야 함', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [snapshot('a1', 'ATR_14', LAST_DAY, 2), snapshot('a1', 'OBV', LAST_DAY, 1000)],
    });

    const result = await computeSignals(store, { now: NOW });

    expect(result).toEqual({ processed: 1, created: 0, skipped: 0, errors: [] });
    expect(await store.signals.getActiveSignal('a1')).toBeNull();
  });

  it('최대 보관 기간보다 오래된 지표만 있으면 스킵', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [snapshot('a1', 'RSI_14', '2026-05-01T00:00:00.000Z', 25)],
    });

    const result = await computeSignals(store, { now: NOW });

    expect(result).toEqual({ processed: 0, created: 0, skipped: 1, errors: [] });
  });

  it('TTL 이 있으면 expires_at 을 설정하고 만료 정리 대상이 되어야 함', async () => {
    const store = createMemoryStore({
      assets: [asset('a1')],
      indicators: [snapshot('a1', 'RSI_14', LAST_DAY, 25)],
    });

    await computeSignals(store, { now: NOW, ttlHours: 24 });
    expect((await store.signals.getActiveSignal('a1'))?.expires_at).toBe('2026-05-06T12:00:00.000Z');

    expect(await deactivateExpiredSignals(store, { now: '2026-05-06T11:59:59.000Z' })).toEqual({
      deactivated_count: 0,
      error: null,
    });
    expect(await deactivateExpiredSignals(store, { now: '2026-05-06T12:00:00.000Z' })).toEqual({
      deactivated_count: 1,
      error: null,
    });
    expect(await deactivateExpiredSignals(store, { now: '2026-05-07T00:00:00.000Z' })).toEqual({
      deactivated_count: 0,
      error: null,
    });
    expect(await store.signals.getActiveSignal('a1')).toBeNull();
  });
});
