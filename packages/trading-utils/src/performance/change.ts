import Big from 'big.js';
import { InsufficientDataError, toMillis } from '@trading-analytics/shared-utils';
import { calculateSMA } from '../indicators/ma.js';
import type { Candle } from '../types.js';

type Numeric = Big | number | string;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Big → number, 소수점 dp 자리 반올림 (ROUND_HALF_UP)
 */
export function roundTo(value: Big, dp = 2): number {
  return value.round(dp).toNumber();
}

/**
 * 퍼센트 변화율 (소수점 2자리)
 * - 이전 가격이 없거나 0이면 null
 *
 * (current - previous) / previous × 100
 */
export function calculatePercentChange(current: Numeric, previous: Numeric | null): number | null {
  if (previous === null) return null;

  const prev = new Big(previous);
  if (prev.eq(0)) return null;

  return roundTo(new Big(current).minus(prev).div(prev).times(100));
}

/**
 * 종가 단순이동평균 (데이터가 period 보다 적으면 null)
 */
export function calculateCloseAverage(candles: Candle[], period: number): Big | null {
  try {
    return calculateSMA(candles.map((c) => new Big(c.close)), period);
  } catch (error) {
    if (error instanceof InsufficientDataError) return null;
    throw error;
  }
}

/**
 * 스파크라인: 기준 시각 이전 days 일(기준 포함) 동안의 종가 (오래된 것부터)
 */
export function selectSparkline(candles: Candle[], anchor: string | Date, days = 30): number[] {
  const anchorMs = anchor instanceof Date ? anchor.getTime() : toMillis(anchor);
  const startMs = anchorMs - days * DAY_MS;

  return candles
    .map((c) => ({
      ms: c.time instanceof Date ? c.time.getTime() : toMillis(c.time),
      close: new Big(c.close).toNumber(),
    }))
    .filter((p) => p.ms >= startMs && p.ms <= anchorMs)
    .sort((a, b) => a.ms - b.ms)
    .map((p) => p.close);
}

/**
 * 워치리스트 지수: (현재가 / MA200) 평균 × 100, 소수점 2자리
 * - 대상 자산이 없으면 null
 */
export function calculateWatchlistIndex(ratios: Big[]): number | null {
  if (ratios.length === 0) return null;

  const sum = ratios.reduce((acc, r) => acc.plus(r), new Big(0));
  return roundTo(sum.div(ratios.length).times(100));
}
