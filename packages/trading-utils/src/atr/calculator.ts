import Big from 'big.js';
import { InsufficientDataError } from '@trading-analytics/shared-utils';
import { normalizeCandle } from '../candle.js';
import type { ATRResult, Candle } from '../types.js';

function maxOf(first: Big, ...rest: Big[]): Big {
  return rest.reduce((max, v) => (v.gt(max) ? v : max), first);
}

/**
 * 연속한 캔들 쌍의 True Range 목록 (길이 = 캔들 수 - 1)
 * TR = max(고가 - 저가, |고가 - 이전종가|, |저가 - 이전종가|)
 */
export function trueRangeSeries(candles: Candle[]): Big[] {
  const normalized = candles.map(normalizeCandle);

  return normalized.slice(1).map((current, i) => {
    const prevClose = normalized[i].close;
    return maxOf(
      current.high.minus(current.low).abs(),
      current.high.minus(prevClose).abs(),
      current.low.minus(prevClose).abs(),
    );
  });
}

/**
 * Wilder 평활: 처음 period 개 평균에서 시작해 avg = (avg × (period - 1) + v) / period
 */
function wilderAverage(values: Big[], period: number): Big {
  const seed = values.slice(0, period).reduce((sum, v) => sum.plus(v), new Big(0)).div(period);

  return values.slice(period).reduce((avg, v) => avg.times(period - 1).plus(v).div(period), seed);
}

/**
 * ATR (Average True Range), 마지막 캔들 기준 변동성
 *
 * @param period - 기간 (캔들은 최소 period + 1개)
 *
 * @example
 * ```typescript
 * const { atr } = calculateATR(dailyCandles, 14);
 * snapshot.primary_value = atr.toNumber();
 * ```
 */
export function calculateATR(candles: Candle[], period = 14): ATRResult {
  if (candles.length < period + 1) {
    throw new InsufficientDataError(`ATR(${period})`, period + 1, candles.length);
  }

  const trueRanges = trueRangeSeries(candles);

  return {
    atr: wilderAverage(trueRanges, period),
    period,
    trueRanges,
  };
}
