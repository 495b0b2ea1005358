import Big from 'big.js';
import { InsufficientDataError } from '@trading-analytics/shared-utils';
import { closesOf } from '../candle.js';
import { calculateSMA } from './ma.js';
import type { BollingerResult, Candle } from '../types.js';

/**
 * 볼린저 밴드 계산
 *
 * - 중심선: period 기간 SMA
 * - 상/하단: 중심선 ± multiplier × 모표준편차(population)
 *
 * @param candles - OHLCV 캔들 배열 (최소 period 개)
 * @param period - 기간 (기본값: 20)
 * @param multiplier - 표준편차 배수 (기본값: 2)
 */
export function calculateBollingerBands(
  candles: Candle[],
  period = 20,
  multiplier = 2
): BollingerResult {
  if (candles.length < period) {
    throw new InsufficientDataError(`BBANDS(${period})`, period, candles.length);
  }

  const window = closesOf(candles).slice(-period);
  const middle = calculateSMA(window, period);

  const variance = window
    .reduce((acc, close) => acc.plus(close.minus(middle).pow(2)), new Big(0))
    .div(period);
  const stdDev = variance.sqrt();
  const width = stdDev.times(multiplier);

  return {
    middle,
    upper: middle.plus(width),
    lower: middle.minus(width),
    stdDev,
  };
}
