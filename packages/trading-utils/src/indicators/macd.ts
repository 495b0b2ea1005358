import { InsufficientDataError } from '@trading-analytics/shared-utils';
import type Big from 'big.js';
import { closesOf } from '../candle.js';
import { calculateEMASeries } from './ma.js';
import type { Candle, MACDResult } from '../types.js';

/**
 * MACD (Moving Average Convergence Divergence) 계산
 *
 * MACD = 12일 EMA - 26일 EMA
 * Signal = MACD의 9일 EMA
 * Histogram = MACD - Signal
 *
 * @param candles - OHLCV 캔들 배열 (최소 slowPeriod + signalPeriod - 1개 필요)
 * @param fastPeriod - 빠른 EMA 기간 (기본값: 12)
 * @param slowPeriod - 느린 EMA 기간 (기본값: 26)
 * @param signalPeriod - 시그널선 기간 (기본값: 9)
 *
 * @example
 * ```typescript
 * const macd = calculateMACD(candles);
 * if (macd.histogram.gt(0)) console.log('상승 모멘텀');
 * ```
 */
export function calculateMACD(
  candles: Candle[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9
): MACDResult {
  const minLength = slowPeriod + signalPeriod - 1;
  if (candles.length < minLength) {
    throw new InsufficientDataError(
      `MACD(${fastPeriod},${slowPeriod},${signalPeriod})`,
      minLength,
      candles.length
    );
  }

  const closes = closesOf(candles);

  const fastEMAs = calculateEMASeries(closes, fastPeriod);
  const slowEMAs = calculateEMASeries(closes, slowPeriod);

  // slowEMA가 늦게 시작하므로 offset 만큼 맞춘다
  const offset = slowPeriod - fastPeriod;
  const macdValues: Big[] = [];

  for (let i = 0; i < slowEMAs.length; i++) {
    macdValues.push(fastEMAs[i + offset].minus(slowEMAs[i]));
  }

  const signalEMAs = calculateEMASeries(macdValues, signalPeriod);

  const latestMACD = macdValues[macdValues.length - 1];
  const latestSignal = signalEMAs[signalEMAs.length - 1];

  return {
    macd: latestMACD,
    signal: latestSignal,
    histogram: latestMACD.minus(latestSignal),
  };
}
