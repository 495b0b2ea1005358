import Big from 'big.js';
import { InsufficientDataError } from '@trading-analytics/shared-utils';
import { closesOf } from '../candle.js';
import type { Candle, RSIResult } from '../types.js';

/**
 * RSI (Relative Strength Index) 계산
 *
 * RSI는 0-100 범위의 모멘텀 지표입니다.
 * - RSI > 70: 과매수 (Overbought)
 * - RSI < 30: 과매도 (Oversold)
 *
 * RSI = 100 - 100 / (1 + RS), RS = 평균상승 / 평균하락 (Wilder 평활)
 * 평균하락이 0이면 RS 가 정의되지 않으므로 value 는 null 이다.
 *
 * @param candles - OHLCV 캔들 배열 (최소 period + 1개 필요)
 * @param period - RSI 기간 (기본값: 14)
 *
 * @example
 * ```typescript
 * const rsi = calculateRSI(candles, 14);
 * if (rsi.value) console.log(`RSI: ${rsi.value.toFixed(2)}`);
 * ```
 */
export function calculateRSI(candles: Candle[], period = 14): RSIResult {
  if (candles.length < period + 1) {
    throw new InsufficientDataError(`RSI(${period})`, period + 1, candles.length);
  }

  const closes = closesOf(candles);

  // 가격 변화 계산
  const changes: Big[] = [];
  for (let i = 1; i < closes.length; i++) {
    changes.push(closes[i].minus(closes[i - 1]));
  }

  // 첫 period 동안의 평균 상승/하락
  let gains = new Big(0);
  let losses = new Big(0);

  for (let i = 0; i < period; i++) {
    if (changes[i].gt(0)) {
      gains = gains.plus(changes[i]);
    } else {
      losses = losses.plus(changes[i].abs());
    }
  }

  let avgGain = gains.div(period);
  let avgLoss = losses.div(period);

  // Wilder's smoothing
  for (let i = period; i < changes.length; i++) {
    const change = changes[i];

    if (change.gt(0)) {
      avgGain = avgGain.times(period - 1).plus(change).div(period);
      avgLoss = avgLoss.times(period - 1).div(period);
    } else {
      avgGain = avgGain.times(period - 1).div(period);
      avgLoss = avgLoss.times(period - 1).plus(change.abs()).div(period);
    }
  }

  if (avgLoss.eq(0)) {
    return { value: null, overbought: false, oversold: false };
  }

  const rs = avgGain.div(avgLoss);
  const rsi = new Big(100).minus(new Big(100).div(new Big(1).plus(rs)));

  return {
    value: rsi,
    overbought: rsi.gt(70),
    oversold: rsi.lt(30),
  };
}
