import Big from 'big.js';
import { InsufficientDataError } from '@trading-analytics/shared-utils';
import { closesOf } from '../candle.js';
import type { Candle, MAType } from '../types.js';

/**
 * 단순 이동평균 (SMA) 계산
 *
 * @param values - 값 배열
 * @param period - 이동평균 기간
 * @returns 마지막 period 개 값의 평균
 */
export function calculateSMA(values: Big[], period: number): Big {
  if (values.length < period) {
    throw new InsufficientDataError(`SMA(${period})`, period, values.length);
  }

  const slice = values.slice(-period);
  const sum = slice.reduce((acc, val) => acc.plus(val), new Big(0));
  return sum.div(period);
}

/**
 * 지수 이동평균 (EMA) 시계열 계산
 *
 * 첫 EMA 는 처음 period 개 값의 SMA 로 시작하고, 이후
 * EMA = (현재값 - 이전EMA) * 2/(period+1) + 이전EMA
 *
 * @returns values[period-1] 시점부터의 EMA 배열 (길이 values.length - period + 1)
 */
export function calculateEMASeries(values: Big[], period: number): Big[] {
  if (values.length < period) {
    throw new InsufficientDataError(`EMA(${period})`, period, values.length);
  }

  const emaValues: Big[] = [calculateSMA(values.slice(0, period), period)];
  const multiplier = new Big(2).div(period + 1);

  for (let i = period; i < values.length; i++) {
    const prev = emaValues[emaValues.length - 1];
    emaValues.push(values[i].minus(prev).times(multiplier).plus(prev));
  }

  return emaValues;
}

/**
 * 지수 이동평균 (EMA) 최신값
 */
export function calculateEMA(values: Big[], period: number): Big {
  const series = calculateEMASeries(values, period);
  return series[series.length - 1];
}

/**
 * 이동평균 계산 (SMA, EMA)
 *
 * @param candles - OHLCV 캔들 배열 (오래된 것부터)
 * @param period - 이동평균 기간
 * @param type - 이동평균 타입 (기본값: SMA)
 * @returns 마지막 캔들 시점의 이동평균 값
 *
 * @example
 * ```typescript
 * const sma20 = calculateMA(candles, 20, 'SMA');
 * const ema50 = calculateMA(candles, 50, 'EMA');
 * ```
 */
export function calculateMA(candles: Candle[], period: number, type: MAType = 'SMA'): Big {
  const closes = closesOf(candles);

  switch (type) {
    case 'SMA':
      return calculateSMA(closes, period);
    case 'EMA':
      return calculateEMA(closes, period);
    default: {
      const unknownType: never = type;
      throw new Error(`지원하지 않는 이동평균 타입: ${String(unknownType)}`);
    }
  }
}

/**
 * 이동평균 골든크로스/데드크로스 확인
 *
 * @param shortMA - 단기 이동평균 (예: SMA20)
 * @param longMA - 장기 이동평균 (예: SMA50)
 * @returns 'golden' (단기선이 위), 'death' (단기선이 아래), null (같음)
 */
export function checkMACrossover(
  shortMA: Big,
  longMA: Big
): 'golden' | 'death' | null {
  if (shortMA.gt(longMA)) {
    return 'golden';
  }

  if (shortMA.lt(longMA)) {
    return 'death';
  }

  return null;
}
