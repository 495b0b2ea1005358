import Big from 'big.js';
import { InsufficientDataError } from '@trading-analytics/shared-utils';
import type { Candle } from '../types.js';

/**
 * OBV (On-Balance Volume) 계산
 *
 * 종가가 직전보다 오르면 거래량을 더하고, 내리면 뺀다. 보합은 0.
 * 윈도우 없이 전달된 캔들 전체에 대해 누적한다.
 *
 * @param candles - OHLCV 캔들 배열 (최소 2개)
 * @returns 마지막 캔들 시점의 누적 OBV
 */
export function calculateOBV(candles: Candle[]): Big {
  if (candles.length < 2) {
    throw new InsufficientDataError('OBV', 2, candles.length);
  }

  let obv = new Big(0);

  for (let i = 1; i < candles.length; i++) {
    const close = new Big(candles[i].close);
    const prevClose = new Big(candles[i - 1].close);
    const volume = new Big(candles[i].volume);

    if (close.gt(prevClose)) {
      obv = obv.plus(volume);
    } else if (close.lt(prevClose)) {
      obv = obv.minus(volume);
    }
  }

  return obv;
}
