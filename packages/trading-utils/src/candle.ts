import Big from 'big.js';
import type { Candle, NormalizedCandle } from './types.js';

/**
 * 캔들 데이터를 Big.js 형식으로 정규화
 * - 숫자가 아닌 값(NaN, 빈 문자열)은 Big 생성 시 예외가 발생한다.
 */
export function normalizeCandle(candle: Candle): NormalizedCandle {
  return {
    time: typeof candle.time === 'string' ? new Date(candle.time) : candle.time,
    open: new Big(candle.open),
    high: new Big(candle.high),
    low: new Big(candle.low),
    close: new Big(candle.close),
    volume: new Big(candle.volume),
  };
}

export function closesOf(candles: Candle[]): Big[] {
  return candles.map((c) => new Big(c.close));
}
