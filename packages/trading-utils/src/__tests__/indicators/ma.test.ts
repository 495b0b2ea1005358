import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { InsufficientDataError } from '@trading-analytics/shared-utils';
import {
  calculateMA,
  calculateEMASeries,
  calculateSMA,
  checkMACrossover,
} from '../../indicators/ma.js';
import type { Candle } from '../../types.js';

function createCandle(close: number, index = 0): Candle {
  return {
    time: new Date(Date.UTC(2026, 0, 1 + index)).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  };
}

function createCandles(closes: number[]): Candle[] {
  return closes.map((close, i) => createCandle(close, i));
}

describe('calculateMA', () => {
  it('SMA를 올바르게 계산해야 함', () => {
    const candles = createCandles([100, 110, 120, 130, 140]);

    const ma = calculateMA(candles, 5, 'SMA');

    // (100 + 110 + 120 + 130 + 140) / 5 = 120
    expect(ma.toNumber()).toBe(120);
  });

  it('SMA는 마지막 period 개만 사용해야 함', () => {
    const candles = createCandles([1000, 10, 20, 30]);

    expect(calculateMA(candles, 3, 'SMA').toNumber()).toBe(20);
  });

  it('EMA는 SMA로 시작해 평활 계수 2/(n+1)로 갱신해야 함', () => {
    const candles = createCandles([1, 2, 3, 4, 5]);

    // seed = (1+2+3)/3 = 2, k = 0.5 → 3 → 4
    expect(calculateMA(candles, 3, 'EMA').toNumber()).toBe(4);
  });

  it('캔들 수가 부족하면 InsufficientDataError를 던져야 함', () => {
    const candles = createCandles([100, 101]);

    expect(() => calculateMA(candles, 5, 'SMA')).toThrow(InsufficientDataError);
    expect(() => calculateMA(candles, 5, 'SMA')).toThrow(
      'SMA(5) 계산에 최소 5개의 데이터가 필요합니다. 현재: 2개'
    );
  });
});

describe('calculateEMASeries', () => {
  it('period-1 시점부터의 EMA 배열을 반환해야 함', () => {
    const values = [1, 2, 3, 4, 5].map((v) => new Big(v));

    const series = calculateEMASeries(values, 3);

    expect(series.map((v) => v.toNumber())).toEqual([2, 3, 4]);
  });
});

describe('calculateSMA', () => {
  it('Big 배열의 평균을 계산해야 함', () => {
    const values = [2, 4, 6].map((v) => new Big(v));
    expect(calculateSMA(values, 3).toNumber()).toBe(4);
  });
});

describe('checkMACrossover', () => {
  it('단기선이 위에 있으면 golden', () => {
    expect(checkMACrossover(new Big(105), new Big(100))).toBe('golden');
  });

  it('단기선이 아래에 있으면 death', () => {
    expect(checkMACrossover(new Big(95), new Big(100))).toBe('death');
  });

  it('같으면 null', () => {
    expect(checkMACrossover(new Big(100), new Big(100))).toBeNull();
  });
});
