import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { InsufficientDataError } from '@trading-analytics/shared-utils';
import { calculateATR, trueRangeSeries } from '../../atr/calculator.js';
import type { Candle } from '../../types.js';

describe('ATR Calculator', () => {
  const fixedCandles: Candle[] = [
    {
      time: '2026-01-01T00:00:00Z',
      open: '100000',
      high: '101000',
      low: '99000',
      close: '100500',
      volume: '1000',
    },
    {
      time: '2026-01-02T00:00:00Z',
      open: '100500',
      high: '102000',
      low: '100000',
      close: '101500',
      volume: '1000',
    },
    {
      time: '2026-01-03T00:00:00Z',
      open: '101500',
      high: '102500',
      low: '101000',
      close: '102000',
      volume: '1000',
    },
  ];

  describe('trueRangeSeries', () => {
    it('캔들 쌍마다 하나씩 계산해야 함', () => {
      expect(trueRangeSeries(fixedCandles).map((tr) => tr.toNumber())).toEqual([2000, 1500]);
      expect(trueRangeSeries(fixedCandles.slice(0, 1))).toEqual([]);
    });

    it('갭 하락은 저가와 이전 종가의 거리로 잡아야 함', () => {
      const candles: Candle[] = [
        { time: '2026-01-01T00:00:00Z', open: 20, high: 21, low: 19, close: 20, volume: 1 },
        { time: '2026-01-02T00:00:00Z', open: 13, high: 14, low: 12, close: 13, volume: 1 },
      ];

      // max(2, 6, 8) = 8
      expect(trueRangeSeries(candles).map((tr) => tr.toNumber())).toEqual([8]);
    });
  });

  describe('calculateATR', () => {
    it('고정 데이터: True Range가 올바르게 계산되어야 함', () => {
      const result = calculateATR(fixedCandles, 2);

      // TR1 = max(102000-100000, abs(102000-100500), abs(100000-100500)) = 2000
      // TR2 = max(102500-101000, abs(102500-101500), abs(101000-101500)) = 1500
      expect(result.trueRanges.map((tr) => tr.toString())).toEqual(['2000', '1500']);

      // ATR = (TR1 + TR2) / 2 = 1750
      expect(result.atr.toString()).toBe('1750');
      expect(result.period).toBe(2);
    });

    it('초기 평균 이후에는 Wilder 평활을 적용해야 함', () => {
      const candles: Candle[] = [
        ...fixedCandles,
        {
          time: '2026-01-04T00:00:00Z',
          open: '102000',
          high: '103000',
          low: '101500',
          close: '102500',
          volume: '1000',
        },
      ];

      // TR3 = max(1500, 1000, 500) = 1500 → (1750 * 1 + 1500) / 2 = 1625
      expect(calculateATR(candles, 2).atr.toString()).toBe('1625');
    });

    it('갭 상승은 이전 종가 기준 거리로 잡아야 함', () => {
      const candles: Candle[] = [
        { time: '2026-01-01T00:00:00Z', open: 10, high: 11, low: 9, close: 10, volume: 1 },
        { time: '2026-01-02T00:00:00Z', open: 15, high: 16, low: 15, close: 15.5, volume: 1 },
      ];

      // max(1, 6, 5) = 6
      expect(calculateATR(candles, 1).atr.toNumber()).toBe(6);
    });

    it('Date 타입 시간도 처리해야 함', () => {
      const candles: Candle[] = fixedCandles.map((c, i) => ({ ...c, time: new Date(Date.UTC(2026, 0, 1 + i)) }));

      expect(calculateATR(candles, 2).atr).toBeInstanceOf(Big);
    });

    it('에러: 캔들 부족 시 에러를 발생시켜야 함', () => {
      expect(() => calculateATR(fixedCandles, 14)).toThrow(InsufficientDataError);
      expect(() => calculateATR(fixedCandles, 14)).toThrow('ATR(14) 계산에 최소 15개의 데이터가 필요합니다');
    });
  });
});
