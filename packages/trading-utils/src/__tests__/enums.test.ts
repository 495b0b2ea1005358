import { describe, it, expect } from 'vitest';
import { InvalidEnumError } from '@trading-analytics/shared-utils';
import {
  parseCandleInterval,
  parseIndicatorType,
  parseSignalStrength,
  parseSignalType,
  SIGNAL_STRENGTHS,
  toEnumEntries,
} from '../enums.js';

describe('parseCandleInterval', () => {
  it('지원하는 간격 토큰을 그대로 반환해야 함', () => {
    expect(parseCandleInterval('1d')).toBe('1d');
    expect(parseCandleInterval(' 1h ')).toBe('1h');
  });

  it('1m(분봉)과 1M(월봉)을 구분해야 함', () => {
    expect(parseCandleInterval('1m')).toBe('1m');
    expect(parseCandleInterval('1M')).toBe('1M');
  });

  it('알 수 없는 토큰은 InvalidEnumError', () => {
    expect(() => parseCandleInterval('2d')).toThrow(InvalidEnumError);
    expect(() => parseCandleInterval('2d')).toThrow(
      'CandleInterval must be one of 1m|5m|15m|30m|1h|4h|1d|1w|1M, got: 2d'
    );
  });

  it('문자열이 아니면 InvalidEnumError', () => {
    expect(() => parseCandleInterval(1)).toThrow(InvalidEnumError);
  });
});

describe('signal / indicator enums', () => {
  it('소문자 토큰만 허용해야 함', () => {
    expect(parseSignalType('strong_buy')).toBe('strong_buy');
    expect(() => parseSignalType('BUY')).toThrow(InvalidEnumError);
  });

  it('강도와 지표 타입을 파싱해야 함', () => {
    expect(parseSignalStrength('moderate')).toBe('moderate');
    expect(parseIndicatorType('bbands')).toBe('bbands');
    expect(() => parseIndicatorType('vwap')).toThrow(InvalidEnumError);
  });
});

describe('toEnumEntries', () => {
  it('값과 대문자 상수명 쌍을 선언 순서대로 만들어야 함', () => {
    expect(toEnumEntries(SIGNAL_STRENGTHS)).toEqual([
      { value: 'weak', name: 'WEAK' },
      { value: 'moderate', name: 'MODERATE' },
      { value: 'strong', name: 'STRONG' },
    ]);
  });
});
