import { describe, it, expect } from 'vitest';
import { summarizeSignals } from '../../signals/summary.js';
import type { IndicatorReading, IndicatorReadings } from '../../types.js';

function reading(
  name: string,
  primary: number | null,
  secondary: number | null = null,
  tertiary: number | null = null,
): IndicatorReading {
  return { name, primary, secondary, tertiary };
}

function readings(...items: IndicatorReading[]): IndicatorReadings {
  return Object.fromEntries(items.map((r) => [r.name, r]));
}

describe('summarizeSignals', () => {
  it('RSI 과매도, MACD 강세, 종가가 하단 밴드 아래', () => {
    const result = summarizeSignals(
      94,
      readings(
        reading('RSI_14', 25),
        reading('MACD_12_26_9', 1.5, 1),
        reading('BBANDS_20_2', 100, 110, 95),
      ),
    );

    expect(result).toEqual([
      { type: 'RSI', signal: 'oversold', value: 25 },
      { type: 'MACD', signal: 'bullish', value: 0.5 },
      { type: 'Bollinger Bands', signal: 'oversold', value: 94 },
    ]);
  });

  it('RSI 과매수, MACD 약세(동일 값 포함), 종가가 상단 밴드 위', () => {
    const result = summarizeSignals(
      111,
      readings(
        reading('RSI_14', 75),
        reading('MACD_12_26_9', 2, 2),
        reading('BBANDS_20_2', 100, 110, 90),
      ),
    );

    expect(result).toEqual([
      { type: 'RSI', signal: 'overbought', value: 75 },
      { type: 'MACD', signal: 'bearish', value: 0 },
      { type: 'Bollinger Bands', signal: 'overbought', value: 111 },
    ]);
  });

  it('중립 RSI, 밴드 안쪽 종가는 상태를 만들지 않아야 함', () => {
    const result = summarizeSignals(
      100,
      readings(reading('RSI_14', 50), reading('BBANDS_20_2', 100, 110, 90)),
    );

    expect(result).toEqual([]);
  });

  it('시그널선이나 종가가 없으면 해당 항목은 건너뛰어야 함', () => {
    const result = summarizeSignals(
      null,
      readings(reading('MACD_12_26_9', 1, null), reading('BBANDS_20_2', 100, 110, 90)),
    );

    expect(result).toEqual([]);
  });
});
