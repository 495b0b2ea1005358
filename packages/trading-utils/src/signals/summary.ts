import Big from 'big.js';
import type { IndicatorReading, IndicatorReadings } from '../types.js';

export type SummarySignalType = 'RSI' | 'MACD' | 'Bollinger Bands';
export type SummarySignalState = 'oversold' | 'overbought' | 'bullish' | 'bearish';

/**
 * 요약 화면용 지표별 상태 (투표와 별개)
 */
export interface SummarySignal {
  type: SummarySignalType;
  signal: SummarySignalState;
  value: number;
}

type ReadingField = 'primary' | 'secondary' | 'tertiary';

function valueOf(reading: IndicatorReading | undefined, field: ReadingField): Big | null {
  const raw = reading?.[field];
  if (raw === null || raw === undefined || !Number.isFinite(raw)) return null;
  return new Big(raw);
}

/**
 * 최신 종가와 지표 값으로 상태 목록 생성
 *
 * - RSI: < 30 oversold, > 70 overbought
 * - MACD: MACD > 시그널이면 bullish, 아니면 bearish (value = MACD − 시그널)
 * - 볼린저: 종가 > 상단 overbought, 종가 < 하단 oversold (value = 종가)
 */
export function summarizeSignals(close: number | null, readings: IndicatorReadings): SummarySignal[] {
  const signals: SummarySignal[] = [];

  const rsi = valueOf(readings.RSI_14, 'primary');
  if (rsi) {
    if (rsi.lt(30)) signals.push({ type: 'RSI', signal: 'oversold', value: rsi.toNumber() });
    else if (rsi.gt(70)) signals.push({ type: 'RSI', signal: 'overbought', value: rsi.toNumber() });
  }

  const macdLine = valueOf(readings.MACD_12_26_9, 'primary');
  const signalLine = valueOf(readings.MACD_12_26_9, 'secondary');
  if (macdLine && signalLine) {
    const spread = macdLine.minus(signalLine).toNumber();
    signals.push({ type: 'MACD', signal: macdLine.gt(signalLine) ? 'bullish' : 'bearish', value: spread });
  }

  const upper = valueOf(readings.BBANDS_20_2, 'secondary');
  const lower = valueOf(readings.BBANDS_20_2, 'tertiary');
  if (close !== null && Number.isFinite(close) && upper && lower) {
    if (upper.lt(close)) signals.push({ type: 'Bollinger Bands', signal: 'overbought', value: close });
    else if (lower.gt(close)) signals.push({ type: 'Bollinger Bands', signal: 'oversold', value: close });
  }

  return signals;
}
