import type Big from 'big.js';

// =============================================================================
// Candle Data
// =============================================================================

/**
 * OHLCV candle data
 */
export interface Candle {
  time: string | Date;
  open: string | number;
  high: string | number;
  low: string | number;
  close: string | number;
  volume: string | number;
}

/**
 * Normalized candle with Big.js values
 */
export interface NormalizedCandle {
  time: Date;
  open: Big;
  high: Big;
  low: Big;
  close: Big;
  volume: Big;
}

// =============================================================================
// Indicators
// =============================================================================

/**
 * Moving Average types
 */
export type MAType = 'SMA' | 'EMA';

/**
 * MACD result
 */
export interface MACDResult {
  macd: Big;
  signal: Big;
  histogram: Big;
}

/**
 * RSI result
 * - value 가 null 이면 평균 손실이 0 이라 RS 가 정의되지 않는 구간
 */
export interface RSIResult {
  value: Big | null;
  overbought: boolean;  // > 70
  oversold: boolean;    // < 30
}

/**
 * Bollinger Bands result
 */
export interface BollingerResult {
  middle: Big;
  upper: Big;
  lower: Big;
  stdDev: Big;
}

/**
 * ATR calculation result
 */
export interface ATRResult {
  atr: Big;
  period: number;
  trueRanges: Big[];
}

// =============================================================================
// Signal Scoring
// =============================================================================

/**
 * 지표 스냅샷 한 건의 값 (primary/secondary/tertiary)
 */
export interface IndicatorReading {
  name: string;
  primary: number | null;
  secondary: number | null;
  tertiary: number | null;
}

export type IndicatorReadings = Partial<Record<string, IndicatorReading>>;

export type VoteDirection = 'buy' | 'sell';

/**
 * 규칙 하나의 평가 결과
 * - vote 가 null 이면 평가는 했지만 방향성 없음
 */
export interface RuleOutcome {
  rule: 'RSI' | 'MA_CROSSOVER' | 'MACD';
  indicators: string[];
  vote: VoteDirection | null;
  fragment: string | null;
}
