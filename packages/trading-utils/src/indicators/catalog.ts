import type { IndicatorType } from '../enums.js';

/**
 * 저장되는 지표 스냅샷 이름과 계산 파라미터
 */
export const INDICATOR_CATALOG = {
  SMA_20: { type: 'sma', parameters: { period: 20 } },
  SMA_50: { type: 'sma', parameters: { period: 50 } },
  EMA_20: { type: 'ema', parameters: { period: 20 } },
  EMA_50: { type: 'ema', parameters: { period: 50 } },
  RSI_14: { type: 'rsi', parameters: { period: 14 } },
  MACD_12_26_9: { type: 'macd', parameters: { fast: 12, slow: 26, signal: 9 } },
  BBANDS_20_2: { type: 'bbands', parameters: { period: 20, std: 2 } },
  ATR_14: { type: 'atr', parameters: { period: 14 } },
  OBV: { type: 'obv', parameters: {} },
} as const satisfies Record<string, { type: IndicatorType; parameters: Record<string, number> }>;

export type IndicatorName = keyof typeof INDICATOR_CATALOG;

export const INDICATOR_NAMES: readonly IndicatorName[] = [
  'SMA_20',
  'SMA_50',
  'EMA_20',
  'EMA_50',
  'RSI_14',
  'MACD_12_26_9',
  'BBANDS_20_2',
  'ATR_14',
  'OBV',
];
