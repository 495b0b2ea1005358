import { z } from 'zod';
import { InvalidEnumError } from '@trading-analytics/shared-utils';

export const CANDLE_INTERVALS = ['1m', '5m', '15m', '30m', '1h', '4h', '1d', '1w', '1M'] as const;
export const CandleIntervalSchema = z.enum(CANDLE_INTERVALS);
export type CandleInterval = z.infer<typeof CandleIntervalSchema>;

export const INDICATOR_TYPES = ['sma', 'ema', 'rsi', 'macd', 'bbands', 'atr', 'obv', 'stoch', 'adx', 'cci'] as const;
export const IndicatorTypeSchema = z.enum(INDICATOR_TYPES);
export type IndicatorType = z.infer<typeof IndicatorTypeSchema>;

export const SIGNAL_TYPES = ['strong_sell', 'sell', 'hold', 'buy', 'strong_buy'] as const;
export const SignalTypeSchema = z.enum(SIGNAL_TYPES);
export type SignalType = z.infer<typeof SignalTypeSchema>;

export const SIGNAL_STRENGTHS = ['weak', 'moderate', 'strong'] as const;
export const SignalStrengthSchema = z.enum(SIGNAL_STRENGTHS);
export type SignalStrength = z.infer<typeof SignalStrengthSchema>;

export const ASSET_TYPES = ['stock', 'etf', 'crypto', 'forex', 'commodity'] as const;
export const AssetTypeSchema = z.enum(ASSET_TYPES);
export type AssetType = z.infer<typeof AssetTypeSchema>;

function parseEnum<T extends string>(
  name: string,
  schema: z.ZodEnum<[T, ...T[]]>,
  raw: unknown,
): T {
  const parsed = schema.safeParse(typeof raw === 'string' ? raw.trim() : raw);
  if (!parsed.success) throw new InvalidEnumError(name, raw, schema.options);
  return parsed.data;
}

export function parseCandleInterval(raw: unknown): CandleInterval {
  return parseEnum('CandleInterval', CandleIntervalSchema, raw);
}

export function parseIndicatorType(raw: unknown): IndicatorType {
  return parseEnum('IndicatorType', IndicatorTypeSchema, raw);
}

export function parseSignalType(raw: unknown): SignalType {
  return parseEnum('SignalType', SignalTypeSchema, raw);
}

export function parseSignalStrength(raw: unknown): SignalStrength {
  return parseEnum('SignalStrength', SignalStrengthSchema, raw);
}

export function parseAssetType(raw: unknown): AssetType {
  return parseEnum('AssetType', AssetTypeSchema, raw);
}

/**
 * 목록 API 용 { value, name } 쌍 (name 은 대문자 상수명)
 */
export interface EnumEntry<T extends string> {
  value: T;
  name: string;
}

export function toEnumEntries<T extends string>(values: readonly T[]): EnumEntry<T>[] {
  return values.map((value) => ({ value, name: value.toUpperCase() }));
}
