import { z } from 'zod';
import { ComputationError, toIsoString } from '@trading-analytics/shared-utils';
import {
  parseAssetType,
  parseCandleInterval,
  parseIndicatorType,
  parseSignalStrength,
  parseSignalType,
} from '@trading-analytics/trading-utils';
import type {
  AssetRecord,
  CandleRecord,
  IndicatorSnapshot,
  SignalRecord,
  WatchlistRecord,
} from './types.js';

/**
 * PostgREST 행 파싱
 * - numeric 컬럼은 number 또는 문자열로 올 수 있다.
 * - 타임존 없는 timestamp 는 UTC 로 간주해 ISO 로 정규화한다.
 * - 열거형 컬럼의 알 수 없는 토큰은 InvalidEnumError 로 그대로 전파한다.
 */

const numeric = z
  .union([z.number(), z.string().trim().min(1)])
  .transform(Number)
  .pipe(z.number().finite());

const nullableNumeric = numeric.nullable().default(null);

const id = z.union([z.string().min(1), z.number().int()]).transform(String);

const timestamp = z.string().transform((value, ctx) => {
  try {
    return toIsoString(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${value}` });
    return z.NEVER;
  }
});

// 일부 레거시 테이블은 boolean 을 'true'/'false' 문자열로 저장한다
const flag = z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')]);

const textOrNull = z.string().nullable().default(null);

export const CandleRowSchema = z.object({
  asset_id: id,
  interval: z.unknown().transform(parseCandleInterval),
  ts: timestamp,
  open: numeric,
  high: numeric,
  low: numeric,
  close: numeric,
  volume: numeric,
  trades: nullableNumeric,
  vwap: nullableNumeric,
});

export const IndicatorRowSchema = z.object({
  id,
  asset_id: id,
  ts: timestamp,
  indicator_type: z.unknown().transform(parseIndicatorType),
  name: z.string().min(1),
  primary_value: nullableNumeric,
  secondary_value: nullableNumeric,
  tertiary_value: nullableNumeric,
  parameters: z.record(z.string(), z.number()).nullable().transform((v) => v ?? {}),
  timeframe: z.unknown().transform(parseCandleInterval),
  computed_at: timestamp,
});

export const SignalRowSchema = z.object({
  id,
  asset_id: id,
  ts: timestamp,
  signal_type: z.unknown().transform(parseSignalType),
  strength: z.unknown().transform(parseSignalStrength),
  confidence: numeric,
  price: nullableNumeric,
  strategy: z.string(),
  rationale: z.string().nullable().transform((v) => v ?? ''),
  indicators_used: z.array(z.string()).nullable().transform((v) => v ?? []),
  timeframe: z.unknown().transform(parseCandleInterval),
  is_active: flag,
  generated_at: timestamp,
  expires_at: timestamp.nullable().default(null),
});

export const AssetRowSchema = z.object({
  id,
  symbol: z.string().min(1),
  name: z.string(),
  asset_type: z.unknown().transform(parseAssetType),
  sector: textOrNull,
  industry: textOrNull,
  is_active: flag,
});

const WatchlistItemRowSchema = z.object({
  position: z.number().int().nullable().default(null),
  assets: AssetRowSchema.nullable(),
});

export const WatchlistRowSchema = z.object({
  id,
  user_id: id,
  name: z.string(),
  description: textOrNull,
  is_default: flag,
  watchlist_items: z.array(WatchlistItemRowSchema).nullable().transform((v) => v ?? []),
});

function parseRow<T extends z.ZodTypeAny>(schema: T, table: string, row: unknown): z.output<T> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new ComputationError(`${table} 행 파싱 실패`, { cause: parsed.error });
  }
  return parsed.data;
}

function parseRows<T extends z.ZodTypeAny>(schema: T, table: string, rows: unknown): z.output<T>[] {
  if (!Array.isArray(rows)) return [];
  return rows.map((row: unknown) => parseRow(schema, table, row));
}

export function parseCandleRows(rows: unknown): CandleRecord[] {
  return parseRows(CandleRowSchema, 'candles', rows);
}

export function parseIndicatorRows(rows: unknown): IndicatorSnapshot[] {
  return parseRows(IndicatorRowSchema, 'technical_indicators', rows);
}

export function parseSignalRow(row: unknown): SignalRecord {
  return parseRow(SignalRowSchema, 'signals', row);
}

export function parseSignalRows(rows: unknown): SignalRecord[] {
  return parseRows(SignalRowSchema, 'signals', rows);
}

export function parseAssetRow(row: unknown): AssetRecord {
  return parseRow(AssetRowSchema, 'assets', row);
}

export function parseAssetRows(rows: unknown): AssetRecord[] {
  return parseRows(AssetRowSchema, 'assets', rows);
}

/**
 * 워치리스트 + 임베드된 watchlist_items(assets) 행
 * - position 오름차순, 자산이 삭제된 항목은 제외
 */
export function parseWatchlistRow(row: unknown): WatchlistRecord {
  const parsed = parseRow(WatchlistRowSchema, 'watchlists', row);

  const items = [...parsed.watchlist_items].sort(
    (a, b) => (a.position ?? Number.MAX_SAFE_INTEGER) - (b.position ?? Number.MAX_SAFE_INTEGER),
  );

  const assets: AssetRecord[] = [];
  for (const item of items) {
    if (item.assets) assets.push(item.assets);
  }

  return {
    id: parsed.id,
    user_id: parsed.user_id,
    name: parsed.name,
    description: parsed.description,
    is_default: parsed.is_default,
    assets,
  };
}
