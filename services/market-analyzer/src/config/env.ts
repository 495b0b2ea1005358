import { z } from 'zod';
import {
  envBoolean,
  envNumber,
  InvalidEnumError,
  env as readEnv,
  requireEnv,
} from '@trading-analytics/shared-utils';

export const STORE_KINDS = ['supabase', 'memory'] as const;
const StoreKindSchema = z.enum(STORE_KINDS);
export type StoreKind = z.infer<typeof StoreKindSchema>;

export type AnalyzerConfig = {
  store: StoreKind;
  supabase: { url: string; key: string } | null;
  indicatorLookbackDays: number;
  signalIndicatorMaxAgeDays: number;
  /** null 이면 시그널에 만료 시각을 두지 않음 */
  signalTtlHours: number | null;
  indicatorIntervalMin: number;
  signalIntervalMin: number;
  expirySweepIntervalMin: number;
  loopMode: boolean;
};

function parseStoreKind(raw: string | undefined): StoreKind {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized) return 'supabase';

  const parsed = StoreKindSchema.safeParse(normalized);
  if (!parsed.success) throw new InvalidEnumError('ANALYZER_STORE', raw, STORE_KINDS);
  return parsed.data;
}

function mustPositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got: ${value}`);
  }
  return value;
}

function mustPositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got: ${value}`);
  }
  return value;
}

/**
 * 환경변수 → 분석 워커 설정 (시작 시 1회)
 * - 잘못된 값은 작업 실행 전에 예외
 */
export function loadAnalyzerConfig(): Readonly<AnalyzerConfig> {
  const store = parseStoreKind(readEnv('ANALYZER_STORE'));
  const ttl = envNumber('SIGNAL_TTL_HOURS');

  return Object.freeze({
    store,
    supabase:
      store === 'supabase'
        ? { url: requireEnv('SUPABASE_URL'), key: requireEnv('SUPABASE_KEY') }
        : null,
    indicatorLookbackDays: mustPositiveInt(
      'INDICATOR_LOOKBACK_DAYS',
      envNumber('INDICATOR_LOOKBACK_DAYS', 100) ?? 100,
    ),
    signalIndicatorMaxAgeDays: mustPositive(
      'SIGNAL_INDICATOR_MAX_AGE_DAYS',
      envNumber('SIGNAL_INDICATOR_MAX_AGE_DAYS', 2) ?? 2,
    ),
    signalTtlHours: ttl === undefined ? null : mustPositive('SIGNAL_TTL_HOURS', ttl),
    indicatorIntervalMin: mustPositiveInt(
      'INDICATOR_INTERVAL_MIN',
      envNumber('INDICATOR_INTERVAL_MIN', 60) ?? 60,
    ),
    signalIntervalMin: mustPositiveInt('SIGNAL_INTERVAL_MIN', envNumber('SIGNAL_INTERVAL_MIN', 60) ?? 60),
    expirySweepIntervalMin: mustPositiveInt(
      'EXPIRY_SWEEP_INTERVAL_MIN',
      envNumber('EXPIRY_SWEEP_INTERVAL_MIN', 15) ?? 15,
    ),
    loopMode: envBoolean('ANALYZER_LOOP_MODE', false),
  });
}
