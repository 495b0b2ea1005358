import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

export function normalizeUtcIso(utcLike: string): string {
  if (utcLike.endsWith('Z')) return utcLike;
  if (/[+-]\d{2}:\d{2}$/.test(utcLike)) return utcLike;
  return `${utcLike}Z`;
}

/**
 * ISO 문자열(또는 DateTime)을 UTC DateTime 으로 파싱
 * - 타임존 표기가 없는 DB 타임스탬프는 UTC 로 간주한다.
 */
export function parseUtc(value: string | DateTime): DateTime {
  const dt =
    typeof value === 'string'
      ? DateTime.fromISO(normalizeUtcIso(value.replace(' ', 'T')), { setZone: true })
      : value;

  if (!dt.isValid) throw new Error(`ISO 파싱 실패: ${String(value)}`);
  return dt.toUTC();
}

export function toIsoString(value: string | DateTime): string {
  const iso = parseUtc(value).toISO();
  if (!iso) throw new Error('ISO 변환 실패');
  return iso;
}

export function toMillis(value: string | DateTime): number {
  return parseUtc(value).toMillis();
}

/**
 * 기준 시각에서 N일 전 ISO 시각
 */
export function isoDaysBefore(value: string | DateTime, days: number): string {
  return toIsoString(parseUtc(value).minus({ days }));
}

export function isoHoursAfter(value: string | DateTime, hours: number): string {
  return toIsoString(parseUtc(value).plus({ hours }));
}
