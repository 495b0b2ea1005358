import { describe, it, expect } from 'vitest';
import { isoDaysBefore, isoHoursAfter, toIsoString, toMillis } from '../date.js';

describe('date helpers', () => {
  it('타임존 없는 DB 타임스탬프는 UTC 로 간주해야 함', () => {
    expect(toIsoString('2026-05-01 09:30:00')).toBe('2026-05-01T09:30:00.000Z');
    expect(toIsoString('2026-05-01T09:30:00+09:00')).toBe('2026-05-01T00:30:00.000Z');
  });

  it('N일 전 / N시간 후를 계산해야 함', () => {
    expect(isoDaysBefore('2026-05-01T00:00:00Z', 30)).toBe('2026-04-01T00:00:00.000Z');
    expect(isoHoursAfter('2026-05-01T00:00:00Z', 24)).toBe('2026-05-02T00:00:00.000Z');
  });

  it('잘못된 문자열은 예외를 던져야 함', () => {
    expect(() => toMillis('not-a-date')).toThrow('ISO 파싱 실패');
  });
});
