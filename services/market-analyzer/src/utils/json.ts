import Big from 'big.js';

/**
 * 전송용 값 정리
 * - NaN / ±Infinity → null
 * - Big → number, Date → ISO 문자열
 * - 배열과 일반 객체는 재귀적으로 처리
 */
export function toJsonSafe(value: unknown): unknown {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value instanceof Big) return toJsonSafe(value.toNumber());
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonSafe);

  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = toJsonSafe(v);
    }
    return out;
  }

  return value;
}
