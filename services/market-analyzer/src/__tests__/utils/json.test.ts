import Big from 'big.js';
import { describe, it, expect } from 'vitest';
import { toJsonSafe } from '../../utils/json.js';

describe('toJsonSafe', () => {
  it('중첩된 NaN / Infinity 를 null 로 바꿔야 함', () => {
    const input = {
      index: Number.NaN,
      assets: [{ change_1d: Number.POSITIVE_INFINITY, last_price: 110, sparkline: [1, Number.NEGATIVE_INFINITY] }],
      label: 'ok',
      missing: null,
    };

    expect(toJsonSafe(input)).toEqual({
      index: null,
      assets: [{ change_1d: null, last_price: 110, sparkline: [1, null] }],
      label: 'ok',
      missing: null,
    });
  });

  it('Big 과 Date 를 변환해야 함', () => {
    expect(toJsonSafe({ ma: new Big('100.25'), at: new Date('2026-05-31T00:00:00.000Z') })).toEqual({
      ma: 100.25,
      at: '2026-05-31T00:00:00.000Z',
    });
  });
});
