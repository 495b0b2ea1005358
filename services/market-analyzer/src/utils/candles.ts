import type { CandleRecord } from '@trading-analytics/db-client';
import type { Candle } from '@trading-analytics/trading-utils';

export function toCandle(record: CandleRecord): Candle {
  return {
    time: record.ts,
    open: record.open,
    high: record.high,
    low: record.low,
    close: record.close,
    volume: record.volume,
  };
}
