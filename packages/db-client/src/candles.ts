import type { SupabaseClient } from '@supabase/supabase-js';
import type { CandleInterval } from '@trading-analytics/trading-utils';
import { parseCandleRows } from './schemas.js';
import type { CandleStore } from './store.js';
import type { CandleQuery, CandleRecord } from './types.js';

const CANDLE_COLUMNS = 'asset_id,interval,ts,open,high,low,close,volume,trades,vwap';

export function createCandleRepository(supabase: SupabaseClient): CandleStore {
  return {
    /**
     * 캔들 조회
     * - limit 이 있으면 조건에 맞는 최신 N개를 내림차순으로 받아 뒤집는다. (0 이하는 빈 결과)
     */
    async getCandles(
      assetId: string,
      interval: CandleInterval,
      query: CandleQuery = {},
    ): Promise<CandleRecord[]> {
      const latestFirst = query.limit !== undefined;
      if (query.limit !== undefined && Math.floor(query.limit) <= 0) return [];

      let request = supabase
        .from('candles')
        .select(CANDLE_COLUMNS)
        .eq('asset_id', assetId)
        .eq('interval', interval);

      if (query.since) request = request.gte('ts', query.since);
      if (query.until) request = request.lte('ts', query.until);

      request = request.order('ts', { ascending: !latestFirst });

      if (query.limit !== undefined) {
        request = request.limit(Math.floor(query.limit));
      }

      const { data, error } = await request;

      if (error) {
        throw new Error(`Failed to fetch candles: ${error.message}`);
      }

      const rows = parseCandleRows(data);
      return latestFirst ? rows.reverse() : rows;
    },
  };
}
