import type { SupabaseClient } from '@supabase/supabase-js';
import { parseIndicatorRows } from './schemas.js';
import type { IndicatorStore } from './store.js';
import type { IndicatorFilter, IndicatorSnapshot, NewIndicatorSnapshot } from './types.js';

const INDICATOR_COLUMNS =
  'id,asset_id,ts,indicator_type,name,primary_value,secondary_value,tertiary_value,parameters,timeframe,computed_at';

export function createIndicatorRepository(supabase: SupabaseClient): IndicatorStore {
  return {
    /**
     * 지표 스냅샷 일괄 저장 (append-only)
     * - (asset_id, name, ts) 가 이미 있으면 기존 행을 유지하고 건너뛴다.
     * @returns 실제로 추가된 행
     */
    async putIndicators(snapshots: NewIndicatorSnapshot[]): Promise<IndicatorSnapshot[]> {
      if (snapshots.length === 0) return [];

      const { data, error } = await supabase
        .from('technical_indicators')
        .upsert(snapshots, { onConflict: 'asset_id,name,ts', ignoreDuplicates: true })
        .select(INDICATOR_COLUMNS);

      if (error) {
        throw new Error(`Failed to insert indicators: ${error.message}`);
      }

      return parseIndicatorRows(data);
    },

    async getIndicatorsSince(assetId: string, since: string): Promise<IndicatorSnapshot[]> {
      const { data, error } = await supabase
        .from('technical_indicators')
        .select(INDICATOR_COLUMNS)
        .eq('asset_id', assetId)
        .gte('ts', since)
        .order('ts', { ascending: false });

      if (error) {
        throw new Error(`Failed to fetch indicators: ${error.message}`);
      }

      return parseIndicatorRows(data);
    },

    async listIndicators(filter: IndicatorFilter): Promise<IndicatorSnapshot[]> {
      let query = supabase
        .from('technical_indicators')
        .select(INDICATOR_COLUMNS)
        .eq('asset_id', filter.assetId);

      if (filter.name) query = query.eq('name', filter.name);
      if (filter.indicatorType) query = query.eq('indicator_type', filter.indicatorType);
      if (filter.start) query = query.gte('ts', filter.start);
      if (filter.end) query = query.lte('ts', filter.end);

      query = query.order('ts', { ascending: false });
      if (filter.limit !== undefined) query = query.limit(filter.limit);

      const { data, error } = await query;

      if (error) {
        throw new Error(`Failed to list indicators: ${error.message}`);
      }

      return parseIndicatorRows(data);
    },
  };
}
