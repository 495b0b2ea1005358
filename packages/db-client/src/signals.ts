import type { SupabaseClient } from '@supabase/supabase-js';
import { keepLatestByKey, toMillis } from '@trading-analytics/shared-utils';
import { parseSignalRow, parseSignalRows } from './schemas.js';
import type { SignalStore } from './store.js';
import type { NewSignal, SignalFilter, SignalRecord } from './types.js';

const SIGNAL_COLUMNS =
  'id,asset_id,ts,signal_type,strength,confidence,price,strategy,rationale,indicators_used,timeframe,is_active,generated_at,expires_at';

function countRows(data: unknown): number {
  return Array.isArray(data) ? data.length : 0;
}

export function createSignalRepository(supabase: SupabaseClient): SignalStore {
  return {
    /**
     * supersede_signal(p_signal jsonb) 는 자산 단위 advisory lock 안에서
     * 기존 활성 시그널 비활성화 + 새 시그널 INSERT 를 한 트랜잭션으로 실행한다.
     */
    async supersede(signal: NewSignal): Promise<SignalRecord> {
      const { data, error } = await supabase.rpc('supersede_signal', { p_signal: signal });

      if (error) {
        throw new Error(`Failed to supersede signal: ${error.message}`);
      }

      return parseSignalRow(data);
    },

    async deactivate(ids: string[]): Promise<number> {
      if (ids.length === 0) return 0;

      const { data, error } = await supabase
        .from('signals')
        .update({ is_active: false })
        .in('id', ids)
        .eq('is_active', true)
        .select('id');

      if (error) {
        throw new Error(`Failed to deactivate signals: ${error.message}`);
      }

      return countRows(data);
    },

    async deactivateExpired(now: string): Promise<number> {
      const { data, error } = await supabase
        .from('signals')
        .update({ is_active: false })
        .eq('is_active', true)
        .not('expires_at', 'is', null)
        .lte('expires_at', now)
        .select('id');

      if (error) {
        throw new Error(`Failed to deactivate expired signals: ${error.message}`);
      }

      return countRows(data);
    },

    async getActiveSignal(assetId: string): Promise<SignalRecord | null> {
      const { data, error } = await supabase
        .from('signals')
        .select(SIGNAL_COLUMNS)
        .eq('asset_id', assetId)
        .eq('is_active', true);

      if (error) {
        throw new Error(`Failed to fetch active signal: ${error.message}`);
      }

      const latest = keepLatestByKey(
        parseSignalRows(data),
        (s) => s.asset_id,
        (s) => toMillis(s.ts),
      );
      return latest.get(assetId) ?? null;
    },

    async listSignals(filter: SignalFilter): Promise<SignalRecord[]> {
      let query = supabase.from('signals').select(SIGNAL_COLUMNS);

      if (filter.assetIds) query = query.in('asset_id', filter.assetIds);
      if (filter.signalType) query = query.eq('signal_type', filter.signalType);
      if (filter.isActive !== undefined) query = query.eq('is_active', filter.isActive);
      if (filter.start) query = query.gte('ts', filter.start);
      if (filter.end) query = query.lte('ts', filter.end);

      query = query.order('ts', { ascending: false });
      if (filter.limit !== undefined) query = query.limit(filter.limit);

      const { data, error } = await query;

      if (error) {
        throw new Error(`Failed to list signals: ${error.message}`);
      }

      return parseSignalRows(data);
    },
  };
}
