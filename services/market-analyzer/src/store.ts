import { createMemoryStore, createSupabaseStore, type MarketDataStore } from '@trading-analytics/db-client';
import type { AnalyzerConfig } from './config/env.js';

/**
 * 설정에 맞는 저장소 핸들 생성 (init 은 호출자가 수행)
 */
export function createStore(config: Pick<AnalyzerConfig, 'store' | 'supabase'>): MarketDataStore {
  switch (config.store) {
    case 'memory':
      return createMemoryStore();
    case 'supabase':
      if (!config.supabase) throw new Error('ANALYZER_STORE=supabase 에는 SUPABASE_URL/SUPABASE_KEY 가 필요합니다');
      return createSupabaseStore(config.supabase);
  }
}
