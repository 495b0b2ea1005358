import { createLogger } from '@trading-analytics/shared-utils';
import { createAssetRepository } from './assets.js';
import { createCandleRepository } from './candles.js';
import { createDbClient, type DbClientConfig } from './client.js';
import { createIndicatorRepository } from './indicators.js';
import { createSignalRepository } from './signals.js';
import type { MarketDataStore } from './store.js';
import { createWatchlistRepository } from './watchlists.js';

const logger = createLogger('db-client');

/**
 * Supabase(PostgREST) 기반 저장소
 * - signals 교체는 sql/signal_functions.sql 의 supersede_signal 함수가 필요하다.
 */
export function createSupabaseStore(config: DbClientConfig): MarketDataStore {
  const supabase = createDbClient(config);

  return {
    kind: 'supabase',
    candles: createCandleRepository(supabase),
    indicators: createIndicatorRepository(supabase),
    signals: createSignalRepository(supabase),
    assets: createAssetRepository(supabase),
    watchlists: createWatchlistRepository(supabase),

    async init(): Promise<void> {
      const { count, error } = await supabase
        .from('assets')
        .select('id', { count: 'exact', head: true });

      if (error) {
        throw new Error(`Supabase 연결 확인 실패: ${error.message}`);
      }

      logger.info('Supabase 저장소 준비 완료', { assets: count ?? 0 });
    },
  };
}
