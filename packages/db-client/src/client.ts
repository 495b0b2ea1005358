import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface DbClientConfig {
  url: string;
  key: string;
}

/**
 * Supabase 클라이언트 생성
 * - 서버 워커 전용: 세션 저장/자동 갱신 비활성화
 */
export function createDbClient(config: DbClientConfig): SupabaseClient {
  return createClient(config.url, config.key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export type { SupabaseClient };
