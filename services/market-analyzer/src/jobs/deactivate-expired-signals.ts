import type { MarketDataStore } from '@trading-analytics/db-client';
import { createLogger, formatUnknownError, nowIso } from '@trading-analytics/shared-utils';

const logger = createLogger('market-analyzer');

export interface ExpirySweepResult {
  deactivated_count: number;
  error: string | null;
}

/**
 * 만료 시그널 정리
 * - expires_at <= now 인 활성 시그널을 한 번의 UPDATE 로 비활성화
 * - 멱등: 다시 실행해도 이미 비활성인 시그널은 건드리지 않는다.
 */
export async function deactivateExpiredSignals(
  store: MarketDataStore,
  options: { now?: string } = {},
): Promise<ExpirySweepResult> {
  const now = options.now ?? nowIso();

  try {
    const count = await store.signals.deactivateExpired(now);
    if (count > 0) logger.info('만료 시그널 비활성화', { deactivated: count });
    return { deactivated_count: count, error: null };
  } catch (error: unknown) {
    logger.error('만료 시그널 정리 실패', error);
    return { deactivated_count: 0, error: formatUnknownError(error) };
  }
}
