import type { AssetRecord, MarketDataStore } from '@trading-analytics/db-client';
import { NotFoundError } from '@trading-analytics/shared-utils';
import { toBatchError, type BatchResult } from './types.js';

/**
 * 배치 대상 자산
 * - assetId 지정: 해당 자산 1건 (없으면 not_found 에러를 남기고 빈 목록)
 * - 미지정: 활성 자산 전체
 * - 조회 실패는 결과의 에러로 기록하고 빈 목록
 */
export async function resolveTargetAssets(
  store: MarketDataStore,
  assetId: string | undefined,
  result: BatchResult,
): Promise<AssetRecord[]> {
  try {
    if (assetId === undefined) return await store.assets.listActiveAssets();

    const asset = await store.assets.getAsset(assetId);
    if (!asset) {
      result.errors.push(toBatchError({ id: assetId, symbol: null }, new NotFoundError('Asset', assetId)));
      return [];
    }
    return [asset];
  } catch (error: unknown) {
    result.errors.push(toBatchError({ id: assetId ?? null, symbol: null }, error));
    return [];
  }
}
