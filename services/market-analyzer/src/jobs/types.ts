import {
  formatUnknownError,
  InsufficientDataError,
  InvalidEnumError,
  NotFoundError,
} from '@trading-analytics/shared-utils';

export type BatchErrorKind = 'not_found' | 'invalid_enum' | 'insufficient_data' | 'computation';

/**
 * 자산 단위 실패 (배치는 계속 진행)
 * - asset_id 가 null 이면 대상 자산 목록 조회 자체가 실패한 경우
 */
export interface BatchError {
  asset_id: string | null;
  symbol: string | null;
  kind: BatchErrorKind;
  message: string;
}

/**
 * - processed: 분석까지 끝난 자산 수 (스킵 제외)
 * - created: 저장된 행 수 (지표 스냅샷 / 시그널)
 * - skipped: 데이터 부족 등으로 건너뛴 자산 수
 */
export interface BatchResult {
  processed: number;
  created: number;
  skipped: number;
  errors: BatchError[];
}

export function createBatchResult(): BatchResult {
  return { processed: 0, created: 0, skipped: 0, errors: [] };
}

function classifyError(error: unknown): BatchErrorKind {
  if (error instanceof NotFoundError) return 'not_found';
  if (error instanceof InvalidEnumError) return 'invalid_enum';
  if (error instanceof InsufficientDataError) return 'insufficient_data';
  return 'computation';
}

export function toBatchError(
  target: { id: string | null; symbol: string | null },
  error: unknown,
): BatchError {
  return {
    asset_id: target.id,
    symbol: target.symbol,
    kind: classifyError(error),
    message: formatUnknownError(error),
  };
}
