/**
 * 분석 파이프라인 에러 분류
 *
 * - InsufficientDataError: 지표 기간보다 캔들이 적음 (에러가 아닌 스킵 조건)
 * - NotFoundError: 참조한 자산/워치리스트 없음
 * - ComputationError: 자산 단위 계산/저장 실패 (배치 전체를 중단하지 않음)
 * - InvalidEnumError: 알 수 없는 interval/indicator/signal 토큰
 */

export class InsufficientDataError extends Error {
  required: number;
  actual: number;

  constructor(label: string, required: number, actual: number) {
    super(`${label} 계산에 최소 ${required}개의 데이터가 필요합니다. 현재: ${actual}개`);
    this.name = 'InsufficientDataError';
    this.required = required;
    this.actual = actual;
  }
}

export class NotFoundError extends Error {
  entity: string;
  id: string;

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

export class ComputationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ComputationError';
  }
}

export class InvalidEnumError extends Error {
  enumName: string;
  token: unknown;

  constructor(enumName: string, token: unknown, allowed: readonly string[]) {
    super(`${enumName} must be one of ${allowed.join('|')}, got: ${String(token)}`);
    this.name = 'InvalidEnumError';
    this.enumName = enumName;
    this.token = token;
  }
}

export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error) {
      return `${error.message} (cause: ${cause.message})`;
    }
    if (cause !== undefined && cause !== null) {
      return `${error.message} (cause: ${String(cause)})`;
    }
    return error.message;
  }
  return String(error);
}
