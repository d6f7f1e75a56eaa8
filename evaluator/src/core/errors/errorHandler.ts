/**
 * 위협 평가기 에러 처리
 * 치명/복구 가능 에러 분류 및 로깅
 */

/**
 * 에러 코드 정의
 */
export enum EvaluatorErrorCode {
  // 설정/연결 (치명적)
  CONFIG_INVALID = 'CONFIG_INVALID',
  STORE_UNREACHABLE = 'STORE_UNREACHABLE',

  // 사이클 단위 (복구 가능)
  FETCH_FAILED = 'FETCH_FAILED',
  PERSIST_FAILED = 'PERSIST_FAILED',

  // 트랙 단위 (복구 가능)
  INVALID_TRACK = 'INVALID_TRACK',

  // 분류되지 않은 에러
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * 에러 메시지 정의
 */
const ERROR_MESSAGES: Record<EvaluatorErrorCode, string> = {
  [EvaluatorErrorCode.CONFIG_INVALID]: '설정이 올바르지 않습니다',
  [EvaluatorErrorCode.STORE_UNREACHABLE]: '트랙 저장소에 연결할 수 없습니다',
  [EvaluatorErrorCode.FETCH_FAILED]: 'LIVE 트랙 조회 실패',
  [EvaluatorErrorCode.PERSIST_FAILED]: '트랙 저장 실패',
  [EvaluatorErrorCode.INVALID_TRACK]: '잘못된 트랙 레코드',
  [EvaluatorErrorCode.INTERNAL_ERROR]: '내부 오류',
};

/**
 * 코드별 기본 메시지 조회
 */
export function getErrorMessage(code: EvaluatorErrorCode): string {
  return ERROR_MESSAGES[code];
}

// ============================================
// 에러 클래스
// ============================================

export interface EvaluatorErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * 평가기 에러 기본 클래스
 */
export class EvaluatorError extends Error {
  readonly code: EvaluatorErrorCode;
  readonly fatal: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: EvaluatorErrorCode,
    fatal: boolean,
    message?: string,
    options: EvaluatorErrorOptions = {}
  ) {
    super(message ?? ERROR_MESSAGES[code], { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.fatal = fatal;
    this.details = options.details;
  }
}

/** 설정 검증 실패 (치명적) */
export class ConfigError extends EvaluatorError {
  constructor(message?: string, options?: EvaluatorErrorOptions) {
    super(EvaluatorErrorCode.CONFIG_INVALID, true, message, options);
  }
}

/** 저장소 연결/세션 획득 실패 (치명적) */
export class ConnectionError extends EvaluatorError {
  constructor(message?: string, options?: EvaluatorErrorOptions) {
    super(EvaluatorErrorCode.STORE_UNREACHABLE, true, message, options);
  }
}

/** 사이클 조회 실패 - 해당 사이클만 건너뜀 */
export class FetchError extends EvaluatorError {
  constructor(message?: string, options?: EvaluatorErrorOptions) {
    super(EvaluatorErrorCode.FETCH_FAILED, false, message, options);
  }
}

/** 트랙 레코드 데이터 오류 - 해당 트랙만 건너뜀 */
export class DataError extends EvaluatorError {
  constructor(message?: string, options?: EvaluatorErrorOptions) {
    super(EvaluatorErrorCode.INVALID_TRACK, false, message, options);
  }
}

/** 쓰기 실패 - 다음 사이클에서 재계산 */
export class PersistError extends EvaluatorError {
  constructor(message?: string, options?: EvaluatorErrorOptions) {
    super(EvaluatorErrorCode.PERSIST_FAILED, false, message, options);
  }
}

/**
 * 치명적 에러 여부
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof EvaluatorError && error.fatal;
}

/**
 * 임의의 에러를 평가기 에러로 변환 (분류되지 않은 에러는 복구 가능으로 취급)
 */
export function toEvaluatorError(error: unknown): EvaluatorError {
  if (error instanceof EvaluatorError) {
    return error;
  }
  return new EvaluatorError(EvaluatorErrorCode.INTERNAL_ERROR, false, describeError(error), {
    cause: error,
  });
}

/**
 * 에러 메시지 문자열 추출
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// ============================================
// 에러 로거
// ============================================

export interface ErrorRecord {
  code: EvaluatorErrorCode;
  timestamp: number;
  message: string;
  trackId?: string;
}

const MAX_RECENT_ERRORS = 100;

/**
 * 에러 로거
 */
export class ErrorLogger {
  private errorCounts: Map<EvaluatorErrorCode, number> = new Map();
  private lastErrors: ErrorRecord[] = [];

  /**
   * 에러 기록
   */
  log(error: EvaluatorError, trackId?: string): void {
    const count = this.errorCounts.get(error.code) ?? 0;
    this.errorCounts.set(error.code, count + 1);

    this.lastErrors.push({
      code: error.code,
      timestamp: Date.now(),
      message: error.message,
      trackId,
    });

    if (this.lastErrors.length > MAX_RECENT_ERRORS) {
      this.lastErrors.shift();
    }

    const target = trackId ? `, Track: ${trackId}` : '';
    const cause = error.cause !== undefined ? describeError(error.cause) : '';
    console.error(`[Evaluator Error] ${error.message} (Code: ${error.code}${target})`, cause);
  }

  /**
   * 코드별 누적 에러 수
   */
  getCount(code: EvaluatorErrorCode): number {
    return this.errorCounts.get(code) ?? 0;
  }

  /**
   * 최근 에러 조회
   */
  getRecentErrors(limit: number = 10): ErrorRecord[] {
    return this.lastErrors.slice(-limit);
  }

  /**
   * 에러 통계 출력
   */
  printStats(): void {
    if (this.errorCounts.size === 0) return;

    console.log('========================================');
    console.log('  위협 평가기 에러 통계');
    console.log('========================================');

    for (const [code, count] of this.errorCounts.entries()) {
      console.log(`  ${ERROR_MESSAGES[code]}: ${count}회`);
    }

    console.log('========================================');
  }

  /**
   * 통계 초기화
   */
  reset(): void {
    this.errorCounts.clear();
    this.lastErrors = [];
  }
}
