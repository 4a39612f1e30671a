/**
 * 합성 엔진 에러 핸들링
 * 에러 코드 테이블 + 에러 기록
 */

/**
 * 에러 코드 정의
 */
export enum ErrorCode {
  // 레지스트리 관련
  NOT_FOUND = 'NOT_FOUND',
  DUPLICATE_ID = 'DUPLICATE_ID',
  UNKNOWN_CATEGORY = 'UNKNOWN_CATEGORY',

  // 입력 관련
  MALFORMED_INPUT = 'MALFORMED_INPUT',
  INVALID_PARAMETER = 'INVALID_PARAMETER',
}

/**
 * 에러 메시지 정의
 */
const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.NOT_FOUND]: 'ID not found in simulation',
  [ErrorCode.DUPLICATE_ID]: 'ID already exists',
  [ErrorCode.UNKNOWN_CATEGORY]: 'Category does not exist',
  [ErrorCode.MALFORMED_INPUT]: 'Malformed input',
  [ErrorCode.INVALID_PARAMETER]: 'Invalid pattern parameter',
};

/**
 * 합성 엔진 에러
 *
 * message는 코드별 고정 메시지에 상세 정보를 덧붙인 형태
 */
export class SynthesisError extends Error {
  readonly code: ErrorCode;
  readonly details?: string;

  constructor(code: ErrorCode, details?: string) {
    super(details ? `${ERROR_MESSAGES[code]}: ${details}` : ERROR_MESSAGES[code]);
    this.name = 'SynthesisError';
    this.code = code;
    this.details = details;
  }
}

export function notFound(id: string): SynthesisError {
  return new SynthesisError(ErrorCode.NOT_FOUND, id);
}

export function invalidParameter(details: string): SynthesisError {
  return new SynthesisError(ErrorCode.INVALID_PARAMETER, details);
}

export function malformedInput(details: string): SynthesisError {
  return new SynthesisError(ErrorCode.MALFORMED_INPUT, details);
}

export function isSynthesisError(error: unknown): error is SynthesisError {
  return error instanceof SynthesisError;
}

/** 기록된 에러 한 건 */
export interface ErrorRecord {
  code: ErrorCode;
  timestamp: number;
  context: string;   // 실행 그룹 이름 등
  details?: string;
}

/**
 * 에러 기록기 (실행 요약용)
 */
export class ErrorLogger {
  private static instance: ErrorLogger | null = null;
  private errorCounts: Map<ErrorCode, number> = new Map();
  private lastErrors: ErrorRecord[] = [];

  static getInstance(): ErrorLogger {
    if (!ErrorLogger.instance) {
      ErrorLogger.instance = new ErrorLogger();
    }
    return ErrorLogger.instance;
  }

  /**
   * 에러 기록
   */
  log(error: SynthesisError, context: string): void {
    const count = this.errorCounts.get(error.code) || 0;
    this.errorCounts.set(error.code, count + 1);

    // 최근 에러 기록 (최대 100개)
    this.lastErrors.push({
      code: error.code,
      timestamp: Date.now(),
      context,
      details: error.details,
    });

    if (this.lastErrors.length > 100) {
      this.lastErrors.shift();
    }

    console.error(`[Error] ${ERROR_MESSAGES[error.code]} (Code: ${error.code}, Context: ${context})`, error.details || '');
  }

  /**
   * 에러 통계 출력
   */
  printStats(): void {
    if (this.errorCounts.size === 0) return;

    console.log('========================================');
    console.log('  에러 통계');
    console.log('========================================');

    for (const [code, count] of this.errorCounts.entries()) {
      console.log(`  ${ERROR_MESSAGES[code]}: ${count}회`);
    }

    console.log('========================================');
  }

  getCount(code: ErrorCode): number {
    return this.errorCounts.get(code) || 0;
  }

  /**
   * 최근 에러 조회
   */
  getRecentErrors(limit: number = 10): ErrorRecord[] {
    return this.lastErrors.slice(-limit);
  }

  /**
   * 기록 초기화
   */
  clear(): void {
    this.errorCounts.clear();
    this.lastErrors = [];
  }
}
