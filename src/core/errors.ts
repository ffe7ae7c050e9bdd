/**
 * 오류 타입 정의
 *
 * 작업을 중단시키는 모든 도메인 오류는 TimeUsageError를 상속합니다.
 * code는 로그와 종료 코드 매핑에 사용하는 고정 문자열입니다.
 */

export type TimeUsageErrorCode = 'LOAD_ERROR' | 'SCHEMA_ERROR' | 'PIPELINE_ERROR' | 'CONFIG_ERROR';

/**
 * 도메인 오류 기본 클래스
 */
export class TimeUsageError extends Error {
  readonly code: TimeUsageErrorCode;

  constructor(code: TimeUsageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TimeUsageError';
    this.code = code;
  }
}

/**
 * CSV를 읽을 수 없거나 헤더가 잘못된 경우
 */
export class LoadError extends TimeUsageError {
  /** 읽으려던 경로 (문자열 입력이면 '<inline>') */
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown; code?: TimeUsageErrorCode }) {
    super(options?.code ?? 'LOAD_ERROR', message, options);
    this.name = 'LoadError';
    this.source = source;
  }
}

/**
 * 필수 컬럼이 없거나 숫자로 캐스팅할 수 없는 값이 있는 경우
 *
 * 식별자 컬럼 누락은 로드 실패이기도 하므로 LoadError를 상속합니다.
 */
export class SchemaError extends LoadError {
  /** 문제가 된 컬럼 */
  readonly column: string;

  constructor(source: string, column: string, message: string) {
    super(source, message, { code: 'SCHEMA_ERROR' });
    this.name = 'SchemaError';
    this.column = column;
  }
}

/**
 * 앞 단계의 결과 없이 Transformer가 실행된 경우
 */
export class PipelineError extends TimeUsageError {
  constructor(message: string) {
    super('PIPELINE_ERROR', message);
    this.name = 'PipelineError';
  }
}

/**
 * 설정 검증 실패
 */
export class ConfigError extends TimeUsageError {
  /** 검증에 실패한 필드별 메시지 */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
