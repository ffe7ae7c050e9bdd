/**
 * 시간 사용 조사 도메인 타입
 *
 * 분류된 컬럼 집합, 요약 레코드, 그룹 집계 결과를 정의합니다.
 */

// ============================================================================
// 스키마 상수
// ============================================================================

/**
 * 원본 CSV에서 이름이 고정된 컬럼들
 */
export const TIME_USAGE_SCHEMA = {
  /** 응답자 식별자 (항상 텍스트) */
  identifier: 'tucaseid',

  /** 고용 상태 코드 */
  employment: 'telfs',

  /** 성별 코드 */
  sex: 'tesex',

  /** 나이 코드 */
  age: 'teage',
} as const;

/** 분 → 시간 변환 계수 */
export const MINUTES_PER_HOUR = 60;

// ============================================================================
// 컬럼 분류
// ============================================================================

/**
 * 활동 버킷 이름
 */
export type Bucket = 'primaryNeeds' | 'work' | 'other';

/**
 * 분류된 컬럼 집합
 *
 * 세 집합은 서로소이며, 어떤 규칙에도 맞지 않는 컬럼은 포함되지 않습니다.
 */
export type ClassifiedColumns = Readonly<Record<Bucket, readonly string[]>>;

// ============================================================================
// 레이블
// ============================================================================

export type WorkingLabel = 'working' | 'not working';

export type SexLabel = 'male' | 'female';

export type AgeLabel = 'young' | 'active' | 'elder';

export const WORKING_LABELS: readonly WorkingLabel[] = ['not working', 'working'];
export const SEX_LABELS: readonly SexLabel[] = ['female', 'male'];
export const AGE_LABELS: readonly AgeLabel[] = ['active', 'elder', 'young'];

/**
 * 그룹 키 컬럼 (정렬 순서이기도 함)
 */
export const GROUP_KEY_COLUMNS = ['working', 'sex', 'age'] as const;

/**
 * 요약/집계 결과의 컬럼 순서
 */
export const SUMMARY_COLUMNS = ['working', 'sex', 'age', 'primaryNeeds', 'work', 'other'] as const;

export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

// ============================================================================
// 레코드
// ============================================================================

/**
 * 요약 데이터의 한 행
 *
 * 응답자별 요약(Summary Record)과 그룹별 평균(Group Aggregate)이
 * 같은 모양을 사용합니다.
 */
export interface TimeUsageRow {
  /** 고용 상태 ("working" 또는 "not working") */
  readonly working: WorkingLabel;

  /** 성별 ("male" 또는 "female") */
  readonly sex: SexLabel;

  /** 생애 주기 ("young", "active", "elder") */
  readonly age: AgeLabel;

  /** 기본 욕구(수면, 식사 등)에 쓴 시간 */
  readonly primaryNeeds: number;

  /** 일에 쓴 시간 */
  readonly work: number;

  /** 그 외 활동(여가 등)에 쓴 시간 */
  readonly other: number;
}

/**
 * 그룹 키 (고용 상태, 성별, 생애 주기)
 */
export type GroupKey = Pick<TimeUsageRow, 'working' | 'sex' | 'age'>;

/**
 * 비어 있는 그룹 경고
 *
 * 적격 응답자 중 해당 조합이 한 명도 없을 때 생성됩니다.
 * 오류가 아니며 결과에서 해당 행이 빠질 뿐입니다.
 */
export interface EmptyGroupWarning {
  readonly kind: 'empty-group';
  readonly key: GroupKey;
}

/**
 * 그룹 집계 방식
 * - 'expression': Arquero 컬럼 표현식 (기본값)
 * - 'sql': SQLite에서 실행하는 SQL 쿼리
 * - 'typed': TimeUsageRow 배열 위에서 Map으로 집계
 */
export type GroupingMethod = 'expression' | 'sql' | 'typed';

/**
 * 리포트 출력 형식
 */
export type ReportFormat = 'markdown' | 'csv' | 'json';
