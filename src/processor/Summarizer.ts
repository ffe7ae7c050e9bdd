/**
 * Summarizer - 응답자별 요약
 *
 * 각 버킷의 활동 시간(분)을 합산해 시간 단위로 바꾸고,
 * 통제 코드(고용 상태, 성별, 나이)를 범주 레이블로 투영합니다.
 *
 * 결과 컬럼:
 * - working: 1 <= telfs < 3 이면 "working", 아니면 "not working"
 * - sex: tesex = 1 이면 "male", 아니면 "female"
 * - age: 15~22 "young", 23~55 "active", 그 외 "elder" (앞에서부터 첫 일치)
 * - primaryNeeds: 기본 욕구 합계 / 60 (반올림하지 않음)
 * - work, other: 합계 / 60 을 정수로 반올림
 *
 * primaryNeeds는 응답자 단위에서 반올림하지 않습니다.
 */

import type { ClassifiedColumns, DataTable } from '../types';
import { MINUTES_PER_HOUR, SUMMARY_COLUMNS, TIME_USAGE_SCHEMA } from '../types';
import { betweenExpr, columnRef, sumExpr } from './expressions';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'Summarizer' });

// =============================================================================
// 옵션
// =============================================================================

export interface SummarizeOptions {
  /**
   * 이 값보다 큰 고용 상태 코드는 제외 (기본값: 4)
   *
   * 노동력 분류 밖의 응답자를 걸러냅니다. 문서상 의도는 코드 5만
   * 제외하는 것이지만, 적용되는 필터는 "4 이하만 허용"입니다.
   */
  maxEmploymentCode?: number;
}

export const DEFAULT_SUMMARIZE_OPTIONS: Required<SummarizeOptions> = {
  maxEmploymentCode: 4,
};

// =============================================================================
// 표현식
// =============================================================================

const EMPLOYMENT = columnRef(TIME_USAGE_SCHEMA.employment);
const SEX = columnRef(TIME_USAGE_SCHEMA.sex);

/** 적격성 필터 */
const ELIGIBILITY_EXPR = `(d, $) => ${EMPLOYMENT} <= $.maxEmploymentCode`;

/** 레이블 투영 */
const LABEL_EXPRS = {
  working: `d => ${EMPLOYMENT} >= 1 && ${EMPLOYMENT} < 3 ? 'working' : 'not working'`,
  sex: `d => ${SEX} === 1 ? 'male' : 'female'`,
  age:
    `d => ${betweenExpr(TIME_USAGE_SCHEMA.age, 15, 22)} ? 'young'` +
    ` : ${betweenExpr(TIME_USAGE_SCHEMA.age, 23, 55)} ? 'active'` +
    ` : 'elder'`,
} as const;

/**
 * 버킷 합계 → 시간 표현식
 */
function hoursExpr(columns: readonly string[], rounded: boolean): string {
  const hours = `${sumExpr(columns)} / ${MINUTES_PER_HOUR}`;
  return rounded ? `d => op.round_half_up(${hours}, 0)` : `d => ${hours}`;
}

// =============================================================================
// 요약
// =============================================================================

/**
 * 응답자별 요약 테이블 생성
 *
 * 적격 응답자 한 명당 정확히 한 행을 만듭니다.
 *
 * @param classified - 분류된 컬럼 집합
 * @param table - 로더가 만든 테이블
 */
export function summarize(
  classified: ClassifiedColumns,
  table: DataTable,
  options: SummarizeOptions = {}
): DataTable {
  const maxEmploymentCode = options.maxEmploymentCode ?? DEFAULT_SUMMARIZE_OPTIONS.maxEmploymentCode;

  const summary = table
    .params({ maxEmploymentCode })
    .filter(ELIGIBILITY_EXPR)
    .derive({
      ...LABEL_EXPRS,
      primaryNeeds: hoursExpr(classified.primaryNeeds, false),
      work: hoursExpr(classified.work, true),
      other: hoursExpr(classified.other, true),
    })
    .select(...SUMMARY_COLUMNS);

  log.debug(
    {
      inputRows: table.numRows(),
      eligibleRows: summary.numRows(),
      buckets: {
        primaryNeeds: classified.primaryNeeds.length,
        work: classified.work.length,
        other: classified.other.length,
      },
    },
    'Respondents summarized'
  );

  return summary;
}
