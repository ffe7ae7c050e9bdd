/**
 * Grouper - 그룹별 평균
 *
 * 요약 레코드를 (고용 상태, 성별, 생애 주기)로 묶어
 * 세 시간 합계의 평균을 소수 첫째 자리까지 반올림합니다.
 *
 * 같은 결과를 내는 세 가지 구현이 있습니다:
 * - groupAverage: Arquero groupby/rollup (기본)
 * - groupAverageTyped: TimeUsageRow 배열 위의 Map 집계
 * - groupAverageSql: SQLite 쿼리 (SqlGrouper.ts)
 */

import type {
  DataTable,
  EmptyGroupWarning,
  GroupKey,
  TimeUsageRow,
  WorkingLabel,
  SexLabel,
  AgeLabel,
} from '../types';
import { AGE_LABELS, GROUP_KEY_COLUMNS, SEX_LABELS, SUMMARY_COLUMNS, WORKING_LABELS } from '../types';
import { roundHalfUp } from '../utils/rounding';
import { PipelineError } from '../core/errors';
import './expressions';

/** 그룹 평균의 소수 자릿수 */
export const AVERAGE_SCALE = 1;

// =============================================================================
// Arquero 구현
// =============================================================================

/**
 * 그룹별 평균 (Arquero)
 *
 * @param summary - summarize()가 만든 테이블
 * @returns 키 오름차순으로 정렬된 그룹 집계
 */
export function groupAverage(summary: DataTable): TimeUsageRow[] {
  // 평균 = 합계 / 개수 (행 순서대로 단순 합산, 다른 구현과 같은 부동소수점 결과)
  const grouped = summary
    .groupby(...GROUP_KEY_COLUMNS)
    .rollup({
      primaryNeeds: 'd => op.sum(d.primaryNeeds) / op.count()',
      work: 'd => op.sum(d.work) / op.count()',
      other: 'd => op.sum(d.other) / op.count()',
    })
    .derive({
      primaryNeeds: `d => op.round_half_up(d.primaryNeeds, ${AVERAGE_SCALE})`,
      work: `d => op.round_half_up(d.work, ${AVERAGE_SCALE})`,
      other: `d => op.round_half_up(d.other, ${AVERAGE_SCALE})`,
    })
    .orderby(...GROUP_KEY_COLUMNS);

  return toTimeUsageRows(grouped);
}

// =============================================================================
// 타입 기반 구현
// =============================================================================

/**
 * 요약 테이블 → TimeUsageRow 배열
 *
 * 레이블과 숫자 타입을 검증합니다.
 */
export function toTimeUsageRows(table: DataTable): TimeUsageRow[] {
  const rows = table.select(...SUMMARY_COLUMNS).objects() as Record<string, unknown>[];
  return rows.map(parseTimeUsageRow);
}

/**
 * 레코드 객체 → TimeUsageRow (레이블/숫자 검증)
 *
 * @throws PipelineError 레이블이 허용 값이 아니거나 숫자가 아닐 때
 */
export function parseTimeUsageRow(row: Record<string, unknown>, index: number): TimeUsageRow {
  return {
    working: readLabel(row, 'working', WORKING_LABELS, index),
    sex: readLabel(row, 'sex', SEX_LABELS, index),
    age: readLabel(row, 'age', AGE_LABELS, index),
    primaryNeeds: readNumber(row, 'primaryNeeds', index),
    work: readNumber(row, 'work', index),
    other: readNumber(row, 'other', index),
  };
}

interface GroupAccumulator {
  key: GroupKey;
  count: number;
  primaryNeeds: number;
  work: number;
  other: number;
}

/**
 * 그룹별 평균 (타입 기반)
 *
 * 입력 행 순서와 관계없이 같은 결과를 반환합니다.
 */
export function groupAverageTyped(rows: readonly TimeUsageRow[]): TimeUsageRow[] {
  const groups = new Map<string, GroupAccumulator>();

  for (const row of rows) {
    const id = groupId(row);
    let acc = groups.get(id);
    if (!acc) {
      acc = {
        key: { working: row.working, sex: row.sex, age: row.age },
        count: 0,
        primaryNeeds: 0,
        work: 0,
        other: 0,
      };
      groups.set(id, acc);
    }
    acc.count += 1;
    acc.primaryNeeds += row.primaryNeeds;
    acc.work += row.work;
    acc.other += row.other;
  }

  return Array.from(groups.values())
    .map((acc) => ({
      ...acc.key,
      primaryNeeds: roundHalfUp(acc.primaryNeeds / acc.count, AVERAGE_SCALE),
      work: roundHalfUp(acc.work / acc.count, AVERAGE_SCALE),
      other: roundHalfUp(acc.other / acc.count, AVERAGE_SCALE),
    }))
    .sort(compareGroupKeys);
}

// =============================================================================
// 빈 그룹
// =============================================================================

/**
 * 가능한 12개 조합 중 결과에 없는 그룹
 */
export function findEmptyGroups(aggregates: readonly GroupKey[]): EmptyGroupWarning[] {
  const present = new Set(aggregates.map(groupId));
  const warnings: EmptyGroupWarning[] = [];

  for (const working of WORKING_LABELS) {
    for (const sex of SEX_LABELS) {
      for (const age of AGE_LABELS) {
        const key: GroupKey = { working, sex, age };
        if (!present.has(groupId(key))) {
          warnings.push({ kind: 'empty-group', key });
        }
      }
    }
  }

  return warnings;
}

// =============================================================================
// 정렬 / 키
// =============================================================================

/**
 * 그룹 키 비교 (코드 유닛 기준 사전순)
 *
 * localeCompare가 아닌 `<` 비교를 사용해 SQL/Arquero 정렬과 맞춥니다.
 */
export function compareGroupKeys(a: GroupKey, b: GroupKey): number {
  for (const column of GROUP_KEY_COLUMNS) {
    if (a[column] < b[column]) return -1;
    if (a[column] > b[column]) return 1;
  }
  return 0;
}

function groupId(key: GroupKey): string {
  return `${key.working}|${key.sex}|${key.age}`;
}

// =============================================================================
// 내부 헬퍼
// =============================================================================

function readLabel<T extends WorkingLabel | SexLabel | AgeLabel>(
  row: Record<string, unknown>,
  column: string,
  allowed: readonly T[],
  index: number
): T {
  const value = row[column];
  const label = allowed.find((candidate) => candidate === value);
  if (label === undefined) {
    throw new PipelineError(`Summary row ${index}: unexpected ${column} label ${JSON.stringify(value)}`);
  }
  return label;
}

function readNumber(row: Record<string, unknown>, column: string, index: number): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new PipelineError(`Summary row ${index}: ${column} is not a number`);
  }
  return value;
}
