/**
 * ColumnClassifier - 활동 컬럼 분류기
 *
 * 컬럼 이름의 접두사로 세 버킷(기본 욕구, 일, 기타)을 결정합니다.
 * 데이터셋의 "t010101"은 수면 시간, "t110101"은 식사 시간 등을 분 단위로 담고 있습니다.
 *
 * 규칙:
 * 1. 기본 욕구: t01, t03, t11, t1801, t1803
 * 2. 일: t05, t1805
 * 3. 기타: t02, t04, t06~t10, t12~t16, t18 (앞의 두 그룹에 속하지 않는 것만)
 *
 * 어느 규칙에도 맞지 않는 컬럼(식별자, 통제 코드 등)은 버려집니다.
 */

import type { Bucket, ClassifiedColumns } from '../types';

// =============================================================================
// 접두사 규칙
// =============================================================================

/**
 * 버킷별 접두사
 */
export const BUCKET_PREFIXES: Readonly<Record<Bucket, readonly string[]>> = {
  primaryNeeds: ['t01', 't03', 't11', 't1801', 't1803'],
  work: ['t05', 't1805'],
  other: ['t02', 't04', 't06', 't07', 't08', 't09', 't10', 't12', 't13', 't14', 't15', 't16', 't18'],
};

function hasPrefix(columnName: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => columnName.startsWith(prefix));
}

// =============================================================================
// 판별 함수
// =============================================================================

export function isPrimaryNeeds(columnName: string): boolean {
  return hasPrefix(columnName, BUCKET_PREFIXES.primaryNeeds);
}

export function isWorking(columnName: string): boolean {
  return hasPrefix(columnName, BUCKET_PREFIXES.work);
}

/**
 * 기타 활동 여부
 *
 * t18 접두사가 t1801/t1803(기본 욕구), t1805(일)와 겹치므로
 * 두 그룹을 먼저 확인해서 제외합니다.
 *
 * 접두사 규칙 그대로라면 "기타 접두사이고 기본 욕구가 아님"이라서
 * t1805*가 일과 기타 양쪽에 들어갑니다. 여기서는 일도 제외해
 * 세 집합이 서로 겹치지 않게 합니다 (t1805*는 일에만 합산).
 */
export function isOther(columnName: string): boolean {
  return (
    hasPrefix(columnName, BUCKET_PREFIXES.other) &&
    !isPrimaryNeeds(columnName) &&
    !isWorking(columnName)
  );
}

// =============================================================================
// 분류
// =============================================================================

/**
 * 컬럼 이름 목록을 세 버킷으로 분할
 *
 * 각 버킷 안의 순서는 입력 순서를 따릅니다.
 */
export function classify(columnNames: readonly string[]): ClassifiedColumns {
  return {
    primaryNeeds: columnNames.filter(isPrimaryNeeds),
    work: columnNames.filter(isWorking),
    other: columnNames.filter(isOther),
  };
}

/**
 * 컬럼이 속한 버킷 (없으면 null)
 */
export function bucketOf(columnName: string): Bucket | null {
  if (isPrimaryNeeds(columnName)) return 'primaryNeeds';
  if (isWorking(columnName)) return 'work';
  if (isOther(columnName)) return 'other';
  return null;
}
