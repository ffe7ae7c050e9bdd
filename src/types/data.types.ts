/**
 * 데이터 타입 정의
 *
 * 설문 CSV를 다룰 때 사용하는 기본 데이터 구조를 정의합니다.
 */

import type * as aq from 'arquero';

// ============================================================================
// 컬럼(Column) 정의
// ============================================================================

/**
 * 컬럼의 스칼라 타입
 *
 * 식별자 컬럼만 'text'이고 나머지는 모두 'numeric'입니다.
 */
export type ColumnType = 'text' | 'numeric';

/**
 * 컬럼 정의 (컬럼 카탈로그의 항목)
 */
export interface ColumnDef {
  /** 헤더에 적힌 컬럼 이름 */
  key: string;

  /** 캐스팅된 타입 */
  type: ColumnType;
}

// ============================================================================
// 테이블 타입
// ============================================================================

/**
 * Arquero 컬럼 테이블
 *
 * 모든 변환은 새 테이블을 반환하므로 단계 사이에서 불변으로 취급합니다.
 */
export type DataTable = ReturnType<typeof aq.table>;

/**
 * 로더 결과
 */
export interface LoadResult {
  /** 헤더 순서 그대로의 컬럼 이름 목록 */
  columns: string[];

  /** 타입이 지정된 테이블 (행 수와 컬럼 순서는 원본과 동일) */
  table: DataTable;
}
