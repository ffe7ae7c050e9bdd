/**
 * Arquero 표현식 헬퍼
 *
 * 요약/집계 단계에서 쓰는 문자열 표현식을 만들고,
 * 표현식 안에서 호출할 사용자 함수를 등록합니다.
 */

import * as aq from 'arquero';
import { roundHalfUp } from '../utils/rounding';

// =============================================================================
// 사용자 함수 등록
// =============================================================================

/**
 * 표현식 안에서 `op.round_half_up(x, scale)`로 호출합니다.
 * 모듈이 여러 번 로드되어도 같은 함수이므로 덮어쓰기를 허용합니다.
 */
aq.addFunction('round_half_up', roundHalfUp, { override: true });

// =============================================================================
// 표현식 빌더
// =============================================================================

/**
 * 컬럼 접근 표현식 (이름에 특수 문자가 있어도 안전)
 *
 * @example
 * columnRef('t010101'); // d["t010101"]
 */
export function columnRef(name: string): string {
  return `d[${JSON.stringify(name)}]`;
}

/**
 * 컬럼 합계 표현식 (컬럼이 없으면 0)
 *
 * @example
 * sumExpr(['t010101', 't010102']); // (d["t010101"] + d["t010102"])
 */
export function sumExpr(columns: readonly string[]): string {
  if (columns.length === 0) {
    return '0';
  }
  return `(${columns.map(columnRef).join(' + ')})`;
}

/**
 * 범위 조건 표현식 (양 끝 포함)
 */
export function betweenExpr(name: string, low: number, high: number): string {
  const ref = columnRef(name);
  return `${ref} >= ${low} && ${ref} <= ${high}`;
}
