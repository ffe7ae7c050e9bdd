/**
 * roundHalfUp 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import { roundHalfUp } from '../../src/utils/rounding';

describe('roundHalfUp', () => {
  it('정수 반올림은 0에서 먼 쪽', () => {
    expect(roundHalfUp(2.5)).toBe(3);
    expect(roundHalfUp(-2.5)).toBe(-3);
    expect(roundHalfUp(125 / 60)).toBe(2);
    expect(roundHalfUp(7.49)).toBe(7);
  });

  it('소수 첫째 자리', () => {
    expect(roundHalfUp(7.5, 1)).toBe(7.5);
    expect(roundHalfUp(7.45, 1)).toBe(7.5);
    expect(roundHalfUp(9, 1)).toBe(9);
    expect(roundHalfUp(0.1 + 0.2, 1)).toBe(0.3);
  });

  it('2진 표현 오차가 있는 값도 10진 기준으로 반올림', () => {
    // 1.005 * 100 === 100.49999999999999
    expect(roundHalfUp(1.005, 2)).toBe(1.01);
    expect(roundHalfUp(0.145, 2)).toBe(0.15);
    expect(roundHalfUp(1.15, 1)).toBe(1.2);
  });

  it('지수 표기 값', () => {
    expect(roundHalfUp(1e-7, 1)).toBe(0);
    expect(roundHalfUp(1e21)).toBe(1e21);
  });

  it('유한하지 않은 값은 그대로', () => {
    expect(roundHalfUp(Number.NaN)).toBeNaN();
    expect(roundHalfUp(Number.POSITIVE_INFINITY, 1)).toBe(Number.POSITIVE_INFINITY);
  });
});
