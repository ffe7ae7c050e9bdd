/**
 * 반올림 유틸리티
 *
 * 값의 최단 10진 표현을 기준으로 0에서 먼 쪽으로 반올림합니다 (HALF_UP).
 * 2진 부동소수점 오차 때문에 `Math.round(x * 100) / 100`은 1.005를
 * 1.00으로 내리는데, 지수 표기 문자열로 자릿수를 옮기면 1.01이 됩니다.
 *
 * @example
 * roundHalfUp(7.5);       // 8
 * roundHalfUp(-2.5);      // -3
 * roundHalfUp(1.005, 2);  // 1.01
 */
export function roundHalfUp(value: number, scale: number = 0): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  const text = String(magnitude);

  // 1e-7, 1e21 처럼 이미 지수 표기인 값은 문자열 이동이 불가능
  if (text.includes('e')) {
    const factor = 10 ** scale;
    return (sign * Math.round(magnitude * factor)) / factor;
  }

  const shifted = Math.round(Number(`${text}e${scale}`));
  return sign * Number(`${shifted}e${-scale}`);
}
