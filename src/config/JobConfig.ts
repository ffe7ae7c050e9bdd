/**
 * JobConfig - 작업 설정
 *
 * 입력 경로, 집계 방식, 출력 형식, 적격성 기준을 하나의 설정으로 관리합니다.
 * 우선순위: 기본값 < 환경 변수 < 명시적 옵션(CLI 인자 등)
 *
 * @example
 * const config = loadJobConfig({ input: 'data/atussum.csv', method: 'sql' });
 */

import { z } from 'zod';
import { ConfigError } from '../core/errors';

// =============================================================================
// 스키마
// =============================================================================

export const JobConfigSchema = z.object({
  /** 입력 CSV 경로 */
  input: z.string().min(1),

  /** 그룹 집계 방식 */
  method: z.enum(['expression', 'sql', 'typed']),

  /** 리포트 형식 */
  format: z.enum(['markdown', 'csv', 'json']),

  /**
   * 이 코드보다 큰 고용 상태 코드는 제외
   * 문서상 의도는 "5만 제외"지만 실제 적용 필터는 "4 초과 제외"입니다.
   */
  maxEmploymentCode: z.coerce.number().int(),

  /** 디버그 모드 (단계별 타이밍 기록) */
  debug: z.boolean(),
});

export type JobConfig = z.infer<typeof JobConfigSchema>;

/**
 * 기본 작업 설정
 */
export const DEFAULT_JOB_CONFIG: JobConfig = {
  input: 'data/atussum.csv',
  method: 'expression',
  format: 'markdown',
  maxEmploymentCode: 4,
  debug: false,
};

// =============================================================================
// 로딩
// =============================================================================

/**
 * 환경 변수에서 읽은 설정 (설정되지 않은 값은 제외)
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};

  if (env.TIME_USAGE_INPUT) fromEnv.input = env.TIME_USAGE_INPUT;
  if (env.TIME_USAGE_METHOD) fromEnv.method = env.TIME_USAGE_METHOD;
  if (env.TIME_USAGE_FORMAT) fromEnv.format = env.TIME_USAGE_FORMAT;

  return fromEnv;
}

/**
 * 설정 병합 + 검증
 *
 * undefined 값은 하위 우선순위 값을 덮어쓰지 않습니다.
 *
 * @throws ConfigError 검증 실패 시 (필드별 메시지 포함)
 */
export function loadJobConfig(
  overrides: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env
): JobConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_JOB_CONFIG };

  for (const layer of [readEnvConfig(env), overrides]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  const parsed = JobConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  return parsed.data;
}
