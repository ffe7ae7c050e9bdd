/**
 * JobConfig 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_JOB_CONFIG, loadJobConfig, readEnvConfig } from '../../src/config/JobConfig';
import { ConfigError } from '../../src/core/errors';

describe('JobConfig', () => {
  it('아무 설정이 없으면 기본값', () => {
    expect(loadJobConfig({}, {})).toEqual(DEFAULT_JOB_CONFIG);
  });

  it('환경 변수 읽기', () => {
    expect(
      readEnvConfig({ TIME_USAGE_INPUT: 'in.csv', TIME_USAGE_METHOD: 'sql', TIME_USAGE_FORMAT: 'csv' })
    ).toEqual({ input: 'in.csv', method: 'sql', format: 'csv' });
  });

  it('명시적 옵션이 환경 변수보다 우선', () => {
    const config = loadJobConfig({ method: 'typed' }, { TIME_USAGE_METHOD: 'sql', TIME_USAGE_INPUT: 'env.csv' });
    expect(config.method).toBe('typed');
    expect(config.input).toBe('env.csv');
  });

  it('undefined 옵션은 하위 값을 덮어쓰지 않음', () => {
    const config = loadJobConfig({ method: undefined, debug: undefined }, { TIME_USAGE_METHOD: 'typed' });
    expect(config.method).toBe('typed');
    expect(config.debug).toBe(false);
  });

  it('문자열 숫자는 정수로 변환', () => {
    expect(loadJobConfig({ maxEmploymentCode: '5' }, {}).maxEmploymentCode).toBe(5);
  });

  it('잘못된 집계 방식은 ConfigError', () => {
    let caught: unknown;
    try {
      loadJobConfig({ method: 'parallel' }, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe('CONFIG_ERROR');
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0]).toMatch(/^method: /);
    }
  });

  it('정수가 아닌 고용 코드 기준은 ConfigError', () => {
    expect(() => loadJobConfig({ maxEmploymentCode: 4.5 }, {})).toThrow(ConfigError);
  });
});
