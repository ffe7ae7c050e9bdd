/**
 * time-usage - 시간 사용 조사 집계
 *
 * 응답자별 활동 시간(분)을 세 버킷으로 분류·합산하고,
 * 고용 상태 / 성별 / 생애 주기별 평균 시간을 계산합니다.
 * 데이터 처리는 Arquero 테이블 위에서 이루어집니다.
 */

// 타입 내보내기
export * from './types';

// 코어 모듈 (분류기, 오류)
export * from './core';

// 설정
export { JobConfigSchema, DEFAULT_JOB_CONFIG, loadJobConfig, readEnvConfig } from './config/JobConfig';
export type { JobConfig } from './config/JobConfig';

// 프로세서 모듈
export * from './processor';

// 유틸리티
export { roundHalfUp } from './utils/rounding';
export { logger, createChildLogger } from './utils/logger';
