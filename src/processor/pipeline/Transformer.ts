/**
 * Transformer 인터페이스 및 파이프라인 타입 정의
 *
 * 작업 파이프라인의 핵심 추상화입니다.
 * 각 Transformer는 컨텍스트를 입력받아 변환하고 새 컨텍스트를 반환합니다.
 *
 * 파이프라인 구조:
 * CSV → LoadTransformer → ClassifyTransformer → SummarizeTransformer → GroupTransformer → ReportTransformer
 */

import type {
  ClassifiedColumns,
  DataTable,
  EmptyGroupWarning,
  TimeUsageRow,
} from '../../types';
import { PipelineError } from '../../core/errors';

// =============================================================================
// 파이프라인 단계
// =============================================================================

/**
 * 파이프라인 단계(Phase)
 *
 * 각 Transformer가 실행되는 순서를 결정합니다.
 * 낮은 숫자가 먼저 실행됩니다.
 */
export enum PipelinePhase {
  /** CSV 로드 + 캐스팅 */
  LOAD = 1,

  /** 컬럼 분류 */
  CLASSIFY = 2,

  /** 응답자별 요약 */
  SUMMARIZE = 3,

  /** 그룹별 평균 */
  GROUP = 4,

  /** 결과 출력 (최종 단계) */
  REPORT = 5,
}

// =============================================================================
// 변환 컨텍스트
// =============================================================================

/**
 * 변환 컨텍스트
 *
 * Transformer 간에 전달되는 데이터와 메타데이터입니다.
 * 각 단계는 자신이 만든 필드만 채우고 나머지는 그대로 넘깁니다.
 */
export interface TransformContext {
  /** 입력 CSV 경로 */
  source: string;

  /** 컬럼 카탈로그 (LOAD 이후) */
  columns: string[];

  /** 타입이 지정된 원본 테이블 (LOAD 이후) */
  table: DataTable | null;

  /** 분류된 컬럼 집합 (CLASSIFY 이후) */
  classified?: ClassifiedColumns;

  /** 응답자별 요약 (SUMMARIZE 이후) */
  summary?: DataTable;

  /** 그룹 집계 결과 (GROUP 이후) */
  aggregates?: TimeUsageRow[];

  /** 비어 있는 그룹 (GROUP 이후) */
  warnings: EmptyGroupWarning[];

  /** 렌더링된 리포트 (REPORT 이후) */
  report?: string;
}

// =============================================================================
// Transformer 인터페이스
// =============================================================================

/**
 * Transformer 인터페이스
 *
 * 데이터 변환의 기본 단위입니다.
 * 각 Transformer는 독립적으로 테스트할 수 있어야 합니다.
 */
export interface Transformer {
  /** Transformer 이름 (로그용) */
  readonly name: string;

  /** 실행 단계 */
  readonly phase: PipelinePhase;

  /**
   * 변환 실행
   *
   * @param ctx - 입력 컨텍스트
   * @returns 변환된 컨텍스트 (또는 Promise)
   */
  transform(ctx: TransformContext): TransformContext | Promise<TransformContext>;
}

// =============================================================================
// 파이프라인 결과 / 옵션
// =============================================================================

/**
 * 파이프라인 실행 결과
 */
export interface PipelineResult {
  /** 최종 컨텍스트 */
  context: TransformContext;

  /** 실행 시간 (ms) */
  executionTime: number;

  /** 각 단계별 실행 시간 (debug 모드에서만) */
  phaseTimings?: Map<PipelinePhase, number>;
}

/**
 * 파이프라인 옵션
 */
export interface PipelineOptions {
  /** 디버그 모드 (타이밍 기록) */
  debug?: boolean;
}

// =============================================================================
// 헬퍼 함수
// =============================================================================

/**
 * 빈 변환 컨텍스트 생성
 */
export function createEmptyContext(source: string): TransformContext {
  return {
    source,
    columns: [],
    table: null,
    warnings: [],
  };
}

/**
 * 컨텍스트 복사 (얕은 복사)
 */
export function cloneContext(ctx: TransformContext): TransformContext {
  return {
    ...ctx,
    warnings: [...ctx.warnings],
  };
}

/**
 * 앞 단계가 채운 필드 꺼내기
 *
 * @throws PipelineError 필드가 비어 있을 때 (단계 순서 오류)
 */
export function requireField<K extends 'table' | 'classified' | 'summary' | 'aggregates'>(
  ctx: TransformContext,
  key: K,
  transformer: string
): NonNullable<TransformContext[K]> {
  const value = ctx[key];
  if (value === null || value === undefined) {
    throw new PipelineError(`${transformer} requires "${key}" from an earlier phase`);
  }
  return value;
}
