/**
 * DataPipeline - 작업 파이프라인
 *
 * Transformer들을 단계(Phase) 순서대로 하나씩 실행합니다.
 * 각 단계는 앞 단계의 결과를 모두 소비한 뒤에 시작합니다.
 */

import {
  type Transformer,
  type PipelineResult,
  type PipelineOptions,
  PipelinePhase,
  createEmptyContext,
} from './Transformer';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ component: 'DataPipeline' });

// =============================================================================
// DataPipeline 클래스
// =============================================================================

/**
 * 작업 파이프라인
 *
 * Transformer들을 관리하고 순차적으로 실행합니다.
 */
export class DataPipeline {
  /** 등록된 Transformer 목록 */
  private transformers: Transformer[] = [];

  /** 파이프라인 옵션 */
  private options: Required<PipelineOptions>;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(options: PipelineOptions = {}) {
    this.options = {
      debug: false,
      ...options,
    };
  }

  // ==========================================================================
  // Transformer 관리
  // ==========================================================================

  /**
   * Transformer 추가
   *
   * Phase 순서대로 자동 정렬됩니다.
   */
  addTransformer(transformer: Transformer): this {
    this.transformers.push(transformer);
    this.sortTransformers();
    return this;
  }

  /**
   * Transformer 제거
   */
  removeTransformer(name: string): boolean {
    const index = this.transformers.findIndex(t => t.name === name);
    if (index >= 0) {
      this.transformers.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Transformer 가져오기
   */
  getTransformer(name: string): Transformer | undefined {
    return this.transformers.find(t => t.name === name);
  }

  /**
   * 모든 Transformer 반환
   */
  getTransformers(): readonly Transformer[] {
    return this.transformers;
  }

  /**
   * Transformer 정렬 (Phase 순, 같은 Phase는 추가 순서 유지)
   */
  private sortTransformers(): void {
    this.transformers.sort((a, b) => a.phase - b.phase);
  }

  // ==========================================================================
  // 파이프라인 실행
  // ==========================================================================

  /**
   * 파이프라인 실행
   *
   * @param source - 입력 CSV 경로
   * @returns 파이프라인 결과
   */
  async execute(source: string): Promise<PipelineResult> {
    const startTime = performance.now();
    const phaseTimings = this.options.debug ? new Map<PipelinePhase, number>() : undefined;

    // 초기 컨텍스트 생성
    let ctx = createEmptyContext(source);

    // 각 Transformer 실행
    for (const transformer of this.transformers) {
      const phaseStart = performance.now();

      ctx = await transformer.transform(ctx);

      // 타이밍 기록
      if (phaseTimings) {
        const phaseTime = performance.now() - phaseStart;
        const existing = phaseTimings.get(transformer.phase) ?? 0;
        phaseTimings.set(transformer.phase, existing + phaseTime);
        log.debug({ transformer: transformer.name, phase: PipelinePhase[transformer.phase], ms: phaseTime }, 'Phase done');
      }
    }

    const executionTime = performance.now() - startTime;

    return {
      context: ctx,
      executionTime,
      phaseTimings,
    };
  }
}
