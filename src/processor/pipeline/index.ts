/**
 * Pipeline 모듈 진입점
 *
 * 작업 파이프라인 관련 클래스와 타입을 내보냅니다.
 */

// 핵심 클래스
export { DataPipeline } from './DataPipeline';

// Transformer 구현
export { LoadTransformer } from './LoadTransformer';
export { ClassifyTransformer } from './ClassifyTransformer';
export { SummarizeTransformer } from './SummarizeTransformer';
export { GroupTransformer } from './GroupTransformer';
export { ReportTransformer } from './ReportTransformer';

// 타입 및 인터페이스
export {
  PipelinePhase,
  createEmptyContext,
  cloneContext,
  requireField,
} from './Transformer';

export type {
  Transformer,
  TransformContext,
  PipelineResult,
  PipelineOptions,
} from './Transformer';
