/**
 * TimeUsageJob - 생애 주기별 시간 사용 작업
 *
 * 설정에서 파이프라인을 구성하고 한 번 실행합니다.
 * 모든 단계가 성공해야 리포트가 출력되며, 중간 실패 시 부분 결과는 없습니다.
 *
 * @example
 * const result = await runTimeUsageJob(loadJobConfig({ input: 'data/atussum.csv' }));
 * console.log(result.aggregates.length);
 */

import type { EmptyGroupWarning, TimeUsageRow } from '../types';
import type { JobConfig } from '../config/JobConfig';
import {
  DataPipeline,
  LoadTransformer,
  ClassifyTransformer,
  SummarizeTransformer,
  GroupTransformer,
  ReportTransformer,
  PipelinePhase,
  requireField,
} from './pipeline';
import type { ReportSink } from './Reporter';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'TimeUsageJob' });

/**
 * 작업 실행 옵션
 */
export interface JobRunOptions {
  /** 리포트 출력 대상 (기본값: process.stdout) */
  sink?: ReportSink;
}

/**
 * 작업 결과
 */
export interface JobResult {
  /** 정렬된 그룹 집계 */
  aggregates: TimeUsageRow[];

  /** 비어 있는 그룹 */
  warnings: EmptyGroupWarning[];

  /** 렌더링된 리포트 */
  report: string;

  /** 전체 실행 시간 (ms) */
  executionTime: number;

  /** 단계 이름별 실행 시간 (debug 모드에서만) */
  phaseTimings?: Record<string, number>;
}

/**
 * 설정에 맞는 파이프라인 구성
 */
export function buildPipeline(config: JobConfig, options: JobRunOptions = {}): DataPipeline {
  return new DataPipeline({ debug: config.debug })
    .addTransformer(new LoadTransformer())
    .addTransformer(new ClassifyTransformer())
    .addTransformer(new SummarizeTransformer({ maxEmploymentCode: config.maxEmploymentCode }))
    .addTransformer(new GroupTransformer(config.method))
    .addTransformer(new ReportTransformer({ format: config.format, sink: options.sink }));
}

/**
 * 작업 실행
 */
export async function runTimeUsageJob(config: JobConfig, options: JobRunOptions = {}): Promise<JobResult> {
  log.info({ input: config.input, method: config.method, format: config.format }, 'Job started');

  const { context, executionTime, phaseTimings } = await buildPipeline(config, options).execute(config.input);

  const result: JobResult = {
    aggregates: requireField(context, 'aggregates', 'TimeUsageJob'),
    warnings: context.warnings,
    report: context.report ?? '',
    executionTime,
  };

  if (phaseTimings) {
    result.phaseTimings = Object.fromEntries(
      Array.from(phaseTimings, ([phase, ms]) => [PipelinePhase[phase], ms])
    );
  }

  log.info(
    { groups: result.aggregates.length, emptyGroups: result.warnings.length, ms: Math.round(executionTime) },
    'Job finished'
  );
  return result;
}
