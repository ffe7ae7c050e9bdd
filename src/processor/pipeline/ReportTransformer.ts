/**
 * ReportTransformer - 결과 출력 단계 (최종 단계)
 */

import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase, cloneContext, requireField } from './Transformer';
import { writeReport, type ReportOptions } from '../Reporter';

export class ReportTransformer implements Transformer {
  readonly name = 'ReportTransformer';
  readonly phase = PipelinePhase.REPORT;

  private readonly options: ReportOptions;

  constructor(options: ReportOptions = {}) {
    this.options = options;
  }

  transform(ctx: TransformContext): TransformContext {
    const aggregates = requireField(ctx, 'aggregates', this.name);

    const result = cloneContext(ctx);
    result.report = writeReport(aggregates, this.options);
    return result;
  }
}
