/**
 * SummarizeTransformer - 응답자별 요약 단계
 */

import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase, cloneContext, requireField } from './Transformer';
import { summarize, type SummarizeOptions } from '../Summarizer';

export class SummarizeTransformer implements Transformer {
  readonly name = 'SummarizeTransformer';
  readonly phase = PipelinePhase.SUMMARIZE;

  /** 요약 옵션 */
  private options: SummarizeOptions;

  constructor(options: SummarizeOptions = {}) {
    this.options = options;
  }

  /**
   * 설정 업데이트
   */
  configure(options: Partial<SummarizeOptions>): void {
    this.options = { ...this.options, ...options };
  }

  transform(ctx: TransformContext): TransformContext {
    const table = requireField(ctx, 'table', this.name);
    const classified = requireField(ctx, 'classified', this.name);

    const result = cloneContext(ctx);
    result.summary = summarize(classified, table, this.options);
    return result;
  }
}
