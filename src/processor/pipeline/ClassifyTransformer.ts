/**
 * ClassifyTransformer - 컬럼 분류 단계
 *
 * 로드된 컬럼 카탈로그를 세 버킷으로 나눕니다.
 */

import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase, cloneContext } from './Transformer';
import { classify } from '../../core/ColumnClassifier';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ component: 'ClassifyTransformer' });

export class ClassifyTransformer implements Transformer {
  readonly name = 'ClassifyTransformer';
  readonly phase = PipelinePhase.CLASSIFY;

  transform(ctx: TransformContext): TransformContext {
    const classified = classify(ctx.columns);

    const matched = classified.primaryNeeds.length + classified.work.length + classified.other.length;
    log.debug(
      {
        primaryNeeds: classified.primaryNeeds.length,
        work: classified.work.length,
        other: classified.other.length,
        dropped: ctx.columns.length - matched,
      },
      'Columns classified'
    );

    const result = cloneContext(ctx);
    result.classified = classified;
    return result;
  }
}
