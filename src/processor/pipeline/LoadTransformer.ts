/**
 * LoadTransformer - CSV 로드 단계
 */

import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase, cloneContext } from './Transformer';
import { loadTimeUsageCsv } from '../CsvLoader';

export class LoadTransformer implements Transformer {
  readonly name = 'LoadTransformer';
  readonly phase = PipelinePhase.LOAD;

  async transform(ctx: TransformContext): Promise<TransformContext> {
    const { columns, table } = await loadTimeUsageCsv(ctx.source);

    const result = cloneContext(ctx);
    result.columns = columns;
    result.table = table;
    return result;
  }
}
