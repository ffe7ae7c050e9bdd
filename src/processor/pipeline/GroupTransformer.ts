/**
 * GroupTransformer - 그룹별 평균 단계
 *
 * 집계 방식(method)에 따라 세 구현 중 하나를 사용합니다.
 * 어느 방식이든 결과는 같아야 합니다.
 *
 * | method       | 구현                 |
 * |--------------|---------------------|
 * | 'expression' | Arquero groupby/rollup |
 * | 'sql'        | SQLite 쿼리           |
 * | 'typed'      | Map 기반 집계          |
 */

import type { GroupingMethod, TimeUsageRow, DataTable } from '../../types';
import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase, cloneContext, requireField } from './Transformer';
import { findEmptyGroups, groupAverage, groupAverageTyped, toTimeUsageRows } from '../Grouper';
import { groupAverageSql } from '../SqlGrouper';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ component: 'GroupTransformer' });

export class GroupTransformer implements Transformer {
  readonly name = 'GroupTransformer';
  readonly phase = PipelinePhase.GROUP;

  /** 집계 방식 */
  private readonly method: GroupingMethod;

  constructor(method: GroupingMethod = 'expression') {
    this.method = method;
  }

  transform(ctx: TransformContext): TransformContext {
    const summary = requireField(ctx, 'summary', this.name);

    const aggregates = this.aggregate(summary);
    const warnings = findEmptyGroups(aggregates);
    for (const warning of warnings) {
      log.warn({ group: warning.key }, 'No eligible respondents in group');
    }

    const result = cloneContext(ctx);
    result.aggregates = aggregates;
    result.warnings = warnings;
    return result;
  }

  private aggregate(summary: DataTable): TimeUsageRow[] {
    switch (this.method) {
      case 'expression':
        return groupAverage(summary);
      case 'sql':
        return groupAverageSql(toTimeUsageRows(summary));
      case 'typed':
        return groupAverageTyped(toTimeUsageRows(summary));
    }
  }
}
