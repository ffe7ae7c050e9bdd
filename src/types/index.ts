/**
 * 타입 정의 모듈
 *
 * 모든 모듈에서 공유하는 타입들을 정의합니다.
 * 이 파일에서 모든 타입을 한 번에 import할 수 있습니다.
 *
 * @example
 * import type { TimeUsageRow, ClassifiedColumns } from './types';
 */

// 데이터 타입
export type { ColumnType, ColumnDef, DataTable, LoadResult } from './data.types';

// 도메인 타입
export type {
  Bucket,
  ClassifiedColumns,
  WorkingLabel,
  SexLabel,
  AgeLabel,
  SummaryColumn,
  TimeUsageRow,
  GroupKey,
  EmptyGroupWarning,
  GroupingMethod,
  ReportFormat,
} from './timeUsage.types';

// 상수
export {
  TIME_USAGE_SCHEMA,
  MINUTES_PER_HOUR,
  WORKING_LABELS,
  SEX_LABELS,
  AGE_LABELS,
  GROUP_KEY_COLUMNS,
  SUMMARY_COLUMNS,
} from './timeUsage.types';
