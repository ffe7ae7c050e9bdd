/**
 * 프로세서 모듈 진입점
 */

export { loadTimeUsageCsv, parseTimeUsageCsv, describeCatalog } from './CsvLoader';
export { summarize, DEFAULT_SUMMARIZE_OPTIONS } from './Summarizer';
export type { SummarizeOptions } from './Summarizer';
export {
  AVERAGE_SCALE,
  groupAverage,
  groupAverageTyped,
  toTimeUsageRows,
  parseTimeUsageRow,
  findEmptyGroups,
  compareGroupKeys,
} from './Grouper';
export { SUMMARY_VIEW, buildGroupedSqlQuery, groupAverageSql, registerSqlFunctions } from './SqlGrouper';
export { DEFAULT_REPORT_HEADERS, renderReport, writeReport } from './Reporter';
export type { ReportOptions, ReportSink } from './Reporter';
export { buildPipeline, runTimeUsageJob } from './TimeUsageJob';
export type { JobResult, JobRunOptions } from './TimeUsageJob';

export * from './pipeline';
