/**
 * Reporter - 결과 출력
 *
 * 그룹 집계를 텍스트로 렌더링해서 싱크(기본: stdout)에 씁니다.
 * markdown/csv 렌더링은 Arquero 테이블 포맷터를 사용합니다.
 */

import * as aq from 'arquero';
import type { ReportFormat, SummaryColumn, TimeUsageRow } from '../types';
import { SUMMARY_COLUMNS } from '../types';

// =============================================================================
// 옵션
// =============================================================================

/**
 * 텍스트 싱크
 */
export type ReportSink = (text: string) => void;

export interface ReportOptions {
  /** 출력 형식 (기본값: 'markdown') */
  format?: ReportFormat;

  /** 컬럼 표시 이름 (json 형식에는 적용하지 않음) */
  headers?: Partial<Record<SummaryColumn, string>>;

  /** 출력 대상 (기본값: process.stdout) */
  sink?: ReportSink;
}

/**
 * 기본 컬럼 표시 이름
 */
export const DEFAULT_REPORT_HEADERS: Readonly<Record<SummaryColumn, string>> = {
  working: 'working',
  sex: 'sex',
  age: 'age',
  primaryNeeds: 'avg primaryNeeds (hours)',
  work: 'avg work (hours)',
  other: 'avg other (hours)',
};

const stdoutSink: ReportSink = (text) => {
  process.stdout.write(text);
};

// =============================================================================
// 렌더링
// =============================================================================

/**
 * 그룹 집계 → 텍스트
 *
 * 행이 없어도 컬럼 헤더는 출력합니다.
 */
export function renderReport(
  rows: readonly TimeUsageRow[],
  format: ReportFormat = 'markdown',
  headers: Partial<Record<SummaryColumn, string>> = {}
): string {
  if (format === 'json') {
    return `${JSON.stringify(rows, null, 2)}\n`;
  }

  const labels = { ...DEFAULT_REPORT_HEADERS, ...headers };
  const columns: Record<string, unknown[]> = {};
  for (const column of SUMMARY_COLUMNS) {
    columns[labels[column]] = rows.map((row) => row[column]);
  }
  const table = aq.table(columns, SUMMARY_COLUMNS.map((column) => labels[column]));

  switch (format) {
    case 'csv':
      return table.toCSV();
    case 'markdown':
      return table.toMarkdown();
  }
}

/**
 * 렌더링 후 싱크에 기록
 *
 * @returns 기록한 텍스트
 */
export function writeReport(rows: readonly TimeUsageRow[], options: ReportOptions = {}): string {
  const text = renderReport(rows, options.format, options.headers);
  (options.sink ?? stdoutSink)(text);
  return text;
}
