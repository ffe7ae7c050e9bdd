/**
 * CsvLoader - 설문 CSV 로더
 *
 * 헤더가 있는 CSV를 읽어 Arquero 테이블로 변환합니다.
 * - 식별자 컬럼(tucaseid)은 텍스트로 파싱합니다 (앞자리 0 보존)
 * - 나머지 컬럼은 모두 Float64Array로 캐스팅합니다
 *
 * 행 수와 컬럼 순서는 원본 파일과 정확히 같습니다.
 */

import { readFile } from 'fs/promises';
import * as aq from 'arquero';
import type { ColumnDef, DataTable, LoadResult } from '../types';
import { TIME_USAGE_SCHEMA } from '../types';
import { LoadError, SchemaError } from '../core/errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'CsvLoader' });

/** 문자열 입력일 때 오류 메시지에 쓰는 출처 이름 */
const INLINE_SOURCE = '<inline>';

/**
 * 로드 시점에 반드시 있어야 하는 컬럼
 */
const REQUIRED_COLUMNS: readonly string[] = [
  TIME_USAGE_SCHEMA.identifier,
  TIME_USAGE_SCHEMA.employment,
  TIME_USAGE_SCHEMA.sex,
  TIME_USAGE_SCHEMA.age,
];

// =============================================================================
// 공개 API
// =============================================================================

/**
 * 파일 경로에서 로드
 *
 * @throws LoadError 파일을 읽을 수 없거나 헤더가 비어 있을 때
 * @throws SchemaError 필수 컬럼이 없거나 숫자 캐스팅에 실패했을 때
 */
export async function loadTimeUsageCsv(path: string): Promise<LoadResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new LoadError(path, `Cannot read "${path}": ${(err as Error).message}`, { cause: err });
  }

  const result = parseTimeUsageCsv(text, path);
  log.info({ source: path, rows: result.table.numRows(), columns: result.columns.length }, 'CSV loaded');
  return result;
}

/**
 * CSV 텍스트에서 로드
 */
export function parseTimeUsageCsv(text: string, source: string = INLINE_SOURCE): LoadResult {
  if (text.trim() === '') {
    throw new LoadError(source, `"${source}" is empty: a header row is required`);
  }

  let raw: DataTable;
  try {
    raw = aq.fromCSV(text, {
      parse: { [TIME_USAGE_SCHEMA.identifier]: String },
    });
  } catch (err) {
    throw new LoadError(source, `Malformed CSV in "${source}": ${(err as Error).message}`, {
      cause: err,
    });
  }

  const columns = raw.columnNames();
  for (const required of REQUIRED_COLUMNS) {
    if (!columns.includes(required)) {
      throw new SchemaError(source, required, `Required column "${required}" is missing in "${source}"`);
    }
  }

  // 컬럼별 캐스팅 (헤더 순서 유지)
  const data: Record<string, Float64Array | string[]> = {};
  for (const name of columns) {
    data[name] =
      name === TIME_USAGE_SCHEMA.identifier
        ? Array.from(raw.array(name), (value: unknown) => (value == null ? '' : String(value)))
        : Float64Array.from(raw.array(name), (value: unknown, index: number) =>
            toNumeric(value, source, name, index)
          );
  }

  return {
    columns,
    table: aq.table(data, columns),
  };
}

/**
 * 컬럼 카탈로그 (이름 → 타입)
 */
export function describeCatalog(columns: readonly string[]): ColumnDef[] {
  return columns.map((key) => ({
    key,
    type: key === TIME_USAGE_SCHEMA.identifier ? 'text' : 'numeric',
  }));
}

// =============================================================================
// 내부 헬퍼
// =============================================================================

/**
 * 숫자 캐스팅
 *
 * 숫자는 그대로, 숫자 형태의 문자열은 파싱하고 나머지는 SchemaError입니다.
 */
function toNumeric(value: unknown, source: string, column: string, index: number): number {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (trimmed !== '' && !Number.isNaN(parsed)) {
      return parsed;
    }
  }

  // index는 0부터, 데이터 행 번호는 1부터
  throw new SchemaError(
    source,
    column,
    `Column "${column}" row ${index + 1}: cannot cast ${JSON.stringify(String(value))} to a number`
  );
}
