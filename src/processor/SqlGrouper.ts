/**
 * SqlGrouper - SQL 기반 그룹 평균
 *
 * groupAverage와 같은 변환을 하나의 SQL 쿼리로 표현합니다.
 * 요약 행을 메모리 SQLite 데이터베이스에 적재한 뒤 쿼리를 실행하며,
 * 데이터베이스는 호출이 끝나면 성공/실패와 관계없이 닫습니다.
 *
 * 평균과 반올림은 내장 AVG/ROUND 대신 등록한 함수로 계산합니다.
 * - plain_avg: 삽입 순서대로 단순 합산한 합계 / 개수 (내장 AVG는 보정 합산)
 * - round_half_up: 최단 10진 표현 기준 반올림 (내장 ROUND는 2진 값 기준)
 */

import Database from 'better-sqlite3';
import type { TimeUsageRow } from '../types';
import { GROUP_KEY_COLUMNS } from '../types';
import { AVERAGE_SCALE, parseTimeUsageRow } from './Grouper';
import { roundHalfUp } from '../utils/rounding';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'SqlGrouper' });

/** 요약 행을 적재하는 테이블 이름 */
export const SUMMARY_VIEW = 'summed';

const AVERAGED_COLUMNS = ['primaryNeeds', 'work', 'other'] as const;

/**
 * 쿼리가 사용하는 사용자 함수 등록 (plain_avg, round_half_up)
 */
export function registerSqlFunctions(db: Database.Database): void {
  db.function('round_half_up', { deterministic: true }, roundHalfUp);

  // [합계, 개수]
  db.aggregate<[number, number]>('plain_avg', {
    deterministic: true,
    start: () => [0, 0],
    step: ([sum, count], value) => [sum + value, count + 1],
    result: ([sum, count]) => sum / count,
  });
}

/**
 * groupAverage와 동일한 SQL 쿼리
 *
 * registerSqlFunctions로 함수를 등록한 연결에서 실행해야 합니다.
 *
 * @param viewName - 요약 행이 담긴 테이블 이름 (rowid 순서 = 요약 행 순서)
 */
export function buildGroupedSqlQuery(viewName: string): string {
  const keys = GROUP_KEY_COLUMNS.join(', ');
  const averages = AVERAGED_COLUMNS.map(
    (column) => `round_half_up(plain_avg(${column} ORDER BY rowid), ${AVERAGE_SCALE}) AS ${column}`
  );
  return [
    `SELECT ${keys},`,
    `${averages.join(',\n')}`,
    `FROM ${quoteIdentifier(viewName)}`,
    `GROUP BY ${keys}`,
    `ORDER BY ${keys}`,
  ].join('\n');
}

/**
 * 그룹별 평균 (SQL)
 */
export function groupAverageSql(rows: readonly TimeUsageRow[]): TimeUsageRow[] {
  const db = new Database(':memory:');
  try {
    registerSqlFunctions(db);
    db.exec(
      `CREATE TABLE ${quoteIdentifier(SUMMARY_VIEW)} (
        working TEXT NOT NULL,
        sex TEXT NOT NULL,
        age TEXT NOT NULL,
        primaryNeeds REAL NOT NULL,
        work REAL NOT NULL,
        other REAL NOT NULL
      )`
    );

    const insert = db.prepare(
      `INSERT INTO ${quoteIdentifier(SUMMARY_VIEW)} (working, sex, age, primaryNeeds, work, other)
       VALUES (@working, @sex, @age, @primaryNeeds, @work, @other)`
    );
    const insertAll = db.transaction((batch: readonly TimeUsageRow[]) => {
      for (const row of batch) {
        insert.run(row);
      }
    });
    insertAll(rows);

    const sql = buildGroupedSqlQuery(SUMMARY_VIEW);
    log.debug({ sql, rows: rows.length }, 'Running grouped query');

    return db
      .prepare(sql)
      .all()
      .map((record, index) => {
        if (!isRecord(record)) {
          throw new TypeError(`Unexpected SQL result row at ${index}`);
        }
        return parseTimeUsageRow(record, index);
      });
  } finally {
    db.close();
  }
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
