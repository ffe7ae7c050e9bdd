/**
 * SqlGrouper 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import {
  buildGroupedSqlQuery,
  groupAverageSql,
  registerSqlFunctions,
  SUMMARY_VIEW,
} from '../../src/processor/SqlGrouper';
import { groupAverageTyped } from '../../src/processor/Grouper';
import type { TimeUsageRow } from '../../src/types';

const SUMMARY_ROWS: TimeUsageRow[] = [
  { working: 'working', sex: 'male', age: 'active', primaryNeeds: 10, work: 8, other: 5 },
  { working: 'not working', sex: 'female', age: 'young', primaryNeeds: 10, work: 0, other: 8 },
  { working: 'working', sex: 'female', age: 'elder', primaryNeeds: 10.5, work: 5, other: 4 },
  { working: 'working', sex: 'male', age: 'active', primaryNeeds: 8, work: 7, other: 7 },
];

describe('SqlGrouper', () => {
  describe('buildGroupedSqlQuery', () => {
    it('그룹 평균 쿼리', () => {
      expect(buildGroupedSqlQuery(SUMMARY_VIEW)).toBe(
        [
          'SELECT working, sex, age,',
          'round_half_up(plain_avg(primaryNeeds ORDER BY rowid), 1) AS primaryNeeds,',
          'round_half_up(plain_avg(work ORDER BY rowid), 1) AS work,',
          'round_half_up(plain_avg(other ORDER BY rowid), 1) AS other',
          'FROM "summed"',
          'GROUP BY working, sex, age',
          'ORDER BY working, sex, age',
        ].join('\n')
      );
    });

    it('테이블 이름의 따옴표 이스케이프', () => {
      expect(buildGroupedSqlQuery('my"view')).toContain('FROM "my""view"\n');
    });
  });

  describe('groupAverageSql', () => {
    it('그룹별 평균 + 키 정렬', () => {
      expect(groupAverageSql(SUMMARY_ROWS)).toEqual([
        { working: 'not working', sex: 'female', age: 'young', primaryNeeds: 10, work: 0, other: 8 },
        { working: 'working', sex: 'female', age: 'elder', primaryNeeds: 10.5, work: 5, other: 4 },
        { working: 'working', sex: 'male', age: 'active', primaryNeeds: 9, work: 7.5, other: 6 },
      ]);
    });

    it('빈 입력은 빈 결과', () => {
      expect(groupAverageSql([])).toEqual([]);
    });

    it('평균의 최단 10진 표현 기준 반올림', () => {
      const rows: TimeUsageRow[] = [
        { working: 'working', sex: 'male', age: 'active', primaryNeeds: 0.15, work: 0.35, other: 0.25 },
      ];

      expect(groupAverageSql(rows)).toEqual([
        { working: 'working', sex: 'male', age: 'active', primaryNeeds: 0.2, work: 0.4, other: 0.3 },
      ]);
      expect(groupAverageSql(rows)).toEqual(groupAverageTyped(rows));
    });

    it('행 순서대로 단순 합산한 평균', () => {
      // 0.1 + 0.2 + 0.3 = 0.6000000000000001 (보정 합산이면 0.6)
      const rows: TimeUsageRow[] = [0.1, 0.2, 0.3].map((other) => ({
        working: 'working',
        sex: 'female',
        age: 'young',
        primaryNeeds: 0,
        work: 0,
        other,
      }));

      expect(groupAverageSql(rows)).toEqual(groupAverageTyped(rows));
    });

    it('호출마다 새 데이터베이스 사용', () => {
      const first = groupAverageSql(SUMMARY_ROWS);
      const second = groupAverageSql(SUMMARY_ROWS);
      expect(second).toEqual(first);
      expect(second).toHaveLength(3);
    });
  });

  describe('registerSqlFunctions', () => {
    it('round_half_up, plain_avg', () => {
      const db = new Database(':memory:');
      try {
        registerSqlFunctions(db);

        expect(db.prepare('SELECT round_half_up(?, 1) AS value').get(0.15)).toEqual({ value: 0.2 });
        expect(db.prepare('SELECT round_half_up(?) AS value').get(-2.5)).toEqual({ value: -3 });

        db.exec('CREATE TABLE t (x REAL NOT NULL)');
        const insert = db.prepare('INSERT INTO t (x) VALUES (?)');
        for (const x of [0.1, 0.2, 0.3]) {
          insert.run(x);
        }
        expect(db.prepare('SELECT plain_avg(x ORDER BY rowid) AS value FROM t').get()).toEqual({
          value: (0.1 + 0.2 + 0.3) / 3,
        });
      } finally {
        db.close();
      }
    });
  });
});
