/**
 * Grouper 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  compareGroupKeys,
  findEmptyGroups,
  groupAverage,
  groupAverageTyped,
  parseTimeUsageRow,
  toTimeUsageRows,
} from '../../src/processor/Grouper';
import { summarize } from '../../src/processor/Summarizer';
import { classify } from '../../src/core/ColumnClassifier';
import { PipelineError } from '../../src/core/errors';
import type { TimeUsageRow } from '../../src/types';
import { respondentTable, summaryTable } from './testTables';

// ===========================================================================
// 테스트 데이터
// ===========================================================================

const SUMMARY_ROWS: TimeUsageRow[] = [
  { working: 'working', sex: 'male', age: 'active', primaryNeeds: 10, work: 8, other: 5 },
  { working: 'not working', sex: 'female', age: 'young', primaryNeeds: 10, work: 0, other: 8 },
  { working: 'working', sex: 'female', age: 'elder', primaryNeeds: 10.5, work: 5, other: 4 },
  { working: 'working', sex: 'male', age: 'active', primaryNeeds: 8, work: 7, other: 7 },
];

const EXPECTED_GROUPS: TimeUsageRow[] = [
  { working: 'not working', sex: 'female', age: 'young', primaryNeeds: 10, work: 0, other: 8 },
  { working: 'working', sex: 'female', age: 'elder', primaryNeeds: 10.5, work: 5, other: 4 },
  { working: 'working', sex: 'male', age: 'active', primaryNeeds: 9, work: 7.5, other: 6 },
];

describe('Grouper', () => {
  // ===========================================================================
  // Arquero 구현
  // ===========================================================================

  describe('groupAverage', () => {
    it('그룹별 평균 + 키 정렬', () => {
      expect(groupAverage(summaryTable(SUMMARY_ROWS))).toEqual(EXPECTED_GROUPS);
    });

    it('두 응답자 시나리오', () => {
      const table = respondentTable([
        {
          telfs: 1,
          tesex: 1,
          teage: 30,
          minutes: { t010101: 600, t050101: 480, t120101: 300 },
        },
        {
          telfs: 1,
          tesex: 1,
          teage: 40,
          minutes: { t010101: 420, t180101: 60, t050101: 400, t180501: 20, t120101: 360, t180201: 60 },
        },
      ]);
      const summary = summarize(classify(table.columnNames()), table);

      expect(groupAverage(summary)).toEqual([
        { working: 'working', sex: 'male', age: 'active', primaryNeeds: 9, work: 7.5, other: 6 },
      ]);
    });

    it('평균은 소수 첫째 자리로 반올림', () => {
      const rows: TimeUsageRow[] = [1, 1, 2].map((work) => ({
        working: 'working',
        sex: 'male',
        age: 'young',
        primaryNeeds: 7.25,
        work,
        other: 0,
      }));

      // work: 4/3 = 1.333.. → 1.3, primaryNeeds: 7.25 → 7.3
      expect(groupAverage(summaryTable(rows))).toEqual([
        { working: 'working', sex: 'male', age: 'young', primaryNeeds: 7.3, work: 1.3, other: 0 },
      ]);
    });

    it('두 번 실행해도 같은 결과', () => {
      const summary = summaryTable(SUMMARY_ROWS);
      expect(groupAverage(summary)).toEqual(groupAverage(summary));
    });

    it('빈 입력은 빈 결과', () => {
      expect(groupAverage(summaryTable([]))).toEqual([]);
    });
  });

  // ===========================================================================
  // 타입 기반 구현
  // ===========================================================================

  describe('groupAverageTyped', () => {
    it('Arquero 구현과 같은 결과', () => {
      expect(groupAverageTyped(SUMMARY_ROWS)).toEqual(EXPECTED_GROUPS);
    });

    it('입력 순서와 무관', () => {
      expect(groupAverageTyped([...SUMMARY_ROWS].reverse())).toEqual(EXPECTED_GROUPS);
    });

    it('toTimeUsageRows는 테이블 행을 그대로 변환', () => {
      expect(toTimeUsageRows(summaryTable(SUMMARY_ROWS))).toEqual(SUMMARY_ROWS);
    });

    it('잘못된 레이블은 PipelineError', () => {
      const record = { working: 'retired', sex: 'male', age: 'elder', primaryNeeds: 1, work: 0, other: 0 };
      expect(() => parseTimeUsageRow(record, 3)).toThrow(PipelineError);
      expect(() => parseTimeUsageRow(record, 3)).toThrow('Summary row 3: unexpected working label "retired"');
    });

    it('숫자가 아닌 합계는 PipelineError', () => {
      const record = { working: 'working', sex: 'male', age: 'elder', primaryNeeds: '1', work: 0, other: 0 };
      expect(() => parseTimeUsageRow(record, 0)).toThrow('Summary row 0: primaryNeeds is not a number');
    });
  });

  // ===========================================================================
  // 정렬 / 빈 그룹
  // ===========================================================================

  describe('compareGroupKeys', () => {
    it('코드 유닛 기준 사전순', () => {
      const keys = [
        { working: 'working', sex: 'male', age: 'young' },
        { working: 'not working', sex: 'male', age: 'active' },
        { working: 'working', sex: 'female', age: 'elder' },
        { working: 'working', sex: 'male', age: 'active' },
      ] as const;

      expect([...keys].sort(compareGroupKeys)).toEqual([
        { working: 'not working', sex: 'male', age: 'active' },
        { working: 'working', sex: 'female', age: 'elder' },
        { working: 'working', sex: 'male', age: 'active' },
        { working: 'working', sex: 'male', age: 'young' },
      ]);
    });
  });

  describe('findEmptyGroups', () => {
    it('결과에 없는 조합만 경고', () => {
      const warnings = findEmptyGroups(EXPECTED_GROUPS);

      expect(warnings).toHaveLength(9);
      expect(warnings[0]).toEqual({
        kind: 'empty-group',
        key: { working: 'not working', sex: 'female', age: 'active' },
      });
      expect(warnings.map((warning) => warning.key)).not.toContainEqual({
        working: 'working',
        sex: 'male',
        age: 'active',
      });
    });

    it('결과가 없으면 12개 모두 경고', () => {
      expect(findEmptyGroups([])).toHaveLength(12);
    });
  });
});
