/**
 * Reporter 단위 테스트
 */

import { describe, it, expect } from 'vitest';
import { renderReport, writeReport } from '../../src/processor/Reporter';
import type { TimeUsageRow } from '../../src/types';

const ROWS: TimeUsageRow[] = [
  { working: 'working', sex: 'male', age: 'active', primaryNeeds: 9, work: 7.5, other: 6 },
];

describe('Reporter', () => {
  describe('renderReport', () => {
    it('json: 들여쓰기된 객체 배열', () => {
      expect(renderReport(ROWS, 'json')).toBe(
        [
          '[',
          '  {',
          '    "working": "working",',
          '    "sex": "male",',
          '    "age": "active",',
          '    "primaryNeeds": 9,',
          '    "work": 7.5,',
          '    "other": 6',
          '  }',
          ']',
          '',
        ].join('\n')
      );
    });

    it('json: 빈 결과', () => {
      expect(renderReport([], 'json')).toBe('[]\n');
    });

    it('csv: 기본 헤더 + 데이터 행', () => {
      const lines = renderReport(ROWS, 'csv').split('\n');

      expect(lines[0]).toBe('working,sex,age,avg primaryNeeds (hours),avg work (hours),avg other (hours)');
      expect(lines[1]).toBe('working,male,active,9,7.5,6');
    });

    it('markdown: 사용자 헤더', () => {
      const text = renderReport(ROWS, 'markdown', { primaryNeeds: 'pn', work: 'wk', other: 'ot' });

      expect(text.split('\n')[0]).toBe('|working|sex|age|pn|wk|ot|');
    });

    it('기본 형식은 markdown', () => {
      expect(renderReport(ROWS)).toBe(renderReport(ROWS, 'markdown'));
    });
  });

  describe('writeReport', () => {
    it('싱크에 한 번 기록하고 같은 텍스트 반환', () => {
      const written: string[] = [];

      const text = writeReport(ROWS, { format: 'json', sink: (chunk) => written.push(chunk) });

      expect(written).toEqual([text]);
      expect(JSON.parse(text)).toEqual(ROWS);
    });
  });
});
