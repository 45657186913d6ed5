import { describe, expect, it } from 'vitest';

import {
  groupRecordsByUnit,
  latestFeedDate,
  parsePowerFeedCsv,
} from '@/modules/capacity-factors/index.js';

describe('parsePowerFeedCsv', () => {
  it('parses rows and keeps empty power as null', () => {
    const result = parsePowerFeedCsv(
      'Date,Unit,Power\n2024-01-01,Unit A,100\n2024-01-02,Unit A,\n2024-01-02,Unit B,87.5\n'
    )._unsafeUnwrap();

    expect(result.rowErrors).toEqual([]);
    expect(result.records).toEqual([
      { date: '2024-01-01', unit: 'Unit A', power: 100 },
      { date: '2024-01-02', unit: 'Unit A', power: null },
      { date: '2024-01-02', unit: 'Unit B', power: 87.5 },
    ]);
  });

  it('reports bad rows with their line numbers and keeps the rest', () => {
    const result = parsePowerFeedCsv(
      [
        'Date,Unit,Power',
        '2024-02-30,Unit A,100',
        '2024-01-01,,100',
        '2024-01-01,Unit A,abc',
        '2024-01-01,Unit A,101',
        '2024-01-01,Unit A,99',
      ].join('\n')
    )._unsafeUnwrap();

    expect(result.records).toEqual([{ date: '2024-01-01', unit: 'Unit A', power: 99 }]);
    expect(result.rowErrors).toEqual([
      { row: 2, field: 'Date', value: '2024-02-30', message: "Unparseable date '2024-02-30'" },
      { row: 3, field: 'Unit', message: 'Missing unit name' },
      { row: 4, field: 'Power', value: 'abc', message: "Unparseable power value 'abc'" },
      { row: 5, field: 'Power', value: '101', message: 'Power value 101 is outside 0-100' },
    ]);
  });

  it('fails when the Power column is missing', () => {
    const result = parsePowerFeedCsv('Date,Unit\n2024-01-01,Unit A\n');

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'MissingColumns', columns: ['Power'] });
  });
});

describe('groupRecordsByUnit', () => {
  it('keeps first-appearance order of units and feed order within a unit', () => {
    const grouped = groupRecordsByUnit([
      { date: '2024-01-02', unit: 'B', power: 1 },
      { date: '2024-01-01', unit: 'A', power: 2 },
      { date: '2024-01-01', unit: 'B', power: 3 },
    ]);

    expect([...grouped.keys()]).toEqual(['B', 'A']);
    expect(grouped.get('B')?.map((record) => record.power)).toEqual([1, 3]);
  });
});

describe('latestFeedDate', () => {
  it('returns the latest date or null for an empty feed', () => {
    expect(
      latestFeedDate([
        { date: '2024-01-05', unit: 'A', power: 1 },
        { date: '2024-02-01', unit: 'B', power: 1 },
        { date: '2024-01-20', unit: 'A', power: 1 },
      ])
    ).toBe('2024-02-01');
    expect(latestFeedDate([])).toBeNull();
  });
});
