import { describe, expect, it } from 'vitest';

import { parseCsvTable } from '@/infra/csv/index.js';

describe('parseCsvTable', () => {
  it('keys rows by header and numbers them by file line', () => {
    const table = parseCsvTable('Date,Unit,Power\n2024-01-01, A ,50\n\n2024-01-02,B,\n');

    expect(table._unsafeUnwrap()).toEqual({
      columns: ['Date', 'Unit', 'Power'],
      rows: [
        { line: 2, values: { Date: '2024-01-01', Unit: 'A', Power: '50' } },
        { line: 4, values: { Date: '2024-01-02', Unit: 'B', Power: '' } },
      ],
    });
  });

  it('numbers rows by file line when a quoted field spans lines', () => {
    const table = parseCsvTable(
      'name,location\nAlpha,"Testville\nOH"\nBravo,Otherton\n'
    )._unsafeUnwrap();

    expect(table.rows).toEqual([
      { line: 2, values: { name: 'Alpha', location: 'Testville\nOH' } },
      { line: 4, values: { name: 'Bravo', location: 'Otherton' } },
    ]);
  });

  it('fills short rows with empty values', () => {
    const table = parseCsvTable('a,b\n1\n')._unsafeUnwrap();

    expect(table.rows).toEqual([{ line: 2, values: { a: '1', b: '' } }]);
  });

  it('strips a byte order mark from the header', () => {
    const table = parseCsvTable('\uFEFFname,docket_number\nAlpha,05000901\n')._unsafeUnwrap();

    expect(table.columns).toEqual(['name', 'docket_number']);
  });

  it('reports missing required columns', () => {
    const result = parseCsvTable('Date,Unit\n', { requiredColumns: ['Date', 'Unit', 'Power'] });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MissingColumns',
      message: 'CSV header is missing required column(s): Power',
      columns: ['Power'],
    });
  });

  it('reports an empty input', () => {
    expect(parseCsvTable('')._unsafeUnwrapErr()).toEqual({
      type: 'EmptyTable',
      message: 'CSV input has no header row',
    });
  });

  it('reports unterminated quotes', () => {
    expect(parseCsvTable('a,b\n"1,2\n')._unsafeUnwrapErr().type).toBe('CsvSyntaxError');
  });
});
