import { describe, it, expect } from 'vitest';
import { partition } from '../src/pipeline/partition.js';
import { createTable } from '../src/pipeline/table.js';
import { catchLeadError } from './helpers.js';

describe('partition', () => {
  it('splits on true/false keeping relative order', () => {
    const table = createTable(['full_name', 'open'], [
      { full_name: 'A', open: true },
      { full_name: 'B', open: false },
      { full_name: 'C', open: true },
    ]);
    const { trueTable, falseTable } = partition(table);
    expect(trueTable.rows.map((r) => r.full_name)).toEqual(['A', 'C']);
    expect(falseTable.rows.map((r) => r.full_name)).toEqual(['B']);
    expect(trueTable.columns).toEqual(['full_name', 'open']);
  });

  it('leaves non-boolean and missing values out of both sides', () => {
    const table = createTable(['full_name', 'open'], [
      { full_name: 'A', open: 'true-ish' },
      { full_name: 'B', open: null },
      { full_name: 'C', open: 1 },
      { full_name: 'D', open: false },
    ]);
    const { trueTable, falseTable } = partition(table);
    expect(trueTable.rows).toEqual([]);
    expect(falseTable.rows).toEqual([{ full_name: 'D', open: false }]);
  });

  it('never duplicates or fabricates rows', () => {
    const table = createTable(['open'], [{ open: true }, { open: false }, { open: null }, { open: true }]);
    const { trueTable, falseTable } = partition(table);
    const all = [...trueTable.rows, ...falseTable.rows];
    expect(new Set(all).size).toBe(all.length);
    for (const row of all) expect(table.rows).toContain(row);
  });

  it('reads the text spellings of true and false without changing the cells', () => {
    const table = createTable(['full_name', 'open'], [
      { full_name: 'A', open: 'TRUE' },
      { full_name: 'B', open: 'false' },
      { full_name: 'C', open: 'True' },
      { full_name: 'D', open: 'yes' },
    ]);
    const { trueTable, falseTable } = partition(table);
    expect(trueTable.rows).toEqual([
      { full_name: 'A', open: 'TRUE' },
      { full_name: 'C', open: 'True' },
    ]);
    expect(falseTable.rows).toEqual([{ full_name: 'B', open: 'false' }]);
  });

  it('splits on another column when asked', () => {
    const table = createTable(['premium'], [{ premium: false }]);
    expect(partition(table, 'premium').falseTable.rows).toHaveLength(1);
  });

  it('fails when the column is missing', () => {
    const err = catchLeadError(() => partition(createTable(['full_name'], []), 'open', 'leads.csv'));
    expect(err.code).toBe('MISSING_COLUMN');
    expect(err.message).toBe("Column 'open' not found in leads.csv.");
  });
});
