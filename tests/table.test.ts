import { describe, it, expect } from 'vitest';
import { cellOf, concatTables, createTable } from '../src/pipeline/table.js';
import { toCsvBytes } from '../src/pipeline/export.js';

describe('concatTables', () => {
  it('unions columns in order of first appearance', () => {
    const a = createTable(['full_name', 'email'], [{ full_name: 'A', email: 'a@example.test' }]);
    const b = createTable(['linkedin', 'full_name'], [{ linkedin: 'b-l', full_name: 'B' }]);
    const out = concatTables([a, b]);
    expect(out.columns).toEqual(['full_name', 'email', 'linkedin']);
    expect(out.rows).toEqual([
      { full_name: 'A', email: 'a@example.test', linkedin: null },
      { full_name: 'B', email: null, linkedin: 'b-l' },
    ]);
  });

  it('fills columns named like Object members with null, not inherited values', () => {
    const a = createTable(['full_name'], [{ full_name: 'A' }]);
    const b = createTable(['full_name', 'constructor', 'toString'], [{ full_name: 'B', constructor: 'x', toString: 'y' }]);
    const out = concatTables([a, b]);
    expect(cellOf(out.rows[0] ?? {}, 'constructor')).toBeNull();
    expect(toCsvBytes(out).toString('utf-8')).toBe('full_name,constructor,toString\nA,,\nB,x,y\n');
  });

  it('keeps a __proto__ column as ordinary data', () => {
    const out = createTable(['full_name', '__proto__'], [{ full_name: 'A' }]);
    expect(Object.keys(out.rows[0] ?? {})).toEqual(['full_name', '__proto__']);
    expect(toCsvBytes(out).toString('utf-8')).toBe('full_name,__proto__\nA,\n');
  });
});
