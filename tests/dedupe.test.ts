/**
 * Tests for dedupe: first occurrence wins, columns and order preserved.
 */

import { describe, it, expect } from 'vitest';
import { dedupe } from '../src/pipeline/dedupe.js';
import { identityValue, resolveIdentityKey } from '../src/pipeline/identity.js';
import { createTable } from '../src/pipeline/table.js';
import { catchLeadError } from './helpers.js';

const leads = createTable(
  ['full_name', 'linkedin', 'company'],
  [
    { full_name: 'Ada', linkedin: 'ada-l', company: 'First' },
    { full_name: 'Bob', linkedin: 'bob-k', company: 'Acme' },
    { full_name: 'Ada', linkedin: 'ada-l', company: 'Second' },
    { full_name: 'Ada', linkedin: 'ada-2', company: 'Other profile' },
    { full_name: 'Cy', linkedin: null, company: 'No profile' },
    { full_name: 'Cy', linkedin: null, company: 'No profile again' },
  ],
);

describe('dedupe', () => {
  it('keeps the first row per composite key in input order', () => {
    const out = dedupe(leads);
    expect(out.columns).toEqual(['full_name', 'linkedin', 'company']);
    expect(out.rows.map((r) => r.company)).toEqual(['First', 'Acme', 'Other profile', 'No profile']);
  });

  it('uses full_name alone when linkedin is absent', () => {
    const byName = createTable(['full_name', 'email'], [
      { full_name: 'Ada', email: 'a@example.test' },
      { full_name: 'Ada', email: 'other@example.test' },
    ]);
    expect(dedupe(byName).rows).toEqual([{ full_name: 'Ada', email: 'a@example.test' }]);
  });

  it('uses linkedin alone when full_name is absent', () => {
    const byProfile = createTable(['linkedin'], [{ linkedin: 'x' }, { linkedin: 'y' }, { linkedin: 'x' }]);
    expect(dedupe(byProfile).rows).toEqual([{ linkedin: 'x' }, { linkedin: 'y' }]);
  });

  it('does not touch its input', () => {
    dedupe(leads);
    expect(leads.rows).toHaveLength(6);
  });

  it('is idempotent', () => {
    const once = dedupe(leads);
    expect(dedupe(once)).toEqual(once);
  });

  it('leaves pairwise distinct identity values', () => {
    const out = dedupe(leads);
    const key = resolveIdentityKey(out.columns);
    const values = out.rows.map((r) => identityValue(r, key));
    expect(new Set(values).size).toBe(values.length);
  });

  it('fails without identity columns', () => {
    const err = catchLeadError(() => dedupe(createTable(['email'], [{ email: 'a' }]), 'x.csv'));
    expect(err.code).toBe('NO_IDENTITY_COLUMNS');
  });
});
