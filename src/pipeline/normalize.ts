import type { Cell } from './table.js';

const TRUE_VALUES = new Set(['true', 'True', 'TRUE']);
const FALSE_VALUES = new Set(['false', 'False', 'FALSE']);

// CSV fields stay text as written; only empty means missing.
export function normalizeCsvCell(raw: string | undefined): Cell {
  if (raw === undefined || raw === '') return null;
  return raw;
}

export function normalizeSheetCell(raw: unknown): Cell {
  if (raw === undefined || raw === null || raw === '') return null;
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (raw instanceof Date) return raw.toISOString();
  return String(raw);
}

/**
 * Read a cell as a flag: booleans as they are, and the text spellings
 * true/True/TRUE and false/False/FALSE. Anything else is not a flag.
 */
export function flagValue(cell: Cell): boolean | undefined {
  if (typeof cell === 'boolean') return cell;
  if (typeof cell !== 'string') return undefined;
  if (TRUE_VALUES.has(cell)) return true;
  if (FALSE_VALUES.has(cell)) return false;
  return undefined;
}

/**
 * Header names are trimmed; blanks become `Unnamed: <i>` and repeats get a
 * `.1`, `.2`, ... suffix so every column name is unique.
 */
export function normalizeHeaders(raw: readonly unknown[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set<string>();
  const out: string[] = [];
  raw.forEach((value, i) => {
    const base = value === null || value === undefined ? '' : String(value).trim();
    let name = base === '' ? `Unnamed: ${i}` : base;
    if (taken.has(name)) {
      let n = seen.get(name) ?? 0;
      let candidate: string;
      do {
        n += 1;
        candidate = `${name}.${n}`;
      } while (taken.has(candidate));
      seen.set(name, n);
      name = candidate;
    }
    taken.add(name);
    out.push(name);
  });
  return out;
}
