import type { DateTime } from 'luxon';
import { isLeadError, type LeadError, type LeadErrorCode } from '../pipeline/errors.js';
import type { Download } from '../sources/uploads.js';
import { log } from '../utils/log.js';

export type Issue = {
  level: 'error' | 'warning';
  file?: string;
  code?: LeadErrorCode;
  message: string;
};

export type ModeResult = {
  downloads: Download[];
  issues: Issue[];
};

export type ModeOptions = {
  now?: DateTime;
};

export function toIssue(err: LeadError): Issue {
  return { level: 'error', file: err.file, code: err.code, message: err.message };
}

/** Collects what a run has to tell the user and mirrors it to the log. */
export class Reporter {
  readonly issues: Issue[] = [];
  private readonly names = new Set<string>();

  fail(err: unknown): void {
    if (!isLeadError(err)) throw err;
    log.error(err.message);
    this.issues.push(toIssue(err));
  }

  warn(message: string, file?: string): void {
    log.warn(message);
    this.issues.push({ level: 'warning', file, message });
  }

  /** Note an output name; a second file under the same name replaces the first. */
  claim(name: string, file: string): void {
    if (this.names.has(name)) {
      this.warn(`${name} from ${file} replaces an earlier file of the same name.`, file);
    }
    this.names.add(name);
  }

  result(downloads: Download[]): ModeResult {
    return { downloads, issues: [...this.issues] };
  }
}

export function hasErrors(result: ModeResult): boolean {
  return result.issues.some((i) => i.level === 'error');
}
