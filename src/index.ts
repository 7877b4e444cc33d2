#!/usr/bin/env node
import { Command } from 'commander';
import { log } from './utils/log.js';
import { CFG } from './config.js';
import { loadUploads, saveDownloads } from './sources/uploads.js';
import { combineAndClean } from './modes/combine.js';
import { cleanEach } from './modes/clean.js';
import { checkAgainstReference } from './modes/check.js';
import { split } from './modes/split.js';
import { DownloadStore } from './modes/store.js';
import { hasErrors, toIssue, type ModeResult } from './modes/report.js';
import type { LeadError } from './pipeline/errors.js';

// Unreadable inputs are reported ahead of what the run itself found.
function withFailures(result: ModeResult, failures: readonly LeadError[]): ModeResult {
  return { downloads: result.downloads, issues: [...failures.map(toIssue), ...result.issues] };
}

function aborted(failures: readonly LeadError[]): ModeResult {
  return withFailures({ downloads: [], issues: [] }, failures);
}

async function finish(result: ModeResult, outDir: string): Promise<void> {
  await saveDownloads(outDir, result.downloads);
  if (!result.downloads.length) log.warn('Nothing to download.');
  if (hasErrors(result)) process.exitCode = 1;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('lead-sheet-cleaner')
    .description('Deduplicate, cross-check and split lead CSV/Excel files')
    .version('0.1.0')
    .option('-o, --out <dir>', 'Directory to write results into', CFG.outDir);

  const outDir = () => String(program.opts().out);

  program
    .command('combine')
    .description('Combine all files into one deduplicated CSV')
    .argument('<files...>', 'CSV or Excel files')
    .action(async (files: string[]) => {
      const { uploads, failures } = await loadUploads(files);
      await finish(failures.length ? aborted(failures) : combineAndClean(uploads), outDir());
    });

  program
    .command('clean')
    .description('Deduplicate every file on its own')
    .argument('<files...>', 'CSV or Excel files')
    .action(async (files: string[]) => {
      const { uploads, failures } = await loadUploads(files);
      await finish(withFailures(cleanEach(uploads), failures), outDir());
    });

  program
    .command('check')
    .description('Remove leads already present in the reference files')
    .requiredOption('-r, --reference <files...>', 'Used leads / reference files')
    .requiredOption('-c, --check <files...>', 'Files to check')
    .option('--no-dedupe-reference', 'Keep duplicate rows in the combined reference')
    .option('--emit-reference', 'Also write the combined reference CSV')
    .action(async (opts: { reference: string[]; check: string[]; dedupeReference: boolean; emitReference?: boolean }) => {
      const reference = await loadUploads(opts.reference);
      if (reference.failures.length) {
        await finish(aborted(reference.failures), outDir());
        return;
      }
      const candidates = await loadUploads(opts.check);
      const result = await checkAgainstReference(reference.uploads, candidates.uploads, {
        dedupeReference: opts.dedupeReference,
        emitReference: opts.emitReference ?? false,
      });
      await finish(withFailures(result, candidates.failures), outDir());
    });

  program
    .command('split')
    .description('Split files into Inmail (true) and Invite (false) rows')
    .argument('<files...>', 'CSV or Excel files')
    .option('--column <name>', 'Boolean column to split on', CFG.splitColumn)
    .option('--no-archive', 'Do not bundle the results into AllFiles.zip')
    .action(async (files: string[], opts: { column: string; archive: boolean }) => {
      const { uploads, failures } = await loadUploads(files);
      const result = await split(uploads, new DownloadStore(), {
        column: opts.column,
        archive: opts.archive && CFG.splitArchive,
      });
      await finish(withFailures(result, failures), outDir());
    });

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (e) {
    log.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
