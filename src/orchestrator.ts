/**
 * Orchestrator - Runs the `master` and `report` pipelines.
 *
 * Both pipelines are a fixed sequence of stages. Each stage is timed and
 * recorded with the {@link ErrorReporter}; a stage that throws is a fatal
 * error and ends the run. An export file that cannot be parsed is logged
 * and skipped.
 *
 * @module orchestrator
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { compareAllPairs, compareSurveys } from './compare.js';
import type { DriftConfig } from './config.js';
import { ErrorReporter, type RunSummary } from './error-reporter.js';
import { MASTER_SOURCE, exportData, saveData } from './export.js';
import {
  extractMaster,
  loadMaster,
  masterToQuestions,
  mergeMasters,
  saveMaster,
  type Master,
} from './master-store.js';
import type { ComparisonResult, Question } from './models.js';
import { ExportFormatError, findExportFiles, loadAndParse } from './parse.js';
import { loadSectionAliases } from './sections.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface MasterRunResult {
  success: boolean;
  masterPath: string;
  exportsRead: number;
  questionCount: number;
  summary: RunSummary;
  error?: string;
}

export interface SourceCounts {
  source: string;
  matched: number;
  added: number;
  removed: number;
}

export interface ReportRunResult {
  success: boolean;
  dataPath: string;
  /** Master → export counts, one entry per parsed export. */
  sources: SourceCounts[];
  comparisons: number;
  totalQuestions: number;
  summary: RunSummary;
  error?: string;
}

/** Name of the export document written to the output directory. */
export const DATA_FILE = 'data.json';

// ---------------------------------------------------------------------------
// Stage runner
// ---------------------------------------------------------------------------

type StageOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Run one stage, recording its duration and outcome. A thrown error is
 * recorded as fatal.
 */
function runStage<T>(
  reporter: ErrorReporter,
  stage: string,
  fn: () => T,
  countItems: (value: T) => number = () => 1,
): StageOutcome<T> {
  const started = Date.now();
  try {
    const value = fn();
    reporter.recordStage({
      stage,
      status: 'completed',
      durationMs: Date.now() - started,
      items: countItems(value),
    });
    return { ok: true, value };
  } catch (error) {
    reporter.recordError(stage, error, true);
    reporter.recordStage({ stage, status: 'failed', durationMs: Date.now() - started, items: 0 });
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/** Print the run summary and return it. */
function finish(reporter: ErrorReporter): RunSummary {
  reporter.printSummary();
  return reporter.getSummary();
}

function makeRunId(command: string): string {
  return `${command}-${new Date().toISOString().replace(/[:.]/g, '-')}`;
}

/** Source id of an export file: its name without `.json`. */
export function sourceIdOf(filePath: string): string {
  return path.basename(filePath, '.json');
}

function discoverExports(exportsDir: string): string[] {
  const files = findExportFiles(exportsDir);
  if (files.length === 0) {
    throw new Error(`No JSON exports found in ${exportsDir}`);
  }
  return files;
}

/**
 * Parse every export, oldest first. Malformed files are reported and
 * skipped; anything else propagates.
 */
function parseExports(files: string[], reporter: ErrorReporter): Map<string, Question[]> {
  const parsed = new Map<string, Question[]>();
  for (const file of files) {
    try {
      const questions = loadAndParse(file);
      parsed.set(sourceIdOf(file), questions);
      console.log(`[Parse] ${path.basename(file)}: ${questions.length} questions`);
    } catch (error) {
      if (!(error instanceof ExportFormatError)) throw error;
      reporter.recordError('parse', error);
    }
  }
  if (parsed.size === 0) {
    throw new Error('None of the exports could be parsed');
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// master
// ---------------------------------------------------------------------------

/**
 * Build the master file from every export (newest wins) and save it.
 */
export function runGenerateMaster(config: DriftConfig): MasterRunResult {
  const reporter = new ErrorReporter(makeRunId('master'));
  const fail = (error: string): MasterRunResult => ({
    success: false,
    masterPath: config.masterPath,
    exportsRead: 0,
    questionCount: 0,
    summary: finish(reporter),
    error,
  });

  console.log(`[Master] Exports directory: ${config.exportsDir}`);

  const discovered = runStage(reporter, 'discover', () => discoverExports(config.exportsDir), f => f.length);
  if (!discovered.ok) return fail(discovered.error);
  const files = discovered.value;

  const parsed = runStage(reporter, 'parse', () => parseExports(files, reporter), m => m.size);
  if (!parsed.ok) return fail(parsed.error);
  const exports = parsed.value;

  const merged = runStage(
    reporter,
    'merge',
    (): Master => mergeMasters([...exports.values()].map(extractMaster)),
    m => m.size,
  );
  if (!merged.ok) return fail(merged.error);
  const master = merged.value;

  const saved = runStage(reporter, 'save', () => saveMaster(master, config.masterPath));
  if (!saved.ok) return fail(saved.error);

  const questionCount = master.size;
  console.log(`[Master] Wrote ${questionCount} questions to ${config.masterPath}`);

  const summary = finish(reporter);
  return {
    success: summary.success,
    masterPath: config.masterPath,
    exportsRead: exports.size,
    questionCount,
    summary,
  };
}

// ---------------------------------------------------------------------------
// report
// ---------------------------------------------------------------------------

function countsOf(result: ComparisonResult): SourceCounts {
  return {
    source: result.sourceB,
    matched: result.matched.length,
    added: result.added.length,
    removed: result.removed.length,
  };
}

/**
 * Compare the master against every export and write the export document.
 */
export function runReport(config: DriftConfig): ReportRunResult {
  const reporter = new ErrorReporter(makeRunId('report'));
  const dataPath = path.join(config.outputDir, DATA_FILE);
  const fail = (error: string): ReportRunResult => ({
    success: false,
    dataPath,
    sources: [],
    comparisons: 0,
    totalQuestions: 0,
    summary: finish(reporter),
    error,
  });

  console.log(`[Report] Master: ${config.masterPath}`);

  const master = runStage(reporter, 'load-master', () => {
    if (!fs.existsSync(config.masterPath)) {
      throw new Error(`Master file not found: ${config.masterPath} (run "drift master" first)`);
    }
    return masterToQuestions(loadMaster(config.masterPath));
  }, q => q.length);
  if (!master.ok) return fail(master.error);
  const masterQuestions = master.value;

  const discovered = runStage(reporter, 'discover', () => discoverExports(config.exportsDir), f => f.length);
  if (!discovered.ok) return fail(discovered.error);
  const files = discovered.value;

  const parsed = runStage(reporter, 'parse', () => parseExports(files, reporter), m => m.size);
  if (!parsed.ok) return fail(parsed.error);
  const exports = parsed.value;

  const compared = runStage(reporter, 'compare', () => {
    if (config.reference !== undefined && config.reference !== MASTER_SOURCE && !exports.has(config.reference)) {
      throw new Error(`Unknown reference source '${config.reference}'`);
    }
    const results = [...exports].map(([source, questions]) =>
      compareSurveys(masterQuestions, questions, MASTER_SOURCE, source, config.threshold),
    );
    const pairwise = config.pairwise ? compareAllPairs(exports, config.threshold) : [];
    return { results, pairwise };
  }, r => r.results.length + r.pairwise.length);
  if (!compared.ok) return fail(compared.error);
  const { results, pairwise } = compared.value;

  for (const result of results) {
    const c = countsOf(result);
    console.log(`[Report] master→${c.source}: ${c.matched} matched, ${c.added} added, ${c.removed} removed`);
  }

  const aliases = runStage(reporter, 'aliases', () => loadSectionAliases(config.sectionAliasesPath), a => Object.keys(a).length);
  if (!aliases.ok) return fail(aliases.error);
  const sectionAliases = aliases.value;

  const written = runStage(reporter, 'export', () => {
    const data = exportData([...results, ...pairwise], exports, {
      masterQuestions,
      defaultReference: config.reference,
      language: config.language,
      sectionAliases,
    });
    saveData(data, dataPath);
    return data;
  });
  if (!written.ok) return fail(written.error);

  console.log(`[Report] Data written: ${dataPath}`);

  const summary = finish(reporter);
  return {
    success: summary.success,
    dataPath,
    sources: results.map(countsOf),
    comparisons: results.length + pairwise.length,
    totalQuestions: written.value.meta.total_questions,
    summary,
  };
}
