#!/usr/bin/env node
/**
 * CLI Entry Point for Questionnaire Drift
 *
 * Parses the command and flags, resolves configuration and hands off to
 * the orchestrator.
 *
 * @module cli
 */

import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { CONFIG_FILE, ConfigError, buildConfig, loadConfigFile, type DriftConfig } from './config.js';
import { runGenerateMaster, runReport } from './orchestrator.js';

/** Version extracted from package.json */
export const VERSION = '0.4.0';

export type Command = 'master' | 'report';

export interface ParsedCli {
  command?: Command;
  /** Path of the YAML config file (`--config`). */
  configPath: string;
  cliArgs: Partial<DriftConfig>;
  help: boolean;
  version: boolean;
}

const HELP_TEXT = `
Questionnaire Drift v${VERSION}

Usage:
  drift master [options]     Merge all exports into the master file
  drift report [options]     Compare the master with every export and write data.json

Options:
  --exports-dir <dir>        Directory of questionnaire JSON exports (default: data/exports)
  --master <path>            Master YAML file (default: master/master.yaml)
  --output-dir <dir>         Directory receiving data.json (default: docs)
  --aliases <path>           Section alias YAML (default: master/section-aliases.yaml)
  --threshold <0..1>         Similarity for a text to count as "similar" (default: 0.9)
  --language <code>          Default display language (default: de-CH)
  --reference <source>       Preselected reference source (default: master)
  --pairwise                 Also compare every ordered pair of exports
  --config <path>            Config file (default: ${CONFIG_FILE})
  --help, -h                 Show this help message
  --version, -v              Show version number

Environment Variables:
  DRIFT_EXPORTS_DIR          Default exports directory
  DRIFT_MASTER_PATH          Default master file
  DRIFT_OUTPUT_DIR           Default output directory
  DRIFT_SECTION_ALIASES      Default section alias file
  DRIFT_THRESHOLD            Default similarity threshold
  DRIFT_LANGUAGE             Default display language
  DRIFT_REFERENCE            Default reference source
  DRIFT_PAIRWISE             Pairwise comparison (1/true/yes or 0/false/no)

Examples:
  drift master --exports-dir data/exports
  drift report --output-dir docs --pairwise
  DRIFT_THRESHOLD=0.85 drift report
`;

function isCommand(value: string): value is Command {
  return value === 'master' || value === 'report';
}

/**
 * Parse command-line arguments (without the node executable and script).
 *
 * @throws {ConfigError} on an unknown command or an unparsable flag value.
 */
export function parseCliArgs(args: string[]): ParsedCli {
  const { values, positionals } = parseArgs({
    args,
    options: {
      'exports-dir': { type: 'string' },
      master: { type: 'string' },
      'output-dir': { type: 'string' },
      aliases: { type: 'string' },
      threshold: { type: 'string' },
      language: { type: 'string' },
      reference: { type: 'string' },
      pairwise: { type: 'boolean' },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  const parsed: ParsedCli = {
    configPath: values.config ?? CONFIG_FILE,
    cliArgs: {},
    help: values.help ?? false,
    version: values.version ?? false,
  };

  const [command, ...extra] = positionals;
  if (command !== undefined) {
    if (!isCommand(command)) {
      throw new ConfigError(`Unknown command '${command}'`, ['Expected "master" or "report"']);
    }
    parsed.command = command;
  }
  if (extra.length > 0) {
    throw new ConfigError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const cliArgs = parsed.cliArgs;

  if (values['exports-dir']) {
    cliArgs.exportsDir = values['exports-dir'];
  }

  if (values.master) {
    cliArgs.masterPath = values.master;
  }

  if (values['output-dir']) {
    cliArgs.outputDir = values['output-dir'];
  }

  if (values.aliases) {
    cliArgs.sectionAliasesPath = values.aliases;
  }

  if (values.threshold) {
    const threshold = Number(values.threshold);
    if (!Number.isFinite(threshold)) {
      throw new ConfigError(`Invalid --threshold value: ${values.threshold}`);
    }
    cliArgs.threshold = threshold;
  }

  if (values.language) {
    cliArgs.language = values.language;
  }

  if (values.reference) {
    cliArgs.reference = values.reference;
  }

  if (values.pairwise) {
    cliArgs.pairwise = true;
  }

  return parsed;
}

/**
 * Main entry point. Returns the process exit code.
 */
export function main(args: string[] = process.argv.slice(2)): number {
  const parsed = parseCliArgs(args);

  if (parsed.help) {
    console.log(HELP_TEXT);
    return 0;
  }
  if (parsed.version) {
    console.log(`v${VERSION}`);
    return 0;
  }
  if (parsed.command === undefined) {
    console.error('Error: a command is required');
    console.error('Run with --help for usage information');
    return 1;
  }

  const config = buildConfig(parsed.cliArgs, loadConfigFile(parsed.configPath));

  if (parsed.command === 'master') {
    const result = runGenerateMaster(config);

    console.log('');
    console.log('='.repeat(60));
    console.log(`Status: ${result.success ? 'SUCCESS' : 'FAILED'}`);
    console.log(`Exports read: ${result.exportsRead}`);
    console.log(`Questions: ${result.questionCount}`);
    console.log(`Master: ${result.masterPath}`);
    if (result.error) {
      console.log(`Error: ${result.error}`);
    }
    console.log('='.repeat(60));

    return result.success ? 0 : 1;
  }

  const result = runReport(config);

  console.log('');
  console.log('='.repeat(60));
  console.log(`Status: ${result.success ? 'SUCCESS' : 'FAILED'}`);
  for (const s of result.sources) {
    console.log(`  ${s.source}: ${s.matched} matched, ${s.added} added, ${s.removed} removed`);
  }
  console.log(`Comparisons: ${result.comparisons}`);
  console.log(`Questions: ${result.totalQuestions}`);
  console.log(`Data: ${result.dataPath}`);
  if (result.error) {
    console.log(`Error: ${result.error}`);
  }
  console.log('='.repeat(60));

  return result.success ? 0 : 1;
}

// Run main if this is the entry point
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    process.exit(main());
  } catch (err) {
    console.error('Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
}
