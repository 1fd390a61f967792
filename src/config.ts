/**
 * Drift Configuration - Single source of truth for all runtime settings.
 *
 * Configuration is resolved from layers with the following precedence
 * (highest wins):
 *
 *   1. CLI arguments (`cliArgs`)
 *   2. Environment variables (e.g. `DRIFT_THRESHOLD`)
 *   3. Values loaded from `drift.config.yml`
 *   4. Built-in defaults
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import { z } from 'zod';

/**
 * Complete configuration for one master or report run.
 *
 * Every field has a well-defined default so partial configs are safe.
 */
export interface DriftConfig {
  // -- Inputs --

  /** Directory holding the questionnaire JSON exports. */
  exportsDir: string;
  /** Path of the master YAML file (written by `master`, read by `report`). */
  masterPath: string;
  /** Optional YAML map of section name variants to canonical names. */
  sectionAliasesPath: string;

  // -- Output --

  /** Directory receiving `data.json`. */
  outputDir: string;

  // -- Comparison --

  /** Minimum similarity for a changed text to count as "similar". */
  threshold: number;
  /** Default display language for viewers of the export. */
  language: string;
  /** Source preselected as the comparison reference (defaults to `master`). */
  reference?: string;
  /** Also compare every ordered pair of exports, not only master → export. */
  pairwise: boolean;
}

/** Raised when configuration or an operator-maintained file is unusable. */
export class ConfigError extends Error {
  public readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}\n  ${details.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default values applied when no explicit configuration is provided. */
export const DEFAULTS: DriftConfig = {
  exportsDir: 'data/exports',
  masterPath: 'master/master.yaml',
  sectionAliasesPath: 'master/section-aliases.yaml',
  outputDir: 'docs',
  threshold: 0.9,
  language: 'de-CH',
  pairwise: false,
};

/** Default location of the optional config file. */
export const CONFIG_FILE = 'drift.config.yml';

const ConfigFileSchema = z.record(z.string(), z.unknown());

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse a numeric value from a string, returning `undefined` on failure.
 */
function parseNum(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Parse a boolean-ish environment variable.
 *
 * Truthy: `"1"`, `"true"`, `"yes"` (case-insensitive).
 * Falsy: `"0"`, `"false"`, `"no"`.
 * Anything else returns `undefined`.
 */
export function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const lower = value.toLowerCase();
  if (['1', 'true', 'yes'].includes(lower)) return true;
  if (['0', 'false', 'no'].includes(lower)) return false;
  return undefined;
}

/** First defined value among the camelCase and snake_case spellings of a key. */
function pick(source: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (source[key] !== undefined) return source[key];
  }
  return undefined;
}

/**
 * Read `drift.config.yml` (or another YAML file). A missing file yields `{}`.
 */
export function loadConfigFile(filePath: string = CONFIG_FILE): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Config file is not valid YAML: ${filePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  if (parsed === null || parsed === undefined) return {};
  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Merge configuration from all sources and return a fully-resolved config.
 *
 * Precedence (highest wins): `cliArgs` > environment > `configYml` > defaults.
 *
 * @param cliArgs   - Values supplied directly from the command line.
 * @param configYml - Key/value pairs loaded from `drift.config.yml`.
 * @param env       - Environment variable map (defaults to `process.env`).
 * @throws {ConfigError} when the resolved threshold lies outside [0, 1].
 */
export function buildConfig(
  cliArgs: Partial<DriftConfig> = {},
  configYml: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): DriftConfig {
  // ---- Layer 3: config file (lowest override) ---------------------------

  const fromYml: Partial<DriftConfig> = {};

  const ymlExportsDir = pick(configYml, 'exportsDir', 'exports_dir');
  if (ymlExportsDir !== undefined) fromYml.exportsDir = String(ymlExportsDir);
  const ymlMasterPath = pick(configYml, 'masterPath', 'master_path');
  if (ymlMasterPath !== undefined) fromYml.masterPath = String(ymlMasterPath);
  const ymlAliases = pick(configYml, 'sectionAliasesPath', 'section_aliases_path');
  if (ymlAliases !== undefined) fromYml.sectionAliasesPath = String(ymlAliases);
  const ymlOutputDir = pick(configYml, 'outputDir', 'output_dir');
  if (ymlOutputDir !== undefined) fromYml.outputDir = String(ymlOutputDir);
  const ymlThreshold = pick(configYml, 'threshold');
  if (ymlThreshold !== undefined) fromYml.threshold = Number(ymlThreshold);
  const ymlLanguage = pick(configYml, 'language');
  if (ymlLanguage !== undefined) fromYml.language = String(ymlLanguage);
  const ymlReference = pick(configYml, 'reference');
  if (ymlReference !== undefined) fromYml.reference = String(ymlReference);
  const ymlPairwise = pick(configYml, 'pairwise');
  const ymlPairwiseFlag =
    typeof ymlPairwise === 'boolean'
      ? ymlPairwise
      : parseBool(ymlPairwise === undefined ? undefined : String(ymlPairwise));
  if (ymlPairwiseFlag !== undefined) fromYml.pairwise = ymlPairwiseFlag;

  // ---- Layer 2: environment variables -----------------------------------

  const fromEnv: Partial<DriftConfig> = {};

  if (env.DRIFT_EXPORTS_DIR) fromEnv.exportsDir = env.DRIFT_EXPORTS_DIR;
  if (env.DRIFT_MASTER_PATH) fromEnv.masterPath = env.DRIFT_MASTER_PATH;
  if (env.DRIFT_SECTION_ALIASES) fromEnv.sectionAliasesPath = env.DRIFT_SECTION_ALIASES;
  if (env.DRIFT_OUTPUT_DIR) fromEnv.outputDir = env.DRIFT_OUTPUT_DIR;
  if (env.DRIFT_LANGUAGE) fromEnv.language = env.DRIFT_LANGUAGE;
  if (env.DRIFT_REFERENCE) fromEnv.reference = env.DRIFT_REFERENCE;

  const envThreshold = parseNum(env.DRIFT_THRESHOLD);
  if (envThreshold !== undefined) fromEnv.threshold = envThreshold;

  const envPairwise = parseBool(env.DRIFT_PAIRWISE);
  if (envPairwise !== undefined) fromEnv.pairwise = envPairwise;

  // ---- Merge (cli > env > yml > defaults) -------------------------------

  const merged: DriftConfig = {
    ...DEFAULTS,
    ...fromYml,
    ...fromEnv,
    ...cliArgs,
  };

  if (!Number.isFinite(merged.threshold) || merged.threshold < 0 || merged.threshold > 1) {
    throw new ConfigError(`Invalid threshold ${merged.threshold}: must lie between 0 and 1`);
  }

  return merged;
}
