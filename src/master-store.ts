/**
 * Master Store - The curated reference set of questions.
 *
 * The master is a YAML file keyed by normalized question code. It is built
 * by merging every export (newest wins), may be edited by hand, and is
 * loaded back as the baseline for comparisons.
 *
 * Layout of one entry:
 *
 * ```yaml
 * UnternehmenArt:
 *   element_type: SingleChoice
 *   section_name: Angaben zum Unternehmen   # omitted if absent
 *   section_index: 2                        # omitted if 0
 *   texts: { de-ch: ..., en: ... }
 *   choices: [{ code: "1", texts: {...} }]  # omitted if empty
 *   matrix_rows: [...]                      # omitted if empty
 *   matrix_columns: [...]                   # all groups flattened
 * ```
 *
 * @module master-store
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';
import {
  ELEMENT_TYPES,
  createQuestion,
  flattenColumns,
  normalizedCode,
  type CodedItem,
  type LocalizedText,
  type MatrixColumnGroup,
  type Question,
} from './models.js';

// ---------------------------------------------------------------------------
// Persisted shape
// ---------------------------------------------------------------------------

const TextMapSchema = z.record(z.string(), z.string());

export const MasterItemSchema = z.object({
  code: z.union([z.string(), z.number()]).transform(String),
  texts: TextMapSchema,
});
export type MasterItem = z.infer<typeof MasterItemSchema>;

export const MasterRecordSchema = z.object({
  element_type: z.enum(ELEMENT_TYPES),
  section_name: z.string().optional(),
  section_index: z.number().int().nonnegative().optional(),
  texts: TextMapSchema,
  choices: z.array(MasterItemSchema).optional(),
  matrix_rows: z.array(MasterItemSchema).optional(),
  matrix_columns: z.array(MasterItemSchema).optional(),
});
export type MasterRecord = z.infer<typeof MasterRecordSchema>;

/** Normalized code → record, in insertion order. */
export type Master = Map<string, MasterRecord>;

/** Raised when a master file cannot be read back. */
export class MasterFormatError extends Error {
  public readonly filePath: string;
  public readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid master file '${filePath}':\n  ${issues.join('\n  ')}`);
    this.name = 'MasterFormatError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Extract: Question list → master records
// ---------------------------------------------------------------------------

/** Language → text; the first entry for a language wins. */
function textsToMap(texts: LocalizedText[]): Record<string, string> {
  const entries = new Map<string, string>();
  for (const lt of texts) {
    if (!entries.has(lt.language)) {
      entries.set(lt.language, lt.text);
    }
  }
  return Object.fromEntries(entries);
}

function itemToRecord(item: CodedItem): MasterItem {
  return { code: item.code, texts: textsToMap(item.texts) };
}

/**
 * Convert one question to its persisted record.
 */
export function questionToRecord(q: Question): MasterRecord {
  const record: MasterRecord = {
    element_type: q.elementType,
    ...(q.sectionName !== undefined ? { section_name: q.sectionName } : {}),
    ...(q.sectionIndex ? { section_index: q.sectionIndex } : {}),
    texts: textsToMap(q.texts),
  };

  if (q.choices.length > 0) {
    record.choices = q.choices.map(itemToRecord);
  }
  if (q.matrixRows.length > 0) {
    record.matrix_rows = q.matrixRows.map(itemToRecord);
  }
  const columns = flattenColumns(q.matrixColumnGroups);
  if (columns.length > 0) {
    record.matrix_columns = columns.map(itemToRecord);
  }
  return record;
}

/**
 * Build master records keyed by normalized code. Later questions with the
 * same normalized code replace earlier ones.
 */
export function extractMaster(questions: Question[]): Master {
  const master: Master = new Map();
  for (const q of questions) {
    master.set(normalizedCode(q), questionToRecord(q));
  }
  return master;
}

/**
 * Merge per-export extracts given oldest → newest.
 *
 * Newer extracts replace records for the codes they contain; codes only
 * found in older exports are kept.
 */
export function mergeMasters(extracts: Master[]): Master {
  const merged: Master = new Map();
  for (const extract of extracts) {
    for (const [code, record] of extract) {
      merged.set(code, record);
    }
  }
  return merged;
}

// ---------------------------------------------------------------------------
// Save / Load
// ---------------------------------------------------------------------------

/**
 * Write the master to a YAML file, creating parent directories.
 *
 * The file is written to a temp path and renamed into place.
 */
export function saveMaster(master: Master, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  // A Map keeps insertion order; number-like codes are written quoted.
  const content = yaml.stringify(master, { lineWidth: 0 });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, content, 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

function keyOf(key: unknown): string {
  return String(yaml.isScalar(key) ? key.value : key);
}

/**
 * Read a master YAML file. An empty file yields an empty master.
 *
 * Records keep the order of the file, whatever their codes look like.
 *
 * @throws {MasterFormatError} when the YAML is malformed or a record does
 *   not have the persisted shape.
 */
export function loadMaster(filePath: string): Master {
  const content = fs.readFileSync(filePath, 'utf-8');

  const doc = yaml.parseDocument(content);
  if (doc.errors.length > 0) {
    throw new MasterFormatError(filePath, doc.errors.map(err => err.message));
  }

  const master: Master = new Map();
  const root = doc.contents;
  if (root === null || (yaml.isScalar(root) && root.value === null)) {
    return master;
  }
  if (!yaml.isMap(root)) {
    throw new MasterFormatError(filePath, ['(root): expected a mapping of question codes']);
  }

  const issues: string[] = [];
  for (const pair of root.items) {
    const code = keyOf(pair.key);
    const value: unknown = yaml.isNode(pair.value) ? pair.value.toJS(doc) : pair.value;
    const result = MasterRecordSchema.safeParse(value);
    if (result.success) {
      master.set(code, result.data);
    } else {
      issues.push(...result.error.issues.map(issue => `${[code, ...issue.path].join('.')}: ${issue.message}`));
    }
  }

  if (issues.length > 0) {
    throw new MasterFormatError(filePath, issues);
  }
  return master;
}

// ---------------------------------------------------------------------------
// Master → Question list
// ---------------------------------------------------------------------------

function mapToTexts(texts: Record<string, string>): LocalizedText[] {
  return Object.entries(texts).map(([language, text]) => ({ language, text }));
}

/**
 * Rebuild questions from master records so the master can be compared like
 * any export. Ids are 0; matrix columns land in a single group.
 */
export function masterToQuestions(master: Master): Question[] {
  return [...master].map(([code, record]) => {
    const columns = (record.matrix_columns ?? []).map(col => ({
      id: 0,
      code: col.code,
      texts: mapToTexts(col.texts),
      choiceType: 'Text',
    }));
    const matrixColumnGroups: MatrixColumnGroup[] =
      columns.length > 0 ? [{ id: 0, choiceType: 'Text', columns }] : [];

    return createQuestion({
      code,
      elementType: record.element_type,
      texts: mapToTexts(record.texts),
      choices: (record.choices ?? []).map(choice => ({
        id: 0,
        code: choice.code,
        texts: mapToTexts(choice.texts),
        allowTextEntry: false,
        exclusive: false,
      })),
      matrixRows: (record.matrix_rows ?? []).map(row => ({
        id: 0,
        code: row.code,
        texts: mapToTexts(row.texts),
      })),
      matrixColumnGroups,
      sectionName: record.section_name,
      sectionIndex: record.section_index ?? 0,
    });
  });
}
