/**
 * Export Parser - Questionnaire JSON exports → normalized Questions.
 *
 * An export is a JSON document of sections, each holding elements. Only
 * question elements (see {@link ELEMENT_TYPES}) become Questions; text
 * blocks, page breaks and the like are skipped. Markup is stripped from
 * every text so comparisons work on plain prose.
 *
 * @module parse
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { decodeHTML } from 'entities';
import { z } from 'zod';
import {
  ELEMENT_TYPES,
  createQuestion,
  type AnswerOption,
  type ElementType,
  type LocalizedText,
  type MatrixColumnGroup,
  type Question,
} from './models.js';

// ---------------------------------------------------------------------------
// Raw export schema
// ---------------------------------------------------------------------------

const RawTextSchema = z.object({
  languageCode: z.string(),
  text: z.string().nullish(),
});

const RawChoiceSchema = z
  .object({
    id: z.number().int(),
    code: z.string().nullish(),
    text: z.array(RawTextSchema).nullish(),
    allowTextEntry: z.boolean().optional(),
    exclusive: z.boolean().optional(),
  })
  .passthrough();

const RawColumnGroupSchema = z
  .object({
    id: z.number().int(),
    choiceType: z.string().optional(),
    choices: z.array(RawChoiceSchema).optional(),
  })
  .passthrough();

const RawElementSchema = z
  .object({
    id: z.number().int(),
    elementType: z.string(),
    code: z.string().nullish(),
    text: z.array(RawTextSchema).nullish(),
    hintText: z.array(RawTextSchema).nullish(),
    choices: z.array(RawChoiceSchema).optional(),
    columnGroups: z.array(RawColumnGroupSchema).optional(),
    forceResponse: z.boolean().optional(),
    conditions: z.array(z.unknown()).nullish(),
  })
  .passthrough();

const RawSectionSchema = z
  .object({
    name: z.string().nullish(),
    elements: z.array(RawElementSchema).default([]),
  })
  .passthrough();

export const RawExportSchema = z
  .object({
    sections: z.array(RawSectionSchema).default([]),
  })
  .passthrough();

export type RawExport = z.infer<typeof RawExportSchema>;
type RawElement = z.infer<typeof RawElementSchema>;
type RawChoice = z.infer<typeof RawChoiceSchema>;
type RawText = z.infer<typeof RawTextSchema>;

/** Raised when an export file cannot be read as a questionnaire. */
export class ExportFormatError extends Error {
  public readonly filePath: string;
  public readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid export '${filePath}':\n  ${issues.join('\n  ')}`);
    this.name = 'ExportFormatError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Filename utilities
// ---------------------------------------------------------------------------

/** `..._20260127_1248.json` → `20260127` */
const DATE_PATTERN = /_(\d{8})_\d{4}\.json$/;

/**
 * Extract the `YYYYMMDD` date from an export filename.
 */
export function extractDateFromFilename(filename: string): string | undefined {
  const match = DATE_PATTERN.exec(filename);
  return match ? match[1] : undefined;
}

/**
 * Sort export paths oldest first. Files without a date sort first.
 */
export function sortFilesByDate(files: string[]): string[] {
  const key = (file: string): string => extractDateFromFilename(path.basename(file)) ?? '00000000';
  return [...files].sort((a, b) => key(a).localeCompare(key(b)));
}

/**
 * Short display name: the token between the first two underscores.
 *
 * `survey_IPf_ImplementationsPartner_Final_20260127_1248` → `IPf`
 */
export function extractShortName(filename: string): string {
  const parts = filename.split('_');
  return parts.length >= 2 ? parts[1] : filename;
}

/**
 * All `*.json` exports in a directory, oldest first.
 */
export function findExportFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  const files = fs
    .readdirSync(dir)
    .filter(name => name.endsWith('.json'))
    .map(name => path.join(dir, name));
  return sortFilesByDate(files);
}

// ---------------------------------------------------------------------------
// Text cleaning
// ---------------------------------------------------------------------------

/**
 * Strip markup from an export text: tags removed, HTML entities decoded,
 * zero-width spaces dropped, runs of spaces/tabs collapsed, trimmed.
 *
 * Character references outside Unicode decode to U+FFFD.
 */
export function cleanText(text: string): string {
  let cleaned = text.replace(/<[^>]+>/g, '');
  cleaned = decodeHTML(cleaned);
  cleaned = cleaned.replace(/\u00a0/g, ' ').replace(/\u200b/g, '');
  cleaned = cleaned.replace(/[ \t]+/g, ' ');
  return cleaned.trim();
}

// ---------------------------------------------------------------------------
// Element → Question
// ---------------------------------------------------------------------------

function isQuestionType(value: string): value is ElementType {
  return (ELEMENT_TYPES as readonly string[]).includes(value);
}

function parseLocalized(raw: RawText[] | null | undefined): LocalizedText[] {
  return (raw ?? []).map(item => ({
    language: item.languageCode.toLowerCase(),
    text: cleanText(item.text ?? ''),
  }));
}

function parseChoice(raw: RawChoice): AnswerOption {
  return {
    id: raw.id,
    code: raw.code ?? '',
    texts: parseLocalized(raw.text),
    allowTextEntry: raw.allowTextEntry ?? false,
    exclusive: raw.exclusive ?? false,
  };
}

function parseElement(
  element: RawElement,
  sectionName: string | undefined,
  sectionIndex: number,
): Question | undefined {
  const elementType = element.elementType;
  if (!isQuestionType(elementType)) {
    return undefined;
  }

  const base = {
    id: element.id,
    code: element.code ?? '',
    elementType,
    texts: parseLocalized(element.text),
    hintTexts: parseLocalized(element.hintText),
    forceResponse: element.forceResponse ?? false,
    sectionName,
    sectionIndex,
    conditions: element.conditions ?? undefined,
  };

  if (elementType !== 'Matrix') {
    return createQuestion({ ...base, choices: (element.choices ?? []).map(parseChoice) });
  }

  // Matrix rows travel in the element's top-level choices.
  const matrixColumnGroups: MatrixColumnGroup[] = (element.columnGroups ?? []).map(group => ({
    id: group.id,
    choiceType: group.choiceType ?? 'Text',
    columns: (group.choices ?? []).map(col => ({
      id: col.id,
      code: col.code ?? '',
      texts: parseLocalized(col.text),
      choiceType: group.choiceType ?? 'Text',
    })),
  }));

  return createQuestion({
    ...base,
    matrixRows: (element.choices ?? []).map(row => ({
      id: row.id,
      code: row.code ?? '',
      texts: parseLocalized(row.text),
    })),
    matrixColumnGroups,
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Turn a validated export into Questions, in section then element order.
 */
export function parseSurvey(data: RawExport): Question[] {
  const questions: Question[] = [];
  data.sections.forEach((section, sectionIndex) => {
    for (const element of section.elements) {
      const q = parseElement(element, section.name ?? undefined, sectionIndex);
      if (q !== undefined) {
        questions.push(q);
      }
    }
  });
  return questions;
}

/**
 * Validate arbitrary JSON as an export and parse it.
 *
 * @throws {ExportFormatError} naming `source` when the shape is wrong.
 */
export function parseExportData(data: unknown, source = '(inline)'): Question[] {
  const result = RawExportSchema.safeParse(data);
  if (!result.success) {
    throw new ExportFormatError(
      source,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parseSurvey(result.data);
}

/**
 * Read an export file and return its questions.
 *
 * @throws {ExportFormatError} when the file is not JSON or not an export.
 */
export function loadAndParse(filePath: string): Question[] {
  const content = fs.readFileSync(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new ExportFormatError(filePath, [
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  return parseExportData(data, filePath);
}
