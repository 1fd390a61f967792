/**
 * Comparison Export - Builds the JSON document consumed by report viewers.
 *
 * The document has three parts:
 *
 *   - `meta`: sources, display names, default reference, languages,
 *     canonical section ordering and summary counts.
 *   - `questions`: per source, per normalized code, the question as seen
 *     in that source.
 *   - `diffs`: per directed pair (`A→B`), per normalized code, the full diff
 *     including nested per-language text diffs.
 *
 * @module export
 */

import { worstStatus } from './compare.js';
import {
  flattenColumns,
  normalizedCode,
  type ChoiceDiff,
  type CodedItem,
  type ComparisonResult,
  type ElementType,
  type LocalizedText,
  type Question,
  type QuestionDiff,
  type QuestionStatus,
  type TextDiff,
} from './models.js';
import { extractShortName } from './parse.js';
import { writeValidatedJson } from './schema-validator.js';
import { buildSectionNormalizer, type SectionGroup } from './sections.js';

/** Source id used for the master baseline. */
export const MASTER_SOURCE = 'master';

/** Joins the two source ids of a directed diff. */
export const PAIR_ARROW = '→';

/** Name of the schema `saveData` validates against. */
export const EXPORT_SCHEMA = 'comparison-export';

// ---------------------------------------------------------------------------
// Exported shapes
// ---------------------------------------------------------------------------

export interface ExportedTextDiff {
  language: string;
  status: TextDiff['status'];
  similarity: number;
  old_text: string;
  new_text: string;
}

export interface ExportedChoiceDiff {
  code: string;
  status: ChoiceDiff['status'];
  text_diffs: ExportedTextDiff[];
}

export interface ExportedQuestionDiff {
  code: string;
  element_type: ElementType;
  status: QuestionStatus;
  text_diffs: ExportedTextDiff[];
  choice_diffs: ExportedChoiceDiff[];
  matrix_row_diffs: ExportedChoiceDiff[];
  matrix_column_diffs: ExportedChoiceDiff[];
}

export interface ExportedItem {
  code: string;
  texts: Record<string, string>;
}

export interface ExportedQuestion {
  id: number;
  code: string;
  element_type: ElementType;
  section_name: string | null;
  texts: Record<string, string>;
  choices?: ExportedItem[];
  matrix_rows?: ExportedItem[];
  matrix_columns?: ExportedItem[];
}

export interface ExportMeta {
  sources: string[];
  short_names: Record<string, string>;
  default_reference: string;
  default_language: string;
  languages: string[];
  sections: SectionGroup[];
  section_aliases: Record<string, string[]>;
  total_questions: number;
  status_counts: Record<QuestionStatus, number>;
}

export interface ComparisonExport {
  meta: ExportMeta;
  questions: Record<string, Record<string, ExportedQuestion>>;
  diffs: Record<string, Record<string, ExportedQuestionDiff>>;
}

export interface ExportOptions {
  /** Master baseline, exported under the `master` source id. */
  masterQuestions?: Question[];
  /** Preselected reference; defaults to `master`, else the first source. */
  defaultReference?: string;
  /** Default display language for viewers. */
  language?: string;
  /** Operator section aliases (`variant: canonical`). */
  sectionAliases?: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Projections
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

function itemToExport(item: CodedItem): ExportedItem {
  return { code: item.code, texts: textsToMap(item.texts) };
}

/**
 * Project a question for the export. Matrix questions carry rows and
 * flattened columns, all others carry choices.
 */
export function questionToExport(q: Question): ExportedQuestion {
  const exported: ExportedQuestion = {
    id: q.id,
    code: q.code,
    element_type: q.elementType,
    section_name: q.sectionName ?? null,
    texts: textsToMap(q.texts),
  };
  if (q.elementType === 'Matrix') {
    exported.matrix_rows = q.matrixRows.map(itemToExport);
    exported.matrix_columns = flattenColumns(q.matrixColumnGroups).map(itemToExport);
  } else {
    exported.choices = q.choices.map(itemToExport);
  }
  return exported;
}

function textDiffToExport(td: TextDiff): ExportedTextDiff {
  return {
    language: td.language,
    status: td.status,
    similarity: td.similarity,
    old_text: td.oldText,
    new_text: td.newText,
  };
}

function choiceDiffToExport(cd: ChoiceDiff): ExportedChoiceDiff {
  return { code: cd.code, status: cd.status, text_diffs: cd.textDiffs.map(textDiffToExport) };
}

/**
 * Project a question diff for the export, keeping every nested text diff.
 */
export function questionDiffToExport(qd: QuestionDiff): ExportedQuestionDiff {
  return {
    code: qd.code,
    element_type: qd.elementType,
    status: qd.status,
    text_diffs: qd.textDiffs.map(textDiffToExport),
    choice_diffs: qd.choiceDiffs.map(choiceDiffToExport),
    matrix_row_diffs: qd.matrixRowDiffs.map(choiceDiffToExport),
    matrix_column_diffs: qd.matrixColumnDiffs.map(choiceDiffToExport),
  };
}

/** Key of a directed comparison, e.g. `master→surveyA`. */
export function diffPairKey(sourceA: string, sourceB: string): string {
  return `${sourceA}${PAIR_ARROW}${sourceB}`;
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

function emptyStatusCounts(): Record<QuestionStatus, number> {
  return { identical: 0, text_changed: 0, structure_changed: 0, added: 0, removed: 0 };
}

/**
 * Build the comparison export document.
 *
 * @param results           - Directed comparisons to include.
 * @param questionsBySource - Export source id → its questions, in order.
 */
export function exportData(
  results: ComparisonResult[],
  questionsBySource: ReadonlyMap<string, Question[]>,
  options: ExportOptions = {},
): ComparisonExport {
  const allSources = new Map<string, Question[]>();
  if (options.masterQuestions) {
    allSources.set(MASTER_SOURCE, options.masterQuestions);
  }
  for (const [source, questions] of questionsBySource) {
    allSources.set(source, questions);
  }

  const sources = [...allSources.keys()];
  const defaultReference =
    options.defaultReference ?? (options.masterQuestions ? MASTER_SOURCE : sources[0] ?? '');

  const shortNames: Record<string, string> = {};
  for (const source of sources) {
    shortNames[source] = source === MASTER_SOURCE ? 'Master' : extractShortName(source);
  }

  const languageSet = new Set<string>();
  // Object.fromEntries keeps every code, `__proto__` included, as an own key.
  const questions = new Map<string, Record<string, ExportedQuestion>>();
  const allCodes = new Set<string>();
  for (const [source, sourceQuestions] of allSources) {
    const byCode = new Map<string, ExportedQuestion>();
    for (const q of sourceQuestions) {
      const code = normalizedCode(q);
      byCode.set(code, questionToExport(q));
      allCodes.add(code);
      for (const lt of q.texts) {
        languageSet.add(lt.language);
      }
    }
    questions.set(source, Object.fromEntries(byCode));
  }
  const languages = languageSet.size > 0 ? [...languageSet].sort() : ['en'];

  const diffs = new Map<string, Record<string, ExportedQuestionDiff>>();
  const referenceStatuses = new Map<string, QuestionStatus[]>();
  for (const result of results) {
    const byCode = new Map<string, ExportedQuestionDiff>();
    for (const qd of result.questionDiffs) {
      byCode.set(qd.code, questionDiffToExport(qd));
      if (result.sourceA === defaultReference) {
        const statuses = referenceStatuses.get(qd.code) ?? [];
        statuses.push(qd.status);
        referenceStatuses.set(qd.code, statuses);
      }
    }
    diffs.set(diffPairKey(result.sourceA, result.sourceB), Object.fromEntries(byCode));
  }

  const statusCounts = emptyStatusCounts();
  for (const statuses of referenceStatuses.values()) {
    statusCounts[worstStatus(statuses)] += 1;
  }

  const normalizer = buildSectionNormalizer(allSources, defaultReference, options.sectionAliases);

  return {
    meta: {
      sources,
      short_names: shortNames,
      default_reference: defaultReference,
      default_language: options.language ?? 'de-CH',
      languages,
      sections: normalizer.orderedSections(allSources),
      section_aliases: normalizer.allAliases,
      total_questions: allCodes.size,
      status_counts: statusCounts,
    },
    questions: Object.fromEntries(questions),
    diffs: Object.fromEntries(diffs),
  };
}

/**
 * Validate the document against its schema and write it as pretty JSON.
 *
 * @throws {SchemaValidationError} when the document does not match.
 */
export function saveData(data: ComparisonExport, filePath: string): void {
  writeValidatedJson(filePath, data, EXPORT_SCHEMA);
}
