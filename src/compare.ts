/**
 * Comparison Engine - Diffs questions across two questionnaire sources.
 *
 * Every function here is pure: inputs are read, never mutated, and each
 * call builds its own diff tree. Ordering is deterministic so that the
 * same inputs always produce the same output.
 *
 * @module compare
 */

import {
  ComparisonResult,
  createQuestionDiff,
  flattenColumns,
  normalizedCode,
  type AnswerOption,
  type ChoiceDiff,
  type CodedItem,
  type LocalizedText,
  type MatrixColumnGroup,
  type MatrixRow,
  type Question,
  type QuestionDiff,
  type QuestionStatus,
  type TextDiff,
} from './models.js';
import { DEFAULT_SIMILARITY_THRESHOLD, classifyScore, similarity } from './similarity.js';

// ---------------------------------------------------------------------------
// Text comparison
// ---------------------------------------------------------------------------

/** Lowercased language → text; the first entry for a language wins. */
function buildTextIndex(texts: LocalizedText[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const lt of texts) {
    const language = lt.language.toLowerCase();
    if (!index.has(language)) {
      index.set(language, lt.text);
    }
  }
  return index;
}

/**
 * Compare multilingual texts and return one diff per language, sorted by
 * language code.
 */
export function compareTexts(
  oldTexts: LocalizedText[],
  newTexts: LocalizedText[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): TextDiff[] {
  const oldMap = buildTextIndex(oldTexts);
  const newMap = buildTextIndex(newTexts);
  const languages = [...new Set([...oldMap.keys(), ...newMap.keys()])].sort();

  return languages.map((language): TextDiff => {
    const oldText = oldMap.get(language);
    const newText = newMap.get(language);

    if (oldText === undefined) {
      return { language, status: 'added', similarity: 0.0, oldText: '', newText: newText ?? '' };
    }
    if (newText === undefined) {
      return { language, status: 'removed', similarity: 0.0, oldText, newText: '' };
    }

    const score = similarity(oldText, newText);
    return { language, status: classifyScore(score, threshold), similarity: score, oldText, newText };
  });
}

// ---------------------------------------------------------------------------
// Coded items (options, rows, columns)
// ---------------------------------------------------------------------------

/**
 * Compare two lists of coded items by code.
 *
 * Codes are reported in first-seen order: every old code in its original
 * order, then codes that only appear in `newItems`.
 */
export function compareCodedItems<T extends CodedItem>(
  oldItems: readonly T[],
  newItems: readonly T[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): ChoiceDiff[] {
  const oldMap = new Map(oldItems.map(item => [item.code, item] as const));
  const newMap = new Map(newItems.map(item => [item.code, item] as const));
  const codes = [...new Set([...oldItems, ...newItems].map(item => item.code))];

  return codes.map((code): ChoiceDiff => {
    const oldItem = oldMap.get(code);
    const newItem = newMap.get(code);

    if (oldItem === undefined) {
      return { code, status: 'added', textDiffs: [] };
    }
    if (newItem === undefined) {
      return { code, status: 'removed', textDiffs: [] };
    }

    const textDiffs = compareTexts(oldItem.texts, newItem.texts, threshold);
    const changed = textDiffs.some(td => td.status !== 'exact');
    return { code, status: changed ? 'text_changed' : 'unchanged', textDiffs };
  });
}

export function compareChoices(
  oldChoices: AnswerOption[],
  newChoices: AnswerOption[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): ChoiceDiff[] {
  return compareCodedItems(oldChoices, newChoices, threshold);
}

export function compareMatrixRows(
  oldRows: MatrixRow[],
  newRows: MatrixRow[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): ChoiceDiff[] {
  return compareCodedItems(oldRows, newRows, threshold);
}

/**
 * Compare matrix columns by code, ignoring which group they belong to.
 */
export function compareMatrixColumns(
  oldGroups: MatrixColumnGroup[],
  newGroups: MatrixColumnGroup[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): ChoiceDiff[] {
  return compareCodedItems(flattenColumns(oldGroups), flattenColumns(newGroups), threshold);
}

// ---------------------------------------------------------------------------
// Question-level comparison
// ---------------------------------------------------------------------------

/**
 * Diff one question present in both sources.
 *
 * The caller matches the two questions; this only diffs them. The returned
 * `code` is `oldQuestion.code` until the caller overwrites it with the key
 * it matched on.
 */
export function compareQuestions(
  oldQuestion: Question,
  newQuestion: Question,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): QuestionDiff {
  const textDiffs = compareTexts(oldQuestion.texts, newQuestion.texts, threshold);

  let choiceDiffs: ChoiceDiff[] = [];
  let matrixRowDiffs: ChoiceDiff[] = [];
  let matrixColumnDiffs: ChoiceDiff[] = [];

  // Either side being a matrix routes both through the matrix structure.
  if (oldQuestion.elementType === 'Matrix' || newQuestion.elementType === 'Matrix') {
    matrixRowDiffs = compareMatrixRows(oldQuestion.matrixRows, newQuestion.matrixRows, threshold);
    matrixColumnDiffs = compareMatrixColumns(
      oldQuestion.matrixColumnGroups,
      newQuestion.matrixColumnGroups,
      threshold,
    );
  } else {
    choiceDiffs = compareChoices(oldQuestion.choices, newQuestion.choices, threshold);
  }

  const itemDiffs = [...choiceDiffs, ...matrixRowDiffs, ...matrixColumnDiffs];
  const hasStructureChange = itemDiffs.some(d => d.status === 'added' || d.status === 'removed');
  const hasTextChange =
    textDiffs.some(td => td.status !== 'exact') ||
    itemDiffs.some(d => d.status === 'text_changed');

  let status: QuestionStatus = 'identical';
  if (hasStructureChange) {
    status = 'structure_changed';
  } else if (hasTextChange) {
    status = 'text_changed';
  }

  return {
    code: oldQuestion.code,
    elementType: oldQuestion.elementType,
    status,
    textDiffs,
    choiceDiffs,
    matrixRowDiffs,
    matrixColumnDiffs,
  };
}

// ---------------------------------------------------------------------------
// Full survey comparison
// ---------------------------------------------------------------------------

/** Normalized code → question; the last question with a code wins. */
function indexByNormalizedCode(questions: Question[]): Map<string, Question> {
  const index = new Map<string, Question>();
  for (const q of questions) {
    index.set(normalizedCode(q), q);
  }
  return index;
}

/**
 * Compare two full question lists, matching questions by normalized code.
 */
export function compareSurveys(
  questionsA: Question[],
  questionsB: Question[],
  sourceA = 'A',
  sourceB = 'B',
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): ComparisonResult {
  const mapA = indexByNormalizedCode(questionsA);
  const mapB = indexByNormalizedCode(questionsB);
  const codes = [...new Set([...questionsA, ...questionsB].map(normalizedCode))];

  const diffs = codes.map((code): QuestionDiff => {
    const qa = mapA.get(code);
    const qb = mapB.get(code);

    if (qa === undefined && qb !== undefined) {
      return createQuestionDiff({ code, elementType: qb.elementType, status: 'added' });
    }
    if (qa !== undefined && qb === undefined) {
      return createQuestionDiff({ code, elementType: qa.elementType, status: 'removed' });
    }
    if (qa === undefined || qb === undefined) {
      throw new Error(`Code '${code}' is missing from both sources`);
    }

    const diff = compareQuestions(qa, qb, threshold);
    diff.code = code;
    return diff;
  });

  return new ComparisonResult(sourceA, sourceB, diffs);
}

/**
 * Compare every ordered pair of distinct sources, in source order.
 */
export function compareAllPairs(
  sources: Map<string, Question[]>,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): ComparisonResult[] {
  const results: ComparisonResult[] = [];
  for (const [nameA, questionsA] of sources) {
    for (const [nameB, questionsB] of sources) {
      if (nameA === nameB) continue;
      results.push(compareSurveys(questionsA, questionsB, nameA, nameB, threshold));
    }
  }
  return results;
}

// ---------------------------------------------------------------------------
// Status aggregation
// ---------------------------------------------------------------------------

/** Most severe first. */
const STATUS_PRIORITY: readonly QuestionStatus[] = [
  'structure_changed',
  'text_changed',
  'added',
  'removed',
  'identical',
];

/**
 * The most severe status among `statuses`, or `identical` when empty.
 */
export function worstStatus(statuses: Iterable<QuestionStatus>): QuestionStatus {
  let worst: QuestionStatus = 'identical';
  for (const status of statuses) {
    if (STATUS_PRIORITY.indexOf(status) < STATUS_PRIORITY.indexOf(worst)) {
      worst = status;
    }
  }
  return worst;
}
