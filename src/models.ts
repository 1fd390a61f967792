/**
 * Questionnaire Models - Normalized question elements and diff results.
 *
 * Questions are produced once per parsed export and are treated as
 * read-only by every comparison routine. Diff entities are built fresh
 * for each comparison run and never shared between runs.
 *
 * @module models
 */

import { normalizeCode } from './code-normalizer.js';

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const ELEMENT_TYPES = [
  'SingleChoice',
  'MultipleChoice',
  'OpenQuestion',
  'Matrix',
  'Dropdown',
] as const;

export type ElementType = (typeof ELEMENT_TYPES)[number];

/** Status of a single language's text. */
export type TextStatus = 'exact' | 'similar' | 'different' | 'added' | 'removed';

/** Status of an answer option, matrix row or matrix column. */
export type ChoiceStatus = 'unchanged' | 'text_changed' | 'added' | 'removed';

/** Overall status of one question between two sources. */
export type QuestionStatus =
  | 'identical'
  | 'text_changed'
  | 'structure_changed'
  | 'added'
  | 'removed';

// ---------------------------------------------------------------------------
// Question elements
// ---------------------------------------------------------------------------

export interface LocalizedText {
  language: string;
  text: string;
}

/**
 * Anything identified by a code within its parent and carrying
 * multilingual texts. Answer options, matrix rows and matrix columns all
 * satisfy this shape.
 */
export interface CodedItem {
  code: string;
  texts: LocalizedText[];
}

export interface AnswerOption extends CodedItem {
  id: number;
  allowTextEntry: boolean;
  exclusive: boolean;
}

export interface MatrixRow extends CodedItem {
  id: number;
}

export interface MatrixColumn extends CodedItem {
  id: number;
  choiceType: string;
}

/** Presentational grouping of matrix columns; not compared. */
export interface MatrixColumnGroup {
  id: number;
  choiceType: string;
  columns: MatrixColumn[];
}

export interface Question {
  id: number;
  /** Raw, edition-specific code (may carry a one-letter prefix). */
  code: string;
  elementType: ElementType;
  texts: LocalizedText[];
  hintTexts: LocalizedText[];
  /** Empty for Matrix questions. */
  choices: AnswerOption[];
  /** Populated only for Matrix questions. */
  matrixRows: MatrixRow[];
  /** Populated only for Matrix questions. */
  matrixColumnGroups: MatrixColumnGroup[];
  forceResponse: boolean;
  sectionName?: string;
  /** 0-based position of the owning section within its source. */
  sectionIndex: number;
  conditions?: unknown[];
}

/**
 * Create a question with empty structure, overriding any fields given.
 */
export function createQuestion(
  fields: Pick<Question, 'code' | 'elementType'> & Partial<Question>,
): Question {
  return {
    id: 0,
    texts: [],
    hintTexts: [],
    choices: [],
    matrixRows: [],
    matrixColumnGroups: [],
    forceResponse: false,
    sectionIndex: 0,
    ...fields,
  };
}

/** Cross-edition matching key, derived from the current code on every call. */
export function normalizedCode(question: Pick<Question, 'code'>): string {
  return normalizeCode(question.code);
}

/** All columns of all groups, in group order. */
export function flattenColumns(groups: MatrixColumnGroup[]): MatrixColumn[] {
  return groups.flatMap(group => group.columns);
}

/**
 * Question text for `language`, falling back to the first available text.
 */
export function getText(question: Pick<Question, 'texts'>, language = 'de-ch'): string {
  const wanted = language.toLowerCase();
  const match = question.texts.find(lt => lt.language.toLowerCase() === wanted);
  if (match) return match.text;
  return question.texts.length > 0 ? question.texts[0].text : '';
}

// ---------------------------------------------------------------------------
// Diff results
// ---------------------------------------------------------------------------

export interface TextDiff {
  language: string;
  status: TextStatus;
  /** 0.0 – 1.0 */
  similarity: number;
  oldText: string;
  newText: string;
}

export interface ChoiceDiff {
  code: string;
  status: ChoiceStatus;
  textDiffs: TextDiff[];
}

export interface QuestionDiff {
  code: string;
  elementType: ElementType;
  status: QuestionStatus;
  textDiffs: TextDiff[];
  choiceDiffs: ChoiceDiff[];
  matrixRowDiffs: ChoiceDiff[];
  matrixColumnDiffs: ChoiceDiff[];
}

/**
 * Build a question diff with empty detail lists, overriding any fields given.
 */
export function createQuestionDiff(
  fields: Pick<QuestionDiff, 'code' | 'elementType' | 'status'> & Partial<QuestionDiff>,
): QuestionDiff {
  return {
    textDiffs: [],
    choiceDiffs: [],
    matrixRowDiffs: [],
    matrixColumnDiffs: [],
    ...fields,
  };
}

/**
 * Complete comparison output for two sources.
 *
 * `sourceA` and `sourceB` are opaque caller labels. The derived views are
 * recomputed on every access.
 */
export class ComparisonResult {
  readonly sourceA: string;
  readonly sourceB: string;
  readonly questionDiffs: QuestionDiff[];

  constructor(sourceA: string, sourceB: string, questionDiffs: QuestionDiff[] = []) {
    this.sourceA = sourceA;
    this.sourceB = sourceB;
    this.questionDiffs = questionDiffs;
  }

  /** Diffs for codes present on both sides. */
  get matched(): QuestionDiff[] {
    return this.questionDiffs.filter(d => d.status !== 'added' && d.status !== 'removed');
  }

  get added(): QuestionDiff[] {
    return this.questionDiffs.filter(d => d.status === 'added');
  }

  get removed(): QuestionDiff[] {
    return this.questionDiffs.filter(d => d.status === 'removed');
  }
}
