/**
 * Text Similarity - Lexical similarity scores and status tiers.
 *
 * The score is `2 * M / (|a| + |b|)`, where `M` counts the characters that
 * a minimal character-level diff leaves in common. It is symmetric, equals
 * 1.0 only for identical strings and falls as the strings diverge.
 *
 * @module similarity
 */

import { diffChars } from 'diff';
import type { TextStatus } from './models.js';

/** Scores at or above this are "similar" unless stated otherwise. */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.9;

/**
 * Lexical similarity of two strings in [0, 1].
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 1.0;

  let common = 0;
  for (const part of diffChars(a, b)) {
    if (!part.added && !part.removed) {
      common += part.value.length;
    }
  }

  return (2 * common) / (a.length + b.length);
}

/**
 * Classify a similarity score: `exact`, `similar` or `different`.
 */
export function classifyScore(
  score: number,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): Extract<TextStatus, 'exact' | 'similar' | 'different'> {
  if (score === 1.0) return 'exact';
  if (score >= threshold) return 'similar';
  return 'different';
}
