/**
 * Section Normalization - Canonical section names across sources.
 *
 * Section names are typed by hand in every export, so the same section
 * shows up with stray whitespace, typos and small wording changes. The
 * normalizer collapses those variants in three passes:
 *
 *   1. Strip leading/trailing whitespace.
 *   2. Apply the operator-maintained alias map.
 *   3. Merge remaining near-duplicates (similarity >= 0.92), preferring
 *      the reference source's spelling. Merges are transitive, but two
 *      reference sections are never merged into each other.
 *
 * The result also drives section ordering in the comparison export.
 *
 * @module sections
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from './config.js';
import { normalizedCode, type Question } from './models.js';
import { similarity } from './similarity.js';

/** Names at or above this similarity are merged automatically. */
export const SECTION_MERGE_THRESHOLD = 0.92;

/** Section used for questions without one. */
export const FALLBACK_SECTION = 'Other';

/** One entry of the ordered section listing. */
export interface SectionGroup {
  name: string;
  /** Normalized question codes, each listed in exactly one section. */
  codes: string[];
  /** Variant spellings merged into `name`, when there are any. */
  aliases?: string[];
}

// ---------------------------------------------------------------------------
// Alias file
// ---------------------------------------------------------------------------

const AliasFileSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()]).transform(String),
);

/**
 * Load the section alias map (`variant: canonical`) from a YAML file.
 *
 * A missing or empty file means no aliases are configured.
 */
export function loadSectionAliases(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(`Section alias file is not valid YAML: ${filePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = AliasFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `Section alias file must map names to names: ${filePath}`,
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Union-find over canonical names
// ---------------------------------------------------------------------------

class NameMerger {
  private readonly parent = new Map<string, string>();

  constructor(private readonly preferred: ReadonlySet<string>) {}

  find(name: string): string {
    let root = name;
    for (let next = this.parent.get(root); next !== undefined; next = this.parent.get(root)) {
      root = next;
    }
    // Path compression
    let current = name;
    while (current !== root) {
      const next = this.parent.get(current) ?? root;
      this.parent.set(current, root);
      current = next;
    }
    return root;
  }

  /**
   * Merge `loser` into `winner`. A preferred root is never redirected away,
   * so two preferred names are never joined.
   */
  merge(winner: string, loser: string): void {
    const winnerRoot = this.find(winner);
    const loserRoot = this.find(loser);
    if (winnerRoot === loserRoot) return;

    const winnerPreferred = this.preferred.has(winnerRoot);
    const loserPreferred = this.preferred.has(loserRoot);
    if (winnerPreferred && loserPreferred) return;

    if (loserPreferred) {
      this.parent.set(winnerRoot, loserRoot);
    } else {
      this.parent.set(loserRoot, winnerRoot);
    }
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/** Source names with the reference first, the rest in their given order. */
function orderedSourceNames(sources: Iterable<string>, referenceSource: string): string[] {
  const names = [...sources];
  const index = names.indexOf(referenceSource);
  if (index > 0) {
    names.splice(index, 1);
    names.unshift(referenceSource);
  }
  return names;
}

function rawSectionName(question: Question): string {
  const name = question.sectionName;
  return name !== undefined && name.trim() !== '' ? name : FALLBACK_SECTION;
}

/**
 * Build a {@link SectionNormalizer} from every source of a run.
 *
 * @param allSources      - Source name → its questions, in source order.
 * @param referenceSource - Source whose ordering and spelling win ties.
 * @param aliases         - Operator alias map (`variant: canonical`).
 */
export function buildSectionNormalizer(
  allSources: ReadonlyMap<string, Question[]>,
  referenceSource: string,
  aliases: Readonly<Record<string, string>> = {},
): SectionNormalizer {
  const rawNamesBySource = new Map<string, string[]>();
  for (const [source, questions] of allSources) {
    rawNamesBySource.set(source, [...new Set(questions.map(rawSectionName))]);
  }
  const sourceOrder = orderedSourceNames(rawNamesBySource.keys(), referenceSource);

  // Phase 1: strip whitespace. Insertion order follows sourceOrder.
  const nameMap = new Map<string, string>();
  for (const source of sourceOrder) {
    for (const raw of rawNamesBySource.get(source) ?? []) {
      if (!nameMap.has(raw)) {
        nameMap.set(raw, raw.trim());
      }
    }
  }

  // Phase 2: explicit aliases, stripped name first.
  for (const [raw, stripped] of nameMap) {
    if (Object.hasOwn(aliases, stripped)) {
      nameMap.set(raw, aliases[stripped]);
    } else if (Object.hasOwn(aliases, raw)) {
      nameMap.set(raw, aliases[raw]);
    }
  }

  const canonicalOf = (raw: string): string => nameMap.get(raw) ?? raw.trim();

  const canonicalNames: string[] = [];
  for (const source of sourceOrder) {
    for (const raw of rawNamesBySource.get(source) ?? []) {
      const canonical = canonicalOf(raw);
      if (!canonicalNames.includes(canonical)) {
        canonicalNames.push(canonical);
      }
    }
  }

  // Phase 3: fuzzy merge of near-duplicates.
  const referenceNames = new Set((rawNamesBySource.get(referenceSource) ?? []).map(canonicalOf));
  const merger = new NameMerger(referenceNames);

  for (let i = 0; i < canonicalNames.length; i++) {
    const nameA = canonicalNames[i];
    for (let j = i + 1; j < canonicalNames.length; j++) {
      const nameB = canonicalNames[j];
      if (similarity(nameA.toLowerCase(), nameB.toLowerCase()) < SECTION_MERGE_THRESHOLD) {
        continue;
      }

      const aIsReference = referenceNames.has(nameA);
      const bIsReference = referenceNames.has(nameB);
      if (bIsReference && !aIsReference) {
        merger.merge(nameB, nameA);
      } else {
        merger.merge(nameA, nameB);
      }
    }
  }

  for (const [raw, canonical] of nameMap) {
    nameMap.set(raw, merger.find(canonical));
  }

  // Variant spellings per canonical name, for display.
  const aliasDisplay = new Map<string, string[]>();
  for (const [raw, canonical] of nameMap) {
    const stripped = raw.trim();
    if (stripped === canonical) continue;
    const variants = aliasDisplay.get(canonical) ?? [];
    if (!variants.includes(stripped)) {
      variants.push(stripped);
    }
    aliasDisplay.set(canonical, variants);
  }

  return new SectionNormalizer(nameMap, aliasDisplay, referenceSource);
}

// ---------------------------------------------------------------------------
// SectionNormalizer
// ---------------------------------------------------------------------------

/**
 * Maps raw section names to canonical ones and orders sections for output.
 */
export class SectionNormalizer {
  constructor(
    private readonly nameMap: ReadonlyMap<string, string>,
    private readonly aliasDisplay: ReadonlyMap<string, string[]>,
    private readonly referenceSource: string,
  ) {}

  /**
   * Canonical name for a raw section name. Names never seen while building
   * are only stripped.
   */
  normalize(rawName: string): string {
    return this.nameMap.get(rawName) ?? rawName.trim();
  }

  /** Variant names that collapsed into `canonicalName`. */
  aliasesFor(canonicalName: string): string[] {
    return [...(this.aliasDisplay.get(canonicalName) ?? [])];
  }

  /** Canonical name → variants, only for names that have variants. */
  get allAliases(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [canonical, variants] of this.aliasDisplay) {
      if (variants.length > 0) {
        result[canonical] = [...variants];
      }
    }
    return result;
  }

  /**
   * Group normalized question codes by canonical section.
   *
   * Sources are walked reference first; questions within a source are
   * ordered by section position. A code is listed once, under the section
   * where it is first encountered.
   */
  orderedSections(allSources: ReadonlyMap<string, Question[]>): SectionGroup[] {
    const sectionCodes = new Map<string, string[]>();
    const seenCodes = new Set<string>();

    for (const source of orderedSourceNames(allSources.keys(), this.referenceSource)) {
      const questions = [...(allSources.get(source) ?? [])].sort(
        (a, b) => a.sectionIndex - b.sectionIndex,
      );

      for (const q of questions) {
        const canonical = this.normalize(rawSectionName(q));
        const codes = sectionCodes.get(canonical) ?? [];
        sectionCodes.set(canonical, codes);

        const code = normalizedCode(q);
        if (!seenCodes.has(code)) {
          codes.push(code);
          seenCodes.add(code);
        }
      }
    }

    return [...sectionCodes].map(([name, codes]) => {
      const aliases = this.aliasesFor(name);
      return aliases.length > 0 ? { name, codes, aliases } : { name, codes };
    });
  }
}
