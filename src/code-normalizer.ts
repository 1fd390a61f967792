/**
 * Code Normalizer - Strips the edition prefix from question codes.
 *
 * Editions of the same questionnaire prefix otherwise identical codes
 * with a single letter (`FUnternehmenArt` in one, `IUnternehmenArt` in
 * another). The rule is purely syntactic: a leading F/f/I/i is dropped
 * when the next character is an uppercase letter. A code that merely
 * happens to look like that is stripped too; fix such cases through the
 * alias table, not here.
 *
 * @module code-normalizer
 */

/** Prefix letters used by the survey editions. */
const EDITION_PREFIXES = new Set(['F', 'f', 'I', 'i']);

/** Codes starting with these acronyms are never prefix-stripped. */
const PROTECTED_ACRONYMS = ['IPR'];

/** Known data-entry typos, matched against the full stripped code. */
export const CODE_ALIASES: Readonly<Record<string, string>> = {
  IPRErgenisse: 'IPRErgebnisse',
};

function isUppercaseLetter(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function applyAlias(code: string): string {
  return Object.hasOwn(CODE_ALIASES, code) ? CODE_ALIASES[code] : code;
}

function normalizeOnce(code: string): string {
  if (PROTECTED_ACRONYMS.some(acronym => code.startsWith(acronym))) {
    return applyAlias(code);
  }

  let candidate = code;
  if (candidate.length > 1 && EDITION_PREFIXES.has(candidate[0]) && isUppercaseLetter(candidate[1])) {
    candidate = candidate.slice(1);
  }

  return applyAlias(candidate);
}

/**
 * Return `code` with its edition prefix removed and known typos fixed.
 *
 * Applied until the code stops changing, so stacked prefixes (`FIX`)
 * normalize the same way on first sight and after a reload from the
 * master file. Idempotent for every input.
 */
export function normalizeCode(code: string): string {
  if (!code) return code;

  let current = code;
  for (;;) {
    const next = normalizeOnce(current);
    if (next === current) return current;
    current = next;
  }
}
