/**
 * Counterparty Name Similarity
 *
 * Token-based edit-distance similarity for names that were already
 * normalized (upper-case, single spaces, legal forms removed). Word order
 * does not matter to either ratio; the set ratio also scores a word subset 1:
 *
 *   tokenSortRatio("SACHS GOLDMAN", "GOLDMAN SACHS")               → 1
 *   tokenSetRatio("GOLDMAN SACHS", "GOLDMAN SACHS INTERNATIONAL")  → 1
 *
 * similarity = ½ · tokenSortRatio + ½ · tokenSetRatio
 */

import { distance } from "fastest-levenshtein";

/**
 * 1 − edit distance / length of the longer string. Two empty strings are equal.
 */
export function editRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
}

function tokens(value: string): string[] {
  return value.split(" ").filter((t) => t !== "");
}

function joinTokens(...parts: readonly string[][]): string {
  return parts.flat().join(" ");
}

/** Edit ratio of the names with their words sorted */
export function tokenSortRatio(a: string, b: string): number {
  return editRatio(joinTokens(tokens(a).sort()), joinTokens(tokens(b).sort()));
}

/**
 * Compares the shared words against each name's full word set, so words
 * present on one side only weigh less than in a plain comparison.
 */
export function tokenSetRatio(a: string, b: string): number {
  const wordsA = new Set(tokens(a));
  const wordsB = new Set(tokens(b));
  const shared = [...wordsA].filter((w) => wordsB.has(w)).sort();
  const onlyA = [...wordsA].filter((w) => !wordsB.has(w)).sort();
  const onlyB = [...wordsB].filter((w) => !wordsA.has(w)).sort();

  if (shared.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) return 1;

  const base = joinTokens(shared);
  const fullA = joinTokens(shared, onlyA);
  const fullB = joinTokens(shared, onlyB);
  return Math.max(editRatio(base, fullA), editRatio(base, fullB), editRatio(fullA, fullB));
}

export function counterpartySimilarity(a: string, b: string): number {
  if (a === b) return 1;
  return 0.5 * tokenSortRatio(a, b) + 0.5 * tokenSetRatio(a, b);
}
