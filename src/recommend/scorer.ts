/**
 * Concept-overlap scoring.
 *
 * A reference's score is the number of distinct topic categories that
 * also appear in the concept set it is filed under. Ranking is by score
 * alone; equal scores keep corpus order.
 */

import type {
  ConceptReferenceEntry,
  ScoredReference,
} from "../corpus/index.js";

export interface ScoredReferences {
  /** Highest score first, unique by title */
  ranked: ScoredReference[];
  /** Length of `ranked` */
  totalCount: number;
}

export type ReferenceScorer = (
  relatedCategories: readonly string[],
  map: readonly ConceptReferenceEntry[]
) => ScoredReferences;

/**
 * Count distinct categories present in a concept set.
 */
export function overlapCount(
  categories: ReadonlySet<string>,
  concepts: ReadonlySet<string>
): number {
  let count = 0;
  for (const category of categories) {
    if (concepts.has(category)) count++;
  }
  return count;
}

/**
 * Score and rank every reference whose concept set overlaps the topic's
 * categories.
 *
 * A title seen under an earlier entry is not added again, so a reference
 * keeps the score of its first match even if a later entry would score it
 * higher. The corpus is not modified.
 */
export const scoreReferences: ReferenceScorer = (relatedCategories, map) => {
  const categories = new Set(relatedCategories);
  const seenTitles = new Set<string>();
  const collected: ScoredReference[] = [];

  if (categories.size === 0) {
    return { ranked: [], totalCount: 0 };
  }

  for (const entry of map) {
    const score = overlapCount(categories, entry.concepts);
    if (score === 0) continue;

    for (const reference of entry.references) {
      if (seenTitles.has(reference.title)) continue;
      seenTitles.add(reference.title);
      collected.push({ ...reference, authors: [...reference.authors], score });
    }
  }

  // Array.prototype.sort is stable, so ties stay in corpus order.
  const ranked = collected.sort((a, b) => b.score - a.score);
  return { ranked, totalCount: ranked.length };
};
