/**
 * Corpus dataset schemas.
 *
 * Two JSON datasets back the recommender:
 *
 *   itemCorpus.json   : [{ "category": ["Media Literacy", ...] }, ...]
 *   conceptRefs.json  : [{ "concepts": "Media Literacy,Digital Media",
 *                          "references": [{ "Title", "Authors", "Source",
 *                                           "Date", "Summary" }] }, ...]
 *
 * The raw schemas mirror the files as they are written (capitalised
 * reference keys, comma-joined concepts). Loaders convert them into the
 * domain types below.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Raw dataset shapes
// ---------------------------------------------------------------------------

export const CategoryRecordSchema = z.object({
  category: z.array(z.string()),
});

export const CategoryCorpusSchema = z.array(CategoryRecordSchema);
export type CategoryCorpus = z.infer<typeof CategoryCorpusSchema>;

export const RawReferenceSchema = z.object({
  Title: z.string().min(1),
  Authors: z.array(z.string()),
  Source: z.string(),
  Date: z.string(),
  Summary: z.string(),
});
export type RawReference = z.infer<typeof RawReferenceSchema>;

export const ConceptReferenceRecordSchema = z.object({
  /** Comma-separated category names */
  concepts: z.string(),
  references: z.array(RawReferenceSchema),
});

export const ConceptReferenceMapSchema = z.array(ConceptReferenceRecordSchema);
export type ConceptReferenceMap = z.infer<typeof ConceptReferenceMapSchema>;

// ---------------------------------------------------------------------------
// Domain types
// ---------------------------------------------------------------------------

/**
 * A reading recommendation as stored in the corpus.
 */
export interface ReferenceSource {
  readonly title: string;
  readonly authors: readonly string[];
  readonly source: string;
  readonly date: string;
  readonly summary: string;
}

/**
 * A reference within one scored result set. `score` is the concept
 * overlap that surfaced it and only means something within that set.
 */
export interface ScoredReference extends ReferenceSource {
  readonly score: number;
}

/**
 * A set of concepts and the references tagged with it.
 */
export interface ConceptReferenceEntry {
  readonly concepts: ReadonlySet<string>;
  readonly references: readonly ReferenceSource[];
}

/**
 * Split a comma-joined concept list. Items are trimmed and blanks dropped.
 */
export function parseConceptList(concepts: string): Set<string> {
  return new Set(
    concepts
      .split(",")
      .map((concept) => concept.trim())
      .filter((concept) => concept.length > 0)
  );
}

export function toReferenceSource(raw: RawReference): ReferenceSource {
  return {
    title: raw.Title,
    authors: [...raw.Authors],
    source: raw.Source,
    date: raw.Date,
    summary: raw.Summary,
  };
}
