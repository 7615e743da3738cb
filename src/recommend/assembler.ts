/**
 * Recommendation assembly.
 *
 * Attaches the best-scoring references to each extracted topic. Topics are
 * copied, never modified. A topic whose scoring throws is passed through
 * without `recommended_references` and the rest of the batch proceeds.
 */

import type { ConceptReferenceEntry } from "../corpus/index.js";
import { createSilentLogger, errorContext, type Logger } from "../logging/index.js";
import type { EnrichedTopic, ExtractedTopic } from "../topics/index.js";
import { scoreReferences, type ReferenceScorer } from "./scorer.js";

export const DEFAULT_TOP_N = 2;

export interface AssembleOptions {
  /** References kept per topic (default: 2) */
  topN?: number;
  /** Scoring function (default: scoreReferences) */
  scorer?: ReferenceScorer;
  logger?: Logger;
}

export function assembleRecommendations(
  topics: readonly ExtractedTopic[],
  map: readonly ConceptReferenceEntry[],
  options: AssembleOptions = {}
): EnrichedTopic[] {
  const { topN = DEFAULT_TOP_N, scorer = scoreReferences } = options;
  const logger = (options.logger ?? createSilentLogger()).child({ scope: "assembler" });

  if (!Number.isInteger(topN) || topN < 0) {
    throw new RangeError(`topN must be a non-negative integer, got: ${topN}`);
  }

  return topics.map((topic, index) => {
    const copy: EnrichedTopic = {
      topic: topic.topic,
      explanation: topic.explanation,
      related_categories: [...topic.related_categories],
    };

    try {
      const { ranked, totalCount } = scorer(topic.related_categories, map);
      copy.recommended_references = ranked.slice(0, topN);
      logger.debug("Scored topic", {
        index,
        topic: topic.topic,
        matched: totalCount,
        kept: copy.recommended_references.length,
      });
    } catch (err) {
      logger.warn("Scoring failed, topic left without references", {
        index,
        topic: topic.topic,
        ...errorContext(err),
      });
    }

    return copy;
  });
}
