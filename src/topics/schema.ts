/**
 * Topic schema and type definitions.
 *
 * A topic is what the model extracts from a term paper: a short subject
 * line, a sentence or two explaining it, and the vocabulary categories it
 * relates to. The recommendation stage later copies it into an
 * EnrichedTopic carrying the matched references.
 */

import { z } from "zod";
import type { ScoredReference } from "../corpus/schema.js";

/**
 * One extracted topic.
 *
 * Only the shape is enforced. Whether the categories belong to the
 * vocabulary is a separate, optional check (see restrictToVocabulary).
 * Unknown keys are tolerated and dropped.
 */
export const ExtractedTopicSchema = z.object({
  topic: z.string(),
  explanation: z.string(),
  related_categories: z.array(z.string()),
});
export type ExtractedTopic = z.infer<typeof ExtractedTopicSchema>;

/**
 * The full extraction payload: a list of topics.
 */
export const ExtractedTopicListSchema = z.array(ExtractedTopicSchema);

/**
 * A topic after recommendation.
 *
 * `recommended_references` is absent when scoring this topic failed,
 * and an empty list when scoring succeeded but nothing matched.
 */
export interface EnrichedTopic extends ExtractedTopic {
  recommended_references?: ScoredReference[];
}

/**
 * The placeholder returned when extraction gives up.
 */
export function emptyTopic(): ExtractedTopic {
  return { topic: "", explanation: "", related_categories: [] };
}

export function isEmptyTopic(topic: ExtractedTopic): boolean {
  return (
    topic.topic === "" &&
    topic.explanation === "" &&
    topic.related_categories.length === 0
  );
}

/**
 * True when a topic list carries nothing but placeholders.
 */
export function hasOnlyEmptyTopics(topics: readonly ExtractedTopic[]): boolean {
  return topics.every(isEmptyTopic);
}
