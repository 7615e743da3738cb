/**
 * Structural validation of model output.
 *
 * The model is asked for JSON but nothing guarantees it complies, so every
 * payload is checked before it enters the pipeline. These checks are pure:
 * the extractor calls them once per attempt and decides to retry on the
 * result.
 */

import type { ZodIssue } from "zod";
import { ExtractedTopicListSchema, type ExtractedTopic } from "./schema.js";

/**
 * Individual structural issue.
 */
export interface TopicIssue {
  /** Dotted path to the offending value ("(root)" for the payload itself) */
  path: string;
  /** Human-readable error message */
  message: string;
}

function toTopicIssue(issue: ZodIssue): TopicIssue {
  return {
    path: issue.path.join(".") || "(root)",
    message: issue.message,
  };
}

/**
 * Check that a candidate is a list of well-formed topics.
 *
 * Returns true only when the candidate is an array and every element is
 * an object with string `topic`, string `explanation` and a
 * `related_categories` array of strings.
 */
export function validateTopicStructure(candidate: unknown): candidate is ExtractedTopic[] {
  return ExtractedTopicListSchema.safeParse(candidate).success;
}

/**
 * List the structural issues of a candidate (empty when valid).
 * Used for logging why an attempt was rejected.
 */
export function describeTopicIssues(candidate: unknown): TopicIssue[] {
  const result = ExtractedTopicListSchema.safeParse(candidate);
  return result.success ? [] : result.error.issues.map(toTopicIssue);
}

/**
 * Drop categories outside the vocabulary, keeping order and removing
 * repeats. Returns copies; the input topics are untouched.
 */
export function restrictToVocabulary(
  topics: readonly ExtractedTopic[],
  allowedCategories: readonly string[]
): ExtractedTopic[] {
  const allowed = new Set(allowedCategories);

  return topics.map((topic) => ({
    ...topic,
    related_categories: [...new Set(topic.related_categories)].filter((category) =>
      allowed.has(category)
    ),
  }));
}
