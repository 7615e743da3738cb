/**
 * Typed prompt context.
 *
 * Every `{{path}}` placeholder a template may use is a key of
 * PromptContextMap. Values are always strings: rendering is text to text,
 * so lists are serialised here rather than in the templates.
 *
 * Adding a new variable requires exactly two changes:
 *   1. Add the key to PromptContextMap (and KNOWN_VARIABLES in template.ts)
 *   2. Populate it in the relevant build*Context() function
 */

import type { EnrichedTopic } from "../topics/schema.js";

export interface PromptContextMap {
  // ── Input ──────────────────────────────────────────────────
  /** The student's term-paper text, verbatim */
  "paper.text": string;

  // ── Vocabulary ─────────────────────────────────────────────
  /** Allowed categories as a JSON array */
  "categories.allowed": string;

  // ── Output contract ────────────────────────────────────────
  /** Description of the JSON the model must return */
  "output.format": string;

  // ── Feedback ───────────────────────────────────────────────
  /** Matched references, one block per reference */
  "references.context": string;
  "feedback.language": string;
}

export type PromptVariable = keyof PromptContextMap;

/**
 * A context need not define every variable; the renderer reports any the
 * template uses but the context lacks.
 */
export type PromptContext = Partial<PromptContextMap>;

/**
 * Output contract for topic extraction.
 * Kept next to ExtractedTopicSchema's field names; they must agree.
 */
export const TOPIC_FORMAT_INSTRUCTIONS = [
  "Return only a JSON array, with no commentary and no Markdown code fences.",
  "Each element of the array is an object with exactly these fields:",
  '  "topic" (string): the topic or subject, as found in the text',
  '  "explanation" (string): one or two sentences about the topic',
  '  "related_categories" (array of strings): categories copied verbatim from the allowed list',
  "Example:",
  '[{"topic": "News literacy in schools", "explanation": "How pupils learn to judge news sources.", "related_categories": ["Media Literacy"]}]',
].join("\n");

/**
 * Context for the topic-extraction prompt.
 */
export function buildExtractionContext(
  paperText: string,
  allowedCategories: readonly string[]
): PromptContext {
  return {
    "paper.text": paperText,
    "categories.allowed": JSON.stringify(allowedCategories),
    "output.format": TOPIC_FORMAT_INSTRUCTIONS,
  };
}

/**
 * Serialise the recommended references of every topic, deduplicated by
 * title, as the reference list the feedback prompt cites from.
 */
export function formatReferenceContext(topics: readonly EnrichedTopic[]): string {
  const seen = new Set<string>();
  const blocks: string[] = [];

  for (const topic of topics) {
    for (const ref of topic.recommended_references ?? []) {
      if (seen.has(ref.title)) continue;
      seen.add(ref.title);
      blocks.push(
        [
          `- Title: ${ref.title}`,
          `  Authors: ${ref.authors.join(", ")}`,
          `  Source: ${ref.source} (${ref.date})`,
          `  Related topic: ${topic.topic}`,
        ].join("\n")
      );
    }
  }

  return blocks.join("\n");
}

/**
 * Context for the feedback-note prompt.
 */
export function buildFeedbackContext(
  paperText: string,
  topics: readonly EnrichedTopic[],
  language: string
): PromptContext {
  return {
    "paper.text": paperText,
    "references.context": formatReferenceContext(topics),
    "feedback.language": language,
  };
}
