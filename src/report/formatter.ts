/**
 * Report and narrative rendering.
 *
 * formatReport()    the recommendation report shown to the student
 * buildNarrative()  the chain of thought: what each pipeline stage saw
 *                   and produced, in stage order
 *
 * Both are pure string builders.
 */

import type { ScoredReference } from "../corpus/index.js";
import { hasOnlyEmptyTopics, type EnrichedTopic, type ExtractedTopic } from "../topics/index.js";

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

/**
 * Spreadsheet-style section label: 0 → "A", 25 → "Z", 26 → "AA".
 */
export function topicLabel(index: number): string {
  let label = "";
  let n = index + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    label = String.fromCharCode(65 + rem) + label;
    n = Math.floor((n - 1) / 26);
  }
  return label;
}

export function formatReferences(references: readonly ScoredReference[]): string {
  return references
    .map(
      (ref, i) =>
        `\n${i + 1}. Title: ${ref.title}\n` +
        `   Authors: ${ref.authors.join(", ")}\n` +
        `   Source: ${ref.source}\n` +
        `   Date: ${ref.date}\n` +
        `   Summary: ${ref.summary}\n`
    )
    .join("");
}

/**
 * Render one lettered section per topic, in input order.
 * Topics without references keep their section with an empty list.
 */
export function formatReport(topics: readonly EnrichedTopic[]): string {
  return topics
    .map(
      (item, i) =>
        `\n(${topicLabel(i)}) Topic: ${item.topic}\n` +
        `    Explanation: ${item.explanation}\n` +
        `    Related Categories: ${item.related_categories.join(", ")}\n` +
        `    Recommended References:\n${formatReferences(item.recommended_references ?? [])}\n`
    )
    .join("");
}

// ---------------------------------------------------------------------------
// Narrative
// ---------------------------------------------------------------------------

export type StageOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface NarrativeStages {
  paperText: string;
  modelName: string;
  /** Absent until topic extraction has run */
  topics?: StageOutcome<ExtractedTopic[]>;
  /** Absent until recommendation assembly has run */
  references?: StageOutcome<EnrichedTopic[]>;
}

export const RECOMMENDATION_ENGINE = "Knowledge Based";
export const NO_TOPICS_FOUND = "No relevant topics found.";
export const NO_REFERENCES_FOUND = "No relevant references found.";

function describeTopics(outcome: StageOutcome<ExtractedTopic[]>): string {
  if (!outcome.ok || hasOnlyEmptyTopics(outcome.value)) {
    return NO_TOPICS_FOUND;
  }
  return JSON.stringify(outcome.value, null, 2);
}

function describeReferences(outcome: StageOutcome<EnrichedTopic[]>): string {
  if (!outcome.ok) {
    return NO_REFERENCES_FOUND;
  }
  const anyMatched = outcome.value.some(
    (topic) => (topic.recommended_references ?? []).length > 0
  );
  return anyMatched ? JSON.stringify(outcome.value, null, 2) : NO_REFERENCES_FOUND;
}

/**
 * Render the chain of thought for the stages reached so far.
 */
export function buildNarrative(stages: NarrativeStages): string {
  let narrative =
    "Chain-of-Thought:\n\n" +
    "Step 1: Understanding the input from the student, which includes the term paper, " +
    "research topic and research questions:\n" +
    `${stages.paperText}\n` +
    `Recommendation Engine selected: ${RECOMMENDATION_ENGINE}\n` +
    `Large Language Model selected: ${stages.modelName}\n`;

  if (stages.topics) {
    narrative += `\n\nStep 2: Relevant Topics:\n${describeTopics(stages.topics)}`;
  }

  if (stages.references) {
    narrative += `\n\nStep 3: Relevant References:\n${describeReferences(stages.references)}`;
  }

  return narrative;
}
