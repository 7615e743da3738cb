/**
 * Feedback composer tests.
 *
 * Run: node --import tsx --test src/feedback/composer.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { FeedbackComposer } from "./index.js";
import type { TextGenerator } from "../llm/index.js";
import { parseTemplate } from "../prompts/index.js";
import type { EnrichedTopic } from "../topics/index.js";

// ============================================================
// Fixtures
// ============================================================

const TEMPLATE = parseTemplate(
  "Draft: {{paper.text}}\nRefs:\n{{references.context}}\nLanguage: {{feedback.language}}",
  "test-feedback"
);

const TOPICS: EnrichedTopic[] = [
  {
    topic: "News literacy",
    explanation: "Judging sources.",
    related_categories: ["Media Literacy"],
    recommended_references: [
      {
        title: "Reading the News",
        authors: ["A. Author"],
        source: "Test Press",
        date: "2020",
        summary: "About news.",
        score: 1,
      },
    ],
  },
];

function recordingGenerator(reply: () => Promise<string>): TextGenerator & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    generate(prompt) {
      prompts.push(prompt);
      return reply();
    },
  };
}

// ============================================================
// Tests
// ============================================================

describe("FeedbackComposer", () => {
  test("returns the trimmed reply", async () => {
    const generator = recordingGenerator(() => Promise.resolve("  Read these.  \n"));
    const composer = new FeedbackComposer({ generator, template: TEMPLATE, language: "German" });

    const note = await composer.compose("My draft.", TOPICS);

    assert.equal(note, "Read these.");
    assert.equal(
      generator.prompts[0],
      "Draft: My draft.\nRefs:\n" +
        "- Title: Reading the News\n" +
        "  Authors: A. Author\n" +
        "  Source: Test Press (2020)\n" +
        "  Related topic: News literacy\n" +
        "Language: German"
    );
  });

  test("skips the call when no topic has references", async () => {
    const generator = recordingGenerator(() => Promise.resolve("unused"));
    const composer = new FeedbackComposer({ generator, template: TEMPLATE });

    const note = await composer.compose("My draft.", [
      { topic: "x", explanation: "y", related_categories: [], recommended_references: [] },
      { topic: "z", explanation: "w", related_categories: [] },
    ]);

    assert.equal(note, null);
    assert.equal(generator.prompts.length, 0);
  });

  test("a failing call yields null", async () => {
    const generator = recordingGenerator(() => Promise.reject(new Error("rate limited")));
    const composer = new FeedbackComposer({ generator, template: TEMPLATE });

    assert.equal(await composer.compose("My draft.", TOPICS), null);
  });

  test("a blank reply yields null", async () => {
    const generator = recordingGenerator(() => Promise.resolve("   "));
    const composer = new FeedbackComposer({ generator, template: TEMPLATE });

    assert.equal(await composer.compose("My draft.", TOPICS), null);
  });

  test("a slow reply times out to null", async () => {
    const generator = recordingGenerator(() => new Promise<string>(() => {}));
    const composer = new FeedbackComposer({ generator, template: TEMPLATE, timeoutMs: 20 });

    assert.equal(await composer.compose("My draft.", TOPICS), null);
  });
});
