/**
 * Report and narrative tests.
 *
 * Run: node --import tsx --test src/report/formatter.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import {
  buildNarrative,
  formatReferences,
  formatReport,
  topicLabel,
  NO_REFERENCES_FOUND,
  NO_TOPICS_FOUND,
} from "./index.js";
import { emptyTopic, type EnrichedTopic } from "../topics/index.js";

// ============================================================
// Fixtures
// ============================================================

const REFERENCE = {
  title: "Reading the News",
  authors: ["A. Author", "B. Author"],
  source: "Test Press",
  date: "2020",
  summary: "About news.",
  score: 2,
};

const TOPIC: EnrichedTopic = {
  topic: "News literacy",
  explanation: "Judging sources.",
  related_categories: ["Media Literacy", "News Literacy"],
  recommended_references: [REFERENCE],
};

const NARRATIVE_HEAD =
  "Chain-of-Thought:\n\n" +
  "Step 1: Understanding the input from the student, which includes the term paper, " +
  "research topic and research questions:\n" +
  "My draft.\n" +
  "Recommendation Engine selected: Knowledge Based\n" +
  "Large Language Model selected: test-model\n";

// ============================================================
// Report
// ============================================================

describe("topicLabel", () => {
  test("letters, then two-letter labels past Z", () => {
    assert.deepEqual([0, 1, 25, 26, 27, 51, 52].map(topicLabel), [
      "A",
      "B",
      "Z",
      "AA",
      "AB",
      "AZ",
      "BA",
    ]);
  });
});

describe("formatReferences", () => {
  test("numbers each reference", () => {
    assert.equal(
      formatReferences([REFERENCE, { ...REFERENCE, title: "Second", authors: [] }]),
      "\n1. Title: Reading the News\n" +
        "   Authors: A. Author, B. Author\n" +
        "   Source: Test Press\n" +
        "   Date: 2020\n" +
        "   Summary: About news.\n" +
        "\n2. Title: Second\n" +
        "   Authors: \n" +
        "   Source: Test Press\n" +
        "   Date: 2020\n" +
        "   Summary: About news.\n"
    );
  });

  test("empty list renders nothing", () => {
    assert.equal(formatReferences([]), "");
  });
});

describe("formatReport", () => {
  test("renders one lettered section per topic", () => {
    const report = formatReport([
      TOPIC,
      { topic: "Games", explanation: "Play.", related_categories: [], recommended_references: [] },
    ]);

    assert.equal(
      report,
      "\n(A) Topic: News literacy\n" +
        "    Explanation: Judging sources.\n" +
        "    Related Categories: Media Literacy, News Literacy\n" +
        "    Recommended References:\n" +
        "\n1. Title: Reading the News\n" +
        "   Authors: A. Author, B. Author\n" +
        "   Source: Test Press\n" +
        "   Date: 2020\n" +
        "   Summary: About news.\n" +
        "\n" +
        "\n(B) Topic: Games\n" +
        "    Explanation: Play.\n" +
        "    Related Categories: \n" +
        "    Recommended References:\n" +
        "\n"
    );
  });

  test("a topic without the references field still gets a section", () => {
    const report = formatReport([{ topic: "t", explanation: "e", related_categories: ["C"] }]);
    assert.equal(
      report,
      "\n(A) Topic: t\n    Explanation: e\n    Related Categories: C\n    Recommended References:\n\n"
    );
  });

  test("no topics renders nothing", () => {
    assert.equal(formatReport([]), "");
  });
});

// ============================================================
// Narrative
// ============================================================

describe("buildNarrative", () => {
  test("step 1 only before extraction", () => {
    assert.equal(
      buildNarrative({ paperText: "My draft.", modelName: "test-model" }),
      NARRATIVE_HEAD
    );
  });

  test("all three steps after a full run", () => {
    const extracted = { topic: "t", explanation: "e", related_categories: ["C"] };
    const topics = [extracted];
    const enriched = [{ ...extracted, recommended_references: [REFERENCE] }];

    const narrative = buildNarrative({
      paperText: "My draft.",
      modelName: "test-model",
      topics: { ok: true, value: topics },
      references: { ok: true, value: enriched },
    });

    assert.equal(
      narrative,
      NARRATIVE_HEAD +
        `\n\nStep 2: Relevant Topics:\n${JSON.stringify(topics, null, 2)}` +
        `\n\nStep 3: Relevant References:\n${JSON.stringify(enriched, null, 2)}`
    );
  });

  test("placeholder topics read as none found", () => {
    const narrative = buildNarrative({
      paperText: "My draft.",
      modelName: "test-model",
      topics: { ok: true, value: [emptyTopic()] },
    });
    assert.equal(narrative, `${NARRATIVE_HEAD}\n\nStep 2: Relevant Topics:\n${NO_TOPICS_FOUND}`);
  });

  test("failed stages read as none found", () => {
    const narrative = buildNarrative({
      paperText: "My draft.",
      modelName: "test-model",
      topics: { ok: false, error: new Error("x") },
      references: { ok: false, error: new Error("y") },
    });
    assert.equal(
      narrative,
      `${NARRATIVE_HEAD}\n\nStep 2: Relevant Topics:\n${NO_TOPICS_FOUND}` +
        `\n\nStep 3: Relevant References:\n${NO_REFERENCES_FOUND}`
    );
  });

  test("references with no matches read as none found", () => {
    const narrative = buildNarrative({
      paperText: "My draft.",
      modelName: "test-model",
      topics: { ok: true, value: [TOPIC] },
      references: { ok: true, value: [{ ...TOPIC, recommended_references: [] }] },
    });
    assert.ok(narrative.endsWith(`\n\nStep 3: Relevant References:\n${NO_REFERENCES_FOUND}`));
  });
});
