/**
 * Reference scoring tests.
 *
 * Run: node --import tsx --test src/recommend/scorer.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { overlapCount, scoreReferences } from "./index.js";
import type { ConceptReferenceEntry, ReferenceSource } from "../corpus/index.js";

// ============================================================
// Fixtures
// ============================================================

function ref(title: string): ReferenceSource {
  return {
    title,
    authors: [`${title} Author`],
    source: "Test Press",
    date: "2020",
    summary: `About ${title}.`,
  };
}

function entry(concepts: string[], ...titles: string[]): ConceptReferenceEntry {
  return { concepts: new Set(concepts), references: titles.map(ref) };
}

function ranking(categories: string[], map: ConceptReferenceEntry[]): Array<[string, number]> {
  return scoreReferences(categories, map).ranked.map((r): [string, number] => [r.title, r.score]);
}

// ============================================================
// overlapCount
// ============================================================

describe("overlapCount", () => {
  test("counts shared members", () => {
    assert.equal(overlapCount(new Set(["A", "B", "C"]), new Set(["B", "C", "D"])), 2);
    assert.equal(overlapCount(new Set(["A"]), new Set(["B"])), 0);
  });
});

// ============================================================
// scoreReferences
// ============================================================

describe("scoreReferences", () => {
  test("ranks by overlap, highest first", () => {
    const map = [entry(["A"], "R1"), entry(["A", "B"], "R2")];

    assert.deepEqual(ranking(["A", "B"], map), [
      ["R2", 2],
      ["R1", 1],
    ]);
  });

  test("entries without overlap contribute nothing", () => {
    const map = [entry(["C"], "R1"), entry(["A"], "R2")];
    assert.deepEqual(ranking(["A"], map), [["R2", 1]]);
  });

  test("a repeated title keeps its first score", () => {
    const map = [entry(["A"], "Shared"), entry(["A", "B"], "Shared", "Other")];

    assert.deepEqual(ranking(["A", "B"], map), [
      ["Other", 2],
      ["Shared", 1],
    ]);
  });

  test("ties keep corpus order", () => {
    const map = [entry(["A"], "First", "Second"), entry(["A", "X"], "Third")];
    assert.deepEqual(ranking(["A"], map), [
      ["First", 1],
      ["Second", 1],
      ["Third", 1],
    ]);
  });

  test("repeated categories do not inflate the score", () => {
    const map = [entry(["A", "B"], "R1")];
    assert.deepEqual(ranking(["A", "A", "A"], map), [["R1", 1]]);
  });

  test("no categories means no references", () => {
    const result = scoreReferences([], [entry(["A"], "R1")]);
    assert.deepEqual(result, { ranked: [], totalCount: 0 });
  });

  test("an empty map means no references", () => {
    assert.deepEqual(scoreReferences(["A"], []), { ranked: [], totalCount: 0 });
  });

  test("totalCount is the number of distinct matches", () => {
    const map = [entry(["A"], "R1", "R2"), entry(["A"], "R2", "R3")];
    assert.equal(scoreReferences(["A"], map).totalCount, 3);
  });

  test("results are copies; the map is untouched", () => {
    const map = [entry(["A"], "R1")];
    const [scored] = scoreReferences(["A"], map).ranked;

    assert.ok(scored);
    assert.deepEqual(scored, { ...ref("R1"), score: 1 });
    assert.notEqual(scored.authors, map[0]?.references[0]?.authors);
    assert.equal("score" in (map[0]?.references[0] ?? {}), false);
  });
});
