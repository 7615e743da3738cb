/**
 * Term-paper advisor.
 *
 * Public API for embedding the recommender:
 *
 *   const pipeline = createPipeline(loadConfig(), { generator });
 *   const { report, narrative } = await pipeline.run(draft);
 *
 * The CLI lives in cli/recommend.ts.
 */

export * from "./config/index.js";
export * from "./corpus/index.js";
export * from "./extraction/index.js";
export * from "./feedback/index.js";
export * from "./llm/index.js";
export * from "./logging/index.js";
export * from "./pipeline/index.js";
export * from "./prompts/index.js";
export * from "./recommend/index.js";
export * from "./report/index.js";
export * from "./topics/index.js";
