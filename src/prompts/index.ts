/**
 * Prompt templates.
 *
 * The two prompts live as Markdown files in the prompts directory. They are
 * parsed once, checked against the typed context, and filled per run:
 *
 * ```typescript
 * const templates = new PromptTemplateLoader(config.promptsDir);
 * const extraction = templates.load(TOPIC_EXTRACTION_TEMPLATE);
 * const prompt = renderPrompt(extraction, buildExtractionContext(text, categories));
 * ```
 */

// Loading
export {
  PromptTemplateLoader,
  TemplateLoadError,
  TOPIC_EXTRACTION_TEMPLATE,
  FEEDBACK_TEMPLATE,
} from "./loader.js";

// Parsing
export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

// Context
export {
  buildExtractionContext,
  buildFeedbackContext,
  formatReferenceContext,
  TOPIC_FORMAT_INSTRUCTIONS,
  type PromptContext,
  type PromptContextMap,
  type PromptVariable,
} from "./context.js";

// Rendering
export {
  renderPrompt,
  PromptRenderError,
  UnusedVariableError,
  type RenderOptions,
} from "./renderer.js";
