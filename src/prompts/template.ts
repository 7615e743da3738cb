/**
 * Prompt templates: `{{name}}` placeholders in plain text.
 *
 *   Paper:
 *   {{paper.text}}
 *
 *   Allowed categories: {{ categories.allowed }}
 *
 * A name is a letter followed by letters, digits, `_` or `.`; whitespace
 * inside the braces is ignored. Every name must be a PromptContextMap key,
 * so a misspelt placeholder fails when the file is loaded, not when a
 * half-filled prompt reaches the model. A name may appear more than once.
 */

import type { PromptVariable } from "./context.js";

/** Group 1 is the placeholder name. */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

export interface ParsedTemplate {
  /** Template text, placeholders intact */
  source: string;
  /** Distinct placeholder names, sorted */
  variables: PromptVariable[];
  /** Used in error messages */
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[]
  ) {
    super(
      `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

// Keep in step with PromptContextMap.
const KNOWN_VARIABLES: ReadonlySet<string> = new Set<PromptVariable>([
  "paper.text",
  "categories.allowed",
  "output.format",
  "references.context",
  "feedback.language",
]);

export function isValidVariable(name: string): name is PromptVariable {
  return KNOWN_VARIABLES.has(name);
}

export function extractVariables(source: string): string[] {
  const names = new Set<string>();
  for (const [, name] of source.matchAll(PLACEHOLDER_RE)) {
    if (name !== undefined) names.add(name);
  }
  return [...names].sort();
}

/**
 * @throws TemplateParseError naming every unknown placeholder
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const names = extractVariables(source);
  const unknown = names.filter((candidate) => !isValidVariable(candidate));
  if (unknown.length > 0) {
    throw new TemplateParseError(name ?? "(anonymous)", unknown);
  }

  return { source, variables: names.filter(isValidVariable), name };
}
