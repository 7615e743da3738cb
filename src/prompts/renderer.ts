/**
 * Fills a parsed template from a prompt context.
 *
 * Every placeholder needs a value. In strict mode (the default) every
 * value also needs a placeholder, which catches a context built for a
 * different template.
 *
 * Substitution walks the template source once, so a value that itself
 * contains `{{...}}` (the student's own text, say) is inserted verbatim.
 */

import { PLACEHOLDER_RE, isValidVariable, type ParsedTemplate } from "./template.js";
import type { PromptContext } from "./context.js";

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[]
  ) {
    super(`Prompt "${templateName}" has no value for: ${missingVariables.join(", ")}`);
    this.name = "PromptRenderError";
  }
}

export class UnusedVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[]
  ) {
    super(
      `Prompt "${templateName}" never uses: ${unusedVariables.join(", ")} ` +
        `(render with { strict: false } to allow this)`
    );
    this.name = "UnusedVariableError";
  }
}

export interface RenderOptions {
  /** Reject context values the template never uses (default: true) */
  strict?: boolean;
}

interface ContextCheck {
  missing: string[];
  unused: string[];
}

function checkContext(template: ParsedTemplate, context: PromptContext): ContextCheck {
  const wanted = new Set<string>(template.variables);
  const supplied = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key]) => key);

  return {
    missing: template.variables.filter((variable) => context[variable] === undefined),
    unused: supplied.filter((key) => !wanted.has(key)),
  };
}

/**
 * @throws PromptRenderError   when a placeholder has no value
 * @throws UnusedVariableError when strict and the context has extra values
 */
export function renderPrompt(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const name = template.name ?? "(anonymous)";
  const { missing, unused } = checkContext(template, context);

  if (missing.length > 0) {
    throw new PromptRenderError(name, missing);
  }
  if ((options.strict ?? true) && unused.length > 0) {
    throw new UnusedVariableError(name, unused);
  }

  return template.source.replace(PLACEHOLDER_RE, (placeholder, variable: string) =>
    isValidVariable(variable) ? context[variable] ?? placeholder : placeholder
  );
}
