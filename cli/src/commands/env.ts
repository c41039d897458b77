import { parseArguments } from "../arguments.js";
import { formatEnvValue } from "../env.js";
import { resolveBindings } from "../resolver.js";
import { createProcessSource, type ValueSource } from "../sources.js";
import { parseTemplate, placeholderNames, type TemplateNode } from "../template.js";

// =============================================================================
// Environment Command
// =============================================================================

function doubleQuote(value: string): string {
  return `"${value.replace(/[\\"$`]/g, (ch) => `\\${ch}`)}"`;
}

/**
 * Shell `export` statements reproducing the current bindings, so values can
 * be kept in the environment for later invocations. Defaults and empty
 * bindings are left out.
 */
export function exportStatements(
  template: TemplateNode[],
  source: ValueSource,
  strict: boolean = false
): string[] {
  const bindings = resolveBindings(template, source, { strict, requireAll: false });

  return [...bindings.values()]
    .filter((binding) => binding.source !== "default" && !binding.explicitEmpty)
    .map((binding) => `export ${binding.name}=${doubleQuote(formatEnvValue(binding.values))}`);
}

export function envCommand(formatString: string, values: string[], strict: boolean): void {
  const template = parseTemplate(formatString);
  const source = createProcessSource({
    arguments: parseArguments(values, new Set(placeholderNames(template))),
  });

  for (const line of exportStatements(template, source, strict)) {
    console.log(line);
  }
}
