import { createDefaultRegistry, type CodecRegistry } from "./codecs.js";
import { expandTemplate, findDimensions, renderBindings, type Dimension } from "./expand.js";
import { validateCodecs } from "./pipeline.js";
import { resolveBindings, type BindingTable } from "./resolver.js";
import type { ValueSource } from "./sources.js";
import { collectPlaceholders, parseTemplate, type TemplateNode } from "./template.js";

// =============================================================================
// Generation
// =============================================================================

export interface GenerateOptions {
  registry?: CodecRegistry;
  strict?: boolean;
}

export interface GenerationResult {
  template: TemplateNode[];
  bindings: BindingTable;
  dimensions: Dimension[];
  lines: string[];
}

/**
 * Expand an already parsed template. Nothing is returned unless every
 * combination renders.
 */
export function generateFromTemplate(
  template: TemplateNode[],
  source: ValueSource,
  options: GenerateOptions = {}
): GenerationResult {
  const registry = options.registry ?? createDefaultRegistry();

  validateCodecs(
    collectPlaceholders(template).map(({ placeholder }) => placeholder),
    registry
  );

  const bindings = resolveBindings(template, source, { strict: options.strict });
  const rendered = renderBindings(template, bindings, registry);

  return {
    template,
    bindings,
    dimensions: findDimensions(template, rendered),
    lines: expandTemplate(template, bindings, rendered),
  };
}

/**
 * Parse a format string and expand it into output lines.
 */
export function generate(
  formatString: string,
  source: ValueSource,
  options: GenerateOptions = {}
): GenerationResult {
  return generateFromTemplate(parseTemplate(formatString), source, options);
}
