import type { CodecRegistry } from "./codecs.js";
import { renderKey, renderPlaceholder } from "./pipeline.js";
import type { BindingTable } from "./resolver.js";
import { collectPlaceholders, type OptionalNode, type TemplateNode } from "./template.js";

// =============================================================================
// Types
// =============================================================================

/** Rendered values keyed by renderKey(placeholder). */
export type RenderedTable = ReadonlyMap<string, readonly string[]>;

/** A multi-valued placeholder name the output is expanded over. */
export interface Dimension {
  name: string;
  size: number;
}

/** Selected value index per dimension name. */
export type Combination = ReadonlyMap<string, number>;

// =============================================================================
// Rendering Values
// =============================================================================

/**
 * Run the codec chain of every bound placeholder occurrence once.
 * Occurrences with the same name, marker and chain share one entry.
 */
export function renderBindings(
  nodes: TemplateNode[],
  table: BindingTable,
  registry: CodecRegistry
): Map<string, string[]> {
  const rendered = new Map<string, string[]>();

  for (const { placeholder } of collectPlaceholders(nodes)) {
    const key = renderKey(placeholder);
    const binding = table.get(placeholder.name);
    if (rendered.has(key) || !binding) {
      continue;
    }
    const values = binding.explicitEmpty ? [""] : binding.values;
    rendered.set(key, renderPlaceholder(placeholder, values, registry));
  }

  return rendered;
}

// =============================================================================
// Combinations
// =============================================================================

/**
 * Names with a non-repeatable occurrence rendering more than one value,
 * in order of first occurrence.
 */
export function findDimensions(nodes: TemplateNode[], rendered: RenderedTable): Dimension[] {
  const dimensions = new Map<string, Dimension>();

  for (const { placeholder } of collectPlaceholders(nodes)) {
    if (placeholder.repeatable || dimensions.has(placeholder.name)) {
      continue;
    }
    const values = rendered.get(renderKey(placeholder));
    if (values && values.length > 1) {
      dimensions.set(placeholder.name, { name: placeholder.name, size: values.length });
    }
  }

  return [...dimensions.values()];
}

/**
 * Cartesian product of all dimensions; the first dimension is the outermost
 * loop. No dimensions yields the single empty combination.
 */
export function enumerateCombinations(dimensions: Dimension[]): Combination[] {
  let result: Map<string, number>[] = [new Map()];

  for (const dimension of dimensions) {
    const next: Map<string, number>[] = [];
    for (const combination of result) {
      for (let index = 0; index < dimension.size; index++) {
        next.push(new Map(combination).set(dimension.name, index));
      }
    }
    result = next;
  }

  return result;
}

export function countCombinations(dimensions: Dimension[]): number {
  return dimensions.reduce((count, dimension) => count * dimension.size, 1);
}

// =============================================================================
// Expansion
// =============================================================================

/** Rendered output of one node, or the place of an omitted optional group. */
type Piece = { kind: "text"; text: string; literal: boolean } | { kind: "omitted" };

function endsLine(texts: readonly string[], from: number): boolean {
  const next = texts.slice(from).find((text) => text !== "");
  return next === undefined || next.startsWith("\n") || next.startsWith("\r\n");
}

/**
 * Concatenate the pieces of one output. An omitted group that ends its line
 * takes the spaces and tabs of the literal text before it along, up to the
 * nearest rendered value.
 */
function joinPieces(pieces: readonly Piece[]): string {
  const texts = pieces.map((piece) => (piece.kind === "text" ? piece.text : ""));

  pieces.forEach((piece, index) => {
    if (piece.kind !== "omitted" || !endsLine(texts, index + 1)) {
      return;
    }
    for (let before = index - 1; before >= 0; before--) {
      const previous = pieces[before];
      if (previous.kind === "omitted" || texts[before] === "") {
        continue;
      }
      if (!previous.literal) {
        break;
      }
      texts[before] = texts[before].replace(/[ \t]+$/, "");
      if (texts[before] !== "") {
        break;
      }
    }
  });

  return texts.join("");
}

/**
 * Render the template once per combination.
 *
 * An optional group is emitted only when every placeholder directly inside
 * it is bound and not explicitly empty; nested groups decide on their own.
 * Text produced by placeholders is never trimmed.
 */
export function expandTemplate(
  nodes: TemplateNode[],
  table: BindingTable,
  rendered: RenderedTable
): string[] {
  const included = new WeakMap<OptionalNode, boolean>();

  function isIncluded(group: OptionalNode): boolean {
    let result = included.get(group);
    if (result === undefined) {
      result = group.children.every((child) => {
        if (child.type !== "placeholder") {
          return true;
        }
        const binding = table.get(child.name);
        return binding !== undefined && !binding.explicitEmpty;
      });
      included.set(group, result);
    }
    return result;
  }

  function renderNodes(children: TemplateNode[], combination: Combination): Piece[] {
    const pieces: Piece[] = [];

    for (const node of children) {
      switch (node.type) {
        case "literal":
        case "comment":
          pieces.push({ kind: "text", text: node.text, literal: true });
          break;
        case "optional":
          if (isIncluded(node)) {
            pieces.push(...renderNodes(node.children, combination));
          } else {
            pieces.push({ kind: "omitted" });
          }
          break;
        case "placeholder": {
          const values = rendered.get(renderKey(node)) ?? [];
          const index = values.length > 1 ? (combination.get(node.name) ?? 0) : 0;
          pieces.push({ kind: "text", text: values[index] ?? "", literal: false });
          break;
        }
      }
    }

    return pieces;
  }

  const combinations = enumerateCombinations(findDimensions(nodes, rendered));
  return combinations.map((combination) => joinPieces(renderNodes(nodes, combination)));
}
