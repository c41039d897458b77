import type { Codec, CodecRegistry } from "./codecs.js";
import { CodecError, errorMessage } from "./errors.js";
import type { CodecCall, PlaceholderNode } from "./template.js";

/** Separator of the implicit join applied to repeatable placeholders. */
export const REPEATABLE_SEPARATOR = " ";

// =============================================================================
// Validation
// =============================================================================

/**
 * Look up the codec of a call and check its argument against the codec's
 * declaration.
 */
export function validateCodecCall(
  placeholder: string,
  call: CodecCall,
  registry: CodecRegistry
): Codec {
  const codec = registry.get(call.name);
  if (!codec) {
    throw new CodecError(placeholder, call.name, call.argument, "unknown codec");
  }
  if (codec.argument === "required" && call.argument === undefined) {
    throw new CodecError(placeholder, call.name, call.argument, "missing argument");
  }
  if (codec.argument === "none" && call.argument !== undefined) {
    throw new CodecError(placeholder, call.name, call.argument, "takes no argument");
  }
  return codec;
}

export function validateCodecs(placeholders: PlaceholderNode[], registry: CodecRegistry): void {
  for (const placeholder of placeholders) {
    for (const call of placeholder.codecs) {
      validateCodecCall(placeholder.name, call, registry);
    }
  }
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Run a placeholder's codec chain over its bound values, left to right.
 * Value-wise codecs keep the count; a reducing codec leaves one value.
 * Repeatable placeholders always come out as a single value.
 */
export function renderPlaceholder(
  placeholder: PlaceholderNode,
  values: readonly string[],
  registry: CodecRegistry
): string[] {
  let current = [...values];

  for (const call of placeholder.codecs) {
    const codec = validateCodecCall(placeholder.name, call, registry);

    try {
      current =
        codec.kind === "value"
          ? current.map((value) => codec.apply(value, call.argument))
          : [codec.apply(current, call.argument)];
    } catch (error) {
      throw new CodecError(placeholder.name, call.name, call.argument, errorMessage(error));
    }
  }

  if (placeholder.repeatable && current.length !== 1) {
    return [current.join(REPEATABLE_SEPARATOR)];
  }
  return current;
}

/**
 * Key identifying placeholders that render identically for the same binding.
 */
export function renderKey(placeholder: PlaceholderNode): string {
  const chain = placeholder.codecs
    .map((call) => (call.argument === undefined ? call.name : `${call.name}:${JSON.stringify(call.argument)}`))
    .join("|");
  return `${placeholder.name}${placeholder.repeatable ? "..." : ""}|${chain}`;
}
