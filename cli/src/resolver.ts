import type { BindingValue } from "./arguments.js";
import { UnknownBindingError, UnresolvedPlaceholderError } from "./errors.js";
import { logger } from "./logger.js";
import type { ValueSource } from "./sources.js";
import { collectPlaceholders, type PlaceholderOccurrence, type TemplateNode } from "./template.js";

// =============================================================================
// Types
// =============================================================================

export type BindingSource = "cli" | "file" | "env" | "preset" | "default";

export interface Binding {
  name: string;
  /** Empty only when explicitEmpty is set. */
  values: string[];
  /** The name was bound to nothing, e.g. `arg=`. */
  explicitEmpty: boolean;
  source: BindingSource;
}

export type BindingTable = ReadonlyMap<string, Binding>;

export interface ResolveOptions {
  /** Reject bindings that match no placeholder instead of ignoring them. */
  strict?: boolean;
  /** Fail on unbound required placeholders (default true). */
  requireAll?: boolean;
}

interface PlaceholderInfo {
  name: string;
  repeatable: boolean;
  default?: string;
  /** Occurs at least once outside every optional group. */
  required: boolean;
}

type Strategy = (info: PlaceholderInfo) => Binding | null;

// =============================================================================
// Helpers
// =============================================================================

function summarize(occurrences: PlaceholderOccurrence[]): PlaceholderInfo[] {
  const infos = new Map<string, PlaceholderInfo>();

  for (const { placeholder, optional } of occurrences) {
    const info = infos.get(placeholder.name);
    if (!info) {
      infos.set(placeholder.name, {
        name: placeholder.name,
        repeatable: placeholder.repeatable,
        default: placeholder.default,
        required: !optional,
      });
      continue;
    }
    info.repeatable ||= placeholder.repeatable;
    info.required ||= !optional;
    info.default ??= placeholder.default;
  }

  return [...infos.values()];
}

function fromValues(name: string, values: string[], source: BindingSource): Binding {
  const nonEmpty = values.filter((value) => value !== "");
  return {
    name,
    values: nonEmpty,
    explicitEmpty: nonEmpty.length === 0,
    source,
  };
}

function reportUnknown(binding: string, message: string, strict: boolean): void {
  if (strict) {
    throw new UnknownBindingError(binding, message);
  }
  logger.warn(message);
}

/**
 * Hand out positional values in template order. A repeatable target takes
 * all it can while leaving one value per later target; the last target takes
 * whatever is left.
 */
export function distributePositionals(
  values: readonly string[],
  targets: readonly Pick<PlaceholderInfo, "name" | "repeatable">[]
): Map<string, string[]> {
  const result = new Map<string, string[]>();
  let cursor = 0;

  targets.forEach((target, index) => {
    const remaining = values.length - cursor;
    if (remaining <= 0) {
      return;
    }
    const later = targets.length - index - 1;
    const take =
      later === 0 ? remaining : target.repeatable ? Math.max(1, remaining - later) : 1;
    result.set(target.name, values.slice(cursor, cursor + take));
    cursor += take;
  });

  return result;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Assign a value sequence to every placeholder name of the template.
 *
 * Precedence, highest first: command-line bindings (named, file and
 * positional), environment, presets, inline defaults. Unbound names are left
 * out of the table; unbound names occurring outside every optional group
 * are an error.
 */
export function resolveBindings(
  nodes: TemplateNode[],
  source: ValueSource,
  options: ResolveOptions = {}
): Map<string, Binding> {
  const strict = options.strict ?? false;
  const infos = summarize(collectPlaceholders(nodes));
  const known = new Set(infos.map((info) => info.name));
  const named = source.cliBindings();

  for (const name of named.keys()) {
    if (!known.has(name)) {
      reportUnknown(name, `Can not assign values to unknown placeholder <${name}>`, strict);
    }
  }

  const targets = infos.filter((info) => !named.has(info.name) && !source.isPreset(info.name));
  const positional = source.positionalArgs();
  if (positional.length > 0 && targets.length === 0) {
    reportUnknown(
      positional[0],
      `Can not assign '${positional.join(" ")}' to unknown placeholder`,
      strict
    );
  }
  const assigned = distributePositionals(positional, targets);

  function readCli(bindings: readonly BindingValue[]): string[] {
    return bindings.flatMap((binding) =>
      binding.type === "value" ? [binding.value] : source.readFile(binding.path)
    );
  }

  const strategies: Strategy[] = [
    ({ name }) => {
      const bindings = named.get(name);
      if (bindings) {
        const fromFile = bindings.some((binding) => binding.type === "file");
        return fromValues(name, readCli(bindings), fromFile ? "file" : "cli");
      }
      const values = assigned.get(name);
      return values ? fromValues(name, values, "cli") : null;
    },
    ({ name }) => {
      const values = source.envBinding(name)?.filter((value) => value !== "");
      return values && values.length > 0 ? fromValues(name, values, "env") : null;
    },
    ({ name }) => {
      const value = source.preset(name);
      return value === undefined ? null : fromValues(name, [value], "preset");
    },
    (info) => (info.default === undefined ? null : fromValues(info.name, [info.default], "default")),
  ];

  const table = new Map<string, Binding>();
  for (const info of infos) {
    for (const strategy of strategies) {
      const binding = strategy(info);
      if (binding) {
        table.set(info.name, binding);
        logger.debug(`Resolved <${info.name}> from ${binding.source}`, {
          values: binding.values,
          explicitEmpty: binding.explicitEmpty,
        });
        break;
      }
    }
  }

  const missing = infos.filter((info) => info.required && !table.has(info.name));
  if (missing.length > 0 && (options.requireAll ?? true)) {
    throw new UnresolvedPlaceholderError(missing.map((info) => info.name));
  }

  return table;
}
