// =============================================================================
// Binding Arguments
// =============================================================================

/** One value assigned on the command line. */
export type BindingValue =
  | { type: "value"; value: string }
  | { type: "file"; path: string };

export interface ParsedArguments {
  /** Named assignments in the order given, keyed by lower-case name. */
  named: Map<string, BindingValue[]>;
  /** Values given before any named assignment. */
  positional: string[];
}

const ASSIGNMENT = /^(\w+)([=:])([\s\S]*)$/;

/**
 * Parse `NAME=VALUE`, `NAME:FILE` and bare `VALUE` arguments.
 *
 *   arg=val            assigns to <arg>
 *   arg=val1 val2      bare values continue the last named assignment
 *   arg:files.txt      assigns every line of the file (only when <arg>
 *                      is a placeholder; otherwise the text is a value)
 *   val1 val2          positional, distributed over unset placeholders
 *
 * Empty arguments are skipped; use `arg=` to bind a name to nothing.
 */
export function parseArguments(
  args: readonly string[],
  placeholders: ReadonlySet<string>
): ParsedArguments {
  const named = new Map<string, BindingValue[]>();
  const positional: string[] = [];
  let lastName: string | null = null;

  for (const arg of args) {
    if (arg === "") {
      continue;
    }

    let name: string | null = lastName;
    let value: BindingValue = { type: "value", value: arg };

    const match = ASSIGNMENT.exec(arg);
    if (match) {
      const [, rawName, separator, rest] = match;
      const candidate = rawName.toLowerCase();
      if (separator === "=") {
        name = candidate;
        value = { type: "value", value: rest };
      } else if (placeholders.has(candidate)) {
        name = candidate;
        value = { type: "file", path: rest };
      }
    }

    if (name === null) {
      positional.push(arg);
      continue;
    }

    const values = named.get(name) ?? [];
    values.push(value);
    named.set(name, values);
    lastName = name;
  }

  return { named, positional };
}
