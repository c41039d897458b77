import chalk from "chalk";
import type { BindingTable } from "./resolver.js";
import { collectPlaceholders, type TemplateNode } from "./template.js";

// =============================================================================
// Reports
// =============================================================================

export function formatTemplateReport(formatString: string): string[] {
  return [
    chalk.yellow("Format:"),
    ...formatString.split("\n").map((line) => `   ${line}`),
  ];
}

/**
 * One block per placeholder name: its status and the values it was bound to.
 *
 *   Placeholders:
 *      arg (required) = a
 *                     | b
 *     port  (default) = 8000
 */
export function formatBindingReport(template: TemplateNode[], bindings: BindingTable): string[] {
  const placeholders = new Map<string, { required: boolean }>();
  for (const { placeholder, optional } of collectPlaceholders(template)) {
    const entry = placeholders.get(placeholder.name);
    if (entry) {
      entry.required ||= !optional;
    } else {
      placeholders.set(placeholder.name, { required: !optional });
    }
  }

  if (placeholders.size === 0) {
    return [];
  }

  const width = Math.max(...[...placeholders.keys()].map((name) => name.length));
  const lines = [chalk.yellow("Placeholders:")];

  for (const [name, { required }] of placeholders) {
    const label = name.padStart(width);
    const binding = bindings.get(name);

    if (!binding) {
      lines.push(`   ${label} ${chalk.green("(optional)")} = ${chalk.gray("<not assigned>")}`);
      continue;
    }

    const status =
      binding.source === "default"
        ? chalk.blue(" (default)")
        : required
          ? chalk.green("(required)")
          : chalk.green("(optional)");

    if (binding.explicitEmpty) {
      lines.push(`   ${label} ${status} = ${chalk.gray("<empty>")}`);
      continue;
    }

    binding.values.forEach((value, index) => {
      if (index === 0) {
        lines.push(`   ${label} ${status} = ${value}`);
      } else {
        lines.push(`   ${" ".repeat(width)} ${" ".repeat(10)} | ${value}`);
      }
    });
  }

  return lines;
}
