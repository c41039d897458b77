import { readFileSync } from "fs";
import { parseArguments } from "../arguments.js";
import { expandHome } from "../config.js";
import { SourceUnavailableError, errorMessage } from "../errors.js";
import { countCombinations } from "../expand.js";
import { generateFromTemplate } from "../generate.js";
import { logger } from "../logger.js";
import { formatBindingReport, formatTemplateReport } from "../report.js";
import { createProcessSource } from "../sources.js";
import { parseTemplate, placeholderNames } from "../template.js";

// =============================================================================
// Format String Input
// =============================================================================

export interface FormatInput {
  formatString?: string;
  template?: string;
}

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };

/**
 * Decode the \n, \t and \r sequences a shell argument can not carry
 * literally. Every other backslash is left for the template grammar.
 */
export function decodeEscapes(value: string): string {
  return value.replace(/\\([ntr])/g, (_, code: string) => ESCAPES[code]);
}

function readTemplateFile(path: string): string {
  try {
    return readFileSync(expandHome(path), "utf-8").replace(/\r?\n$/, "");
  } catch (error) {
    throw new SourceUnavailableError(`template '${path}'`, errorMessage(error));
  }
}

function readStdin(): string {
  try {
    return readFileSync(process.stdin.fd, "utf-8").replace(/\r?\n$/, "");
  } catch (error) {
    throw new SourceUnavailableError("standard input", errorMessage(error));
  }
}

/**
 * Pick the format string: --format-string, then --template, then piped
 * standard input, then the FORMAT_STRING environment variable.
 */
export function readFormatString(
  input: FormatInput,
  env: NodeJS.ProcessEnv = process.env
): string | null {
  if (input.formatString) {
    return decodeEscapes(input.formatString);
  }
  if (input.template) {
    return readTemplateFile(input.template);
  }
  if (!process.stdin.isTTY) {
    const piped = readStdin();
    if (piped) {
      return piped;
    }
  }
  return env.FORMAT_STRING ? decodeEscapes(env.FORMAT_STRING) : null;
}

// =============================================================================
// Generate Command
// =============================================================================

export interface GenerateCommandOptions {
  strict: boolean;
}

export function generateCommand(
  formatString: string,
  values: string[],
  options: GenerateCommandOptions
): void {
  const template = parseTemplate(formatString);
  const source = createProcessSource({
    arguments: parseArguments(values, new Set(placeholderNames(template))),
  });

  for (const line of formatTemplateReport(formatString)) {
    logger.info(line);
  }

  const result = generateFromTemplate(template, source, { strict: options.strict });

  for (const line of formatBindingReport(template, result.bindings)) {
    logger.info(line);
  }
  logger.debug(`Generated ${result.lines.length} line(s)`, {
    dimensions: result.dimensions.map((dimension) => dimension.name),
    combinations: countCombinations(result.dimensions),
  });

  for (const line of result.lines) {
    console.log(line);
  }
}
