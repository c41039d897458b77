import { readFileSync } from "fs";
import { resolve } from "path";
import type { BindingValue, ParsedArguments } from "./arguments.js";
import { expandHome } from "./config.js";
import { readEnvBinding } from "./env.js";
import { SourceUnavailableError, errorMessage } from "./errors.js";
import { PresetValues } from "./presets.js";

// =============================================================================
// Value Sources
// =============================================================================

/**
 * Everything the resolver may draw placeholder values from.
 * Names are lower case.
 */
export interface ValueSource {
  cliBindings(): ReadonlyMap<string, readonly BindingValue[]>;
  positionalArgs(): readonly string[];
  /** Values of the environment variable named like the placeholder. */
  envBinding(name: string): readonly string[] | undefined;
  isPreset(name: string): boolean;
  preset(name: string): string | undefined;
  /** Non-blank lines of a file, in order. */
  readFile(path: string): string[];
}

export function nonBlankLines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.trim() !== "");
}

// =============================================================================
// Process Source
// =============================================================================

export interface ProcessSourceOptions {
  arguments: ParsedArguments;
  env?: NodeJS.ProcessEnv;
  presets?: PresetValues;
  cwd?: string;
}

/**
 * Source backed by parsed command-line arguments, the process environment,
 * the clock and the file system.
 */
export function createProcessSource(options: ProcessSourceOptions): ValueSource {
  const env = options.env ?? process.env;
  const presets = options.presets ?? new PresetValues();
  const cwd = options.cwd ?? process.cwd();

  return {
    cliBindings: () => options.arguments.named,
    positionalArgs: () => options.arguments.positional,
    envBinding: (name) => readEnvBinding(env, name),
    isPreset: (name) => presets.has(name),
    preset: (name) => presets.get(name),
    readFile: (path) => {
      const file = resolve(cwd, expandHome(path));
      try {
        return nonBlankLines(readFileSync(file, "utf-8"));
      } catch (error) {
        throw new SourceUnavailableError(`file '${file}'`, errorMessage(error));
      }
    },
  };
}

// =============================================================================
// Static Source
// =============================================================================

export interface StaticSourceOptions {
  named?: Record<string, Array<string | BindingValue>>;
  positional?: string[];
  env?: Record<string, string[]>;
  presets?: Record<string, string>;
  /** File contents by path, one entry per line. */
  files?: Record<string, string[]>;
}

function lowerKeys<T>(record: Record<string, T> = {}): Map<string, T> {
  return new Map(Object.entries(record).map(([key, value]) => [key.toLowerCase(), value]));
}

/**
 * In-memory source, for embedding the engine and for tests.
 */
export function createStaticSource(options: StaticSourceOptions = {}): ValueSource {
  const named = new Map(
    [...lowerKeys(options.named)].map(([name, values]): [string, BindingValue[]] => [
      name,
      values.map((value): BindingValue => (typeof value === "string" ? { type: "value", value } : value)),
    ])
  );
  const env = lowerKeys(options.env);
  const presets = lowerKeys(options.presets);
  const files = options.files ?? {};

  return {
    cliBindings: () => named,
    positionalArgs: () => options.positional ?? [],
    envBinding: (name) => env.get(name),
    isPreset: (name) => presets.has(name),
    preset: (name) => presets.get(name),
    readFile: (path) => {
      const lines = files[path];
      if (!lines) {
        throw new SourceUnavailableError(`file '${path}'`, "no such file");
      }
      return lines.filter((line) => line.trim() !== "");
    },
  };
}
