import { SourceUnavailableError, errorMessage } from "./errors.js";

// =============================================================================
// List Literals
// =============================================================================

const LIST_OPEN = "\\(";
const LIST_CLOSE = "\\)";

/**
 * True when the value uses the list literal syntax `\('a' 'b'\)`.
 */
export function isListLiteral(value: string): boolean {
  return (
    value.length >= LIST_OPEN.length + LIST_CLOSE.length &&
    value.startsWith(LIST_OPEN) &&
    value.endsWith(LIST_CLOSE)
  );
}

/**
 * Split shell-style words. Single quotes are literal, double quotes honor
 * backslash before `"`, `\`, `$` and backtick, and an unquoted backslash
 * escapes the next character. Adjacent quoted parts form one word.
 */
export function splitWords(input: string): string[] {
  const result: string[] = [];
  let word = "";
  let inWord = false;
  let pos = 0;

  while (pos < input.length) {
    const ch = input[pos];

    if (/\s/.test(ch)) {
      if (inWord) {
        result.push(word);
        word = "";
        inWord = false;
      }
      pos++;
      continue;
    }

    inWord = true;

    if (ch === "'") {
      const end = input.indexOf("'", pos + 1);
      if (end === -1) {
        throw new Error("unterminated single quote");
      }
      word += input.slice(pos + 1, end);
      pos = end + 1;
    } else if (ch === '"') {
      pos++;
      while (true) {
        if (pos >= input.length) {
          throw new Error("unterminated double quote");
        }
        const inner = input[pos];
        if (inner === '"') {
          pos++;
          break;
        }
        if (inner === "\\" && pos + 1 < input.length && '"\\$`'.includes(input[pos + 1])) {
          word += input[pos + 1];
          pos += 2;
        } else {
          word += inner;
          pos++;
        }
      }
    } else if (ch === "\\") {
      if (pos + 1 >= input.length) {
        throw new Error("trailing backslash");
      }
      word += input[pos + 1];
      pos += 2;
    } else {
      word += ch;
      pos++;
    }
  }

  if (inWord) {
    result.push(word);
  }
  return result;
}

/**
 * Values of a single environment variable: the words of a list literal, or
 * the raw value itself.
 */
export function parseEnvValue(value: string): string[] {
  if (!isListLiteral(value)) {
    return [value];
  }
  return splitWords(value.slice(LIST_OPEN.length, value.length - LIST_CLOSE.length));
}

function singleQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Inverse of parseEnvValue.
 */
export function formatEnvValue(values: readonly string[]): string {
  if (values.length === 1) {
    return values[0];
  }
  return `${LIST_OPEN}${values.map(singleQuote).join(" ")}${LIST_CLOSE}`;
}

// =============================================================================
// Environment Bindings
// =============================================================================

/**
 * Only lower-case names are considered; names starting with an underscore
 * belong to other programs.
 */
export function isBindableName(name: string): boolean {
  return !name.startsWith("_") && name === name.toLowerCase() && name !== name.toUpperCase();
}

/**
 * Values bound to a placeholder name by the environment variable of the same
 * name. Only the variable asked for is parsed.
 */
export function readEnvBinding(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const value = env[name];
  if (!value || !isBindableName(name)) {
    return undefined;
  }
  try {
    return parseEnvValue(value);
  } catch (error) {
    throw new SourceUnavailableError(`environment variable '${name}'`, errorMessage(error));
  }
}
