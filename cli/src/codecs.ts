import { createHash } from "crypto";
import { formatDate } from "./datetime.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

/** Whether a codec takes the `:'argument'` part of a codec call. */
export type CodecArgument = "none" | "required" | "optional";

interface CodecInfo {
  name: string;
  description: string;
  argument: CodecArgument;
}

/** Transforms every value independently. */
export interface ValueCodec extends CodecInfo {
  kind: "value";
  apply(value: string, argument: string | undefined): string;
}

/** Collapses the whole value sequence into a single value. */
export interface ReducingCodec extends CodecInfo {
  kind: "reduce";
  apply(values: readonly string[], argument: string | undefined): string;
}

export type Codec = ValueCodec | ReducingCodec;

// =============================================================================
// Registry
// =============================================================================

export class CodecRegistry {
  private readonly codecs = new Map<string, Codec>();

  register(codec: Codec): this {
    const name = codec.name.toLowerCase();
    if (this.codecs.has(name)) {
      throw new ConfigError(`Codec '${name}' is already registered`);
    }
    this.codecs.set(name, codec);
    return this;
  }

  get(name: string): Codec | undefined {
    return this.codecs.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.codecs.has(name.toLowerCase());
  }

  list(): Codec[] {
    return [...this.codecs.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}

// =============================================================================
// Argument Helpers
// =============================================================================

function expectArgument(argument: string | undefined): string {
  if (argument === undefined) {
    throw new Error("missing argument");
  }
  return argument;
}

function integerArgument(argument: string | undefined): number {
  const value = expectArgument(argument).trim();
  if (!/^[+-]?\d+$/.test(value)) {
    throw new Error(`expected an integer, got '${argument}'`);
  }
  return parseInt(value, 10);
}

function isInteger(value: string): boolean {
  return /^\s*[+-]?\d+\s*$/.test(value);
}

const DECIMAL = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)\s*$/;

function timestamp(value: string): Date {
  if (!DECIMAL.test(value)) {
    throw new Error(`'${value}' is not a timestamp`);
  }
  const date = new Date(Number(value) * 1000);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`'${value}' is out of range`);
  }
  return date;
}

// =============================================================================
// Built-in Codecs
// =============================================================================

function hash(algorithm: string, description: string): ValueCodec {
  return {
    name: algorithm,
    kind: "value",
    argument: "none",
    description,
    apply: (value) => createHash(algorithm).update(value, "utf8").digest("hex"),
  };
}

function center(value: string, width: number): string {
  const margin = width - value.length;
  if (margin <= 0) {
    return value;
  }
  // Odd margins put the extra space left only when the width is odd too
  const left = Math.floor(margin / 2) + (margin & width & 1);
  return " ".repeat(left) + value + " ".repeat(margin - left);
}

function title(value: string): string {
  const titled = value.replace(
    /\p{L}+/gu,
    (word) => word[0].toUpperCase() + word.slice(1).toLowerCase()
  );
  return titled
    .replace(/[a-z]'[A-Z]/g, (match) => match.toLowerCase())
    .replace(/\d[A-Z]/g, (match) => match.toLowerCase());
}

function urlPlus(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, "+");
}

function words(value: string): string[] {
  return value.split(/\s+/).filter((word) => word !== "");
}

export const BUILTIN_CODECS: readonly Codec[] = [
  {
    name: "add",
    kind: "value",
    argument: "required",
    description: "Adds the argument to the value (numbers are summed, text is appended).",
    apply: (value, argument) => {
      const addend = expectArgument(argument);
      if (isInteger(value) && isInteger(addend)) {
        return String(BigInt(value.trim()) + BigInt(addend.trim()));
      }
      return value + addend;
    },
  },
  {
    name: "addslashes",
    kind: "value",
    argument: "none",
    description: "Add slashes before quotes.",
    apply: (value) => value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/'/g, "\\'"),
  },
  {
    name: "b64",
    kind: "value",
    argument: "none",
    description: "Encodes a text using Base64.",
    apply: (value) => Buffer.from(value, "utf8").toString("base64"),
  },
  {
    name: "basename",
    kind: "value",
    argument: "none",
    description: "Extracts the filename from a file path.",
    apply: (value) => value.slice(value.lastIndexOf("/") + 1),
  },
  {
    name: "capfirst",
    kind: "value",
    argument: "none",
    description: "Capitalize the first character of the value.",
    apply: (value) => (value ? value[0].toUpperCase() + value.slice(1) : value),
  },
  {
    name: "center",
    kind: "value",
    argument: "required",
    description: "Center the value in a field of a given width.",
    apply: (value, argument) => center(value, integerArgument(argument)),
  },
  {
    name: "count",
    kind: "reduce",
    argument: "none",
    description: "Return the number of values.",
    apply: (values) => String(values.length),
  },
  {
    name: "date",
    kind: "value",
    argument: "required",
    description: "Formats a unix timestamp using strftime directives.",
    apply: (value, argument) => formatDate(timestamp(value), expectArgument(argument)),
  },
  {
    name: "dquote",
    kind: "value",
    argument: "none",
    description: "Surrounds a string with double quotes.",
    apply: (value) => `"${value}"`,
  },
  {
    name: "first",
    kind: "reduce",
    argument: "none",
    description: "Return the first item in a list.",
    apply: (values) => values[0] ?? "",
  },
  {
    name: "join",
    kind: "reduce",
    argument: "required",
    description: "Takes a list of items and joins them with the specified separator.",
    apply: (values, argument) => values.join(expectArgument(argument)),
  },
  {
    name: "last",
    kind: "reduce",
    argument: "none",
    description: "Return the last item in a list.",
    apply: (values) => values[values.length - 1] ?? "",
  },
  {
    name: "length",
    kind: "value",
    argument: "none",
    description: "Return the number of characters of the value.",
    apply: (value) => String([...value].length),
  },
  {
    name: "ljust",
    kind: "value",
    argument: "required",
    description: "Left-align the value in a field of a given width.",
    apply: (value, argument) => value.padEnd(integerArgument(argument), " "),
  },
  {
    name: "lower",
    kind: "value",
    argument: "none",
    description: "Convert a string into all lowercase.",
    apply: (value) => value.toLowerCase(),
  },
  hash("md5", "Hashes a string using MD5."),
  {
    name: "rjust",
    kind: "value",
    argument: "required",
    description: "Right-align the value in a field of a given width.",
    apply: (value, argument) => value.padStart(integerArgument(argument), " "),
  },
  {
    name: "safename",
    kind: "value",
    argument: "none",
    description: "Replaces every non-alphanumeric character with an underscore.",
    apply: (value) => value.replace(/[^\p{L}\p{N}]/gu, "_"),
  },
  hash("sha1", "Hashes a string using SHA1."),
  hash("sha256", "Hashes a string using SHA256."),
  hash("sha512", "Hashes a string using SHA512."),
  {
    name: "squote",
    kind: "value",
    argument: "none",
    description: "Surrounds a string with single quotes.",
    apply: (value) => `'${value}'`,
  },
  {
    name: "title",
    kind: "value",
    argument: "none",
    description: "Convert a string into titlecase.",
    apply: title,
  },
  {
    name: "truncatechars",
    kind: "value",
    argument: "required",
    description: "Truncate a string after `arg` number of characters.",
    apply: (value, argument) => [...value].slice(0, Math.max(0, integerArgument(argument))).join(""),
  },
  {
    name: "truncatewords",
    kind: "value",
    argument: "required",
    description: "Truncate a string after `arg` number of words.",
    apply: (value, argument) => {
      const limit = integerArgument(argument);
      const all = words(value);
      return all.length <= limit ? value : all.slice(0, Math.max(0, limit)).join(" ");
    },
  },
  {
    name: "upper",
    kind: "value",
    argument: "none",
    description: "Convert a string into all uppercase.",
    apply: (value) => value.toUpperCase(),
  },
  {
    name: "urlplus",
    kind: "value",
    argument: "none",
    description: "Encodes a string for URLs. Spaces are encoded to plus-signs.",
    apply: urlPlus,
  },
  {
    name: "wordcount",
    kind: "value",
    argument: "none",
    description: "Return the number of words.",
    apply: (value) => String(words(value).length),
  },
];

/**
 * A registry holding every built-in codec.
 */
export function createDefaultRegistry(): CodecRegistry {
  const registry = new CodecRegistry();
  for (const codec of BUILTIN_CODECS) {
    registry.register(codec);
  }
  return registry;
}
