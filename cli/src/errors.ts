// =============================================================================
// Error Types
// =============================================================================

export const ErrorCodes = {
  // Template grammar
  SYNTAX: "S001",

  // Binding resolution
  UNRESOLVED_PLACEHOLDER: "R001",
  UNKNOWN_BINDING: "R002",
  SOURCE_UNAVAILABLE: "R003",

  // Codecs
  CODEC: "C001",

  // Configuration
  CONFIG: "X001",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for every error raised while generating output.
 * Anything thrown as a StencilError aborts the whole invocation.
 */
export class StencilError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "StencilError";
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Malformed format string. `position` is the 0-based offset of the
 * offending character in the raw template.
 */
export class TemplateSyntaxError extends StencilError {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(ErrorCodes.SYNTAX, `${message} at position ${position}`, { position });
    this.name = "TemplateSyntaxError";
  }
}

export class UnresolvedPlaceholderError extends StencilError {
  constructor(public readonly placeholders: string[]) {
    super(
      ErrorCodes.UNRESOLVED_PLACEHOLDER,
      `Missing data for ${placeholders.map((name) => `<${name}>`).join(", ")}`,
      { placeholders }
    );
    this.name = "UnresolvedPlaceholderError";
  }
}

export class UnknownBindingError extends StencilError {
  constructor(
    public readonly binding: string,
    message: string
  ) {
    super(ErrorCodes.UNKNOWN_BINDING, message, { binding });
    this.name = "UnknownBindingError";
  }
}

export class SourceUnavailableError extends StencilError {
  constructor(
    public readonly source: string,
    reason: string
  ) {
    super(ErrorCodes.SOURCE_UNAVAILABLE, `Reading ${source} failed: ${reason}`, {
      source,
    });
    this.name = "SourceUnavailableError";
  }
}

export class CodecError extends StencilError {
  constructor(
    public readonly placeholder: string,
    public readonly codec: string,
    public readonly argument: string | undefined,
    reason: string
  ) {
    const call = argument === undefined ? codec : `${codec}:'${argument}'`;
    super(ErrorCodes.CODEC, `<${placeholder}|${call}>: ${reason}`, {
      placeholder,
      codec,
      argument,
    });
    this.name = "CodecError";
  }
}

export class ConfigError extends StencilError {
  constructor(message: string) {
    super(ErrorCodes.CONFIG, message);
    this.name = "ConfigError";
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
