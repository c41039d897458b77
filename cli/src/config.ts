import { config as loadDotenv } from "dotenv";
import { resolve } from "path";
import { homedir } from "os";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean (true/false/1/0/yes/no), got: ${value}`);
}

export function expandHome(path: string): string {
  if (path === "~" || path.startsWith("~/")) {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

// =============================================================================
// Configuration
// =============================================================================

export interface Config {
  /** Directory holding the user's .env file. */
  home: string;
  logLevel: LogLevel;
  /** Reject bindings that match no placeholder. */
  strict: boolean;
}

export function loadConfig(env: Env = process.env): Config {
  const logLevel = optional(env, "STENCIL_LOG_LEVEL", "info").toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `STENCIL_LOG_LEVEL must be one of debug, info, warn, error, silent, got: ${logLevel}`
    );
  }

  return {
    home: expandHome(optional(env, "STENCIL_HOME", "~/.stencil")),
    logLevel,
    strict: parseBoolean("STENCIL_STRICT", optional(env, "STENCIL_STRICT", "false")),
  };
}

/**
 * Load `<STENCIL_HOME>/.env` into process.env. Variables already set win.
 */
export function loadEnvFile(env: Env = process.env): void {
  const home = expandHome(optional(env, "STENCIL_HOME", "~/.stencil"));
  loadDotenv({ path: resolve(home, ".env") });
}
