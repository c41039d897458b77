import { Command } from "commander";
import { createDefaultRegistry } from "./codecs.js";
import { envCommand } from "./commands/env.js";
import { generateCommand, readFormatString } from "./commands/generate.js";
import { listCodecs, listPresets } from "./commands/list.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { PresetValues } from "./presets.js";

const EXAMPLES = `
Examples:

  # Fill a format string with a value
  $ stencil -f 'tar -xzvf <archive>' /path/to/foo.tar.gz

  # One line per value
  $ stencil -f 'tar -xzvf <archive>' foo.tar.gz bar.tar.gz

  # Repeatable placeholders collect every value into one line
  $ stencil -f 'tar -czvf <archive> <file...>' /path/to/foo.tar file=foo bar

  # Presets
  $ stencil -f "tar -czvf '<date_time>.tar.gz' <file...>" file=foo bar

  # Import values from a file, one per line
  $ stencil -f "tar -czvf '<date_time>.tar.gz' <file...>" file:files.txt

  # Optional parts and defaults
  $ stencil -f 'python3 -m http.server[ --bind <lhost>] <lport='"'"'8000'"'"'>' lport=9090

  # Codecs
  $ stencil -f "cp <file|squote> <file|add:'.bak'|squote>" /path/to/foo /path/to/bar
`;

interface CliOptions {
  formatString?: string;
  template?: string;
  listCodecs?: boolean;
  listPresets?: boolean;
  env?: boolean;
  strict?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

// =============================================================================
// CLI Definition
// =============================================================================

export function createProgram(): Command {
  const program = new Command();

  program
    .name("stencil")
    .description("Generate commands from templates with placeholders, optionals and codecs")
    .version("1.0.0")
    .argument(
      "[values...]",
      "VALUE | PLACEHOLDER=VALUE | PLACEHOLDER:FILE; bare values fill the next unset placeholder"
    )
    .option("-f, --format-string <format>", "format string with <placeholders> and [optional] parts")
    .option("-t, --template <file>", "read the format string from a file")
    .option("--list-codecs", "list all available codecs")
    .option("--list-presets", "list all available presets")
    .option("--env", "print export statements for the assigned values")
    .option("--strict", "reject values assigned to unknown placeholders")
    .option("-q, --quiet", "only print the generated lines")
    .option("-d, --debug", "print debug information")
    .addHelpText("after", EXAMPLES)
    .action((values: string[], options: CliOptions) => {
      try {
        const config = loadConfig();
        logger.setLevel(options.debug ? "debug" : options.quiet ? "warn" : config.logLevel);
        const strict = Boolean(options.strict) || config.strict;

        if (options.listCodecs && options.listPresets) {
          throw new Error("--list-codecs can not be used in combination with --list-presets");
        }
        if (options.formatString && options.template) {
          throw new Error("--format-string can not be used in conjunction with --template");
        }

        if (options.listCodecs) {
          listCodecs(createDefaultRegistry());
          return;
        }
        if (options.listPresets) {
          listPresets(new PresetValues().list());
          return;
        }

        const formatString = readFormatString(options);
        if (formatString === null) {
          program.outputHelp({ error: true });
          process.exit(1);
        }

        if (options.env) {
          envCommand(formatString, values, strict);
        } else {
          generateCommand(formatString, values, { strict });
        }
      } catch (error) {
        logger.error(errorMessage(error), error);
        process.exit(1);
      }
    });

  return program;
}
