import chalk from "chalk";
import type { CodecRegistry } from "../codecs.js";
import type { Preset } from "../presets.js";

// =============================================================================
// List Commands
// =============================================================================

function formatEntries(entries: Array<{ name: string; description: string }>): string[] {
  const width = Math.max(0, ...entries.map((entry) => entry.name.length));
  return entries.map((entry) => `${entry.name.padEnd(width)}  ${chalk.gray(entry.description)}`);
}

export function formatCodecList(registry: CodecRegistry): string[] {
  return formatEntries(
    registry.list().map((codec) => ({
      name: codec.name,
      description: `${codec.kind === "reduce" ? "[list] " : ""}${codec.description}`,
    }))
  );
}

export function formatPresetList(presets: Preset[]): string[] {
  return formatEntries(presets.map((preset) => ({ name: `<${preset.name}>`, description: preset.description })));
}

export function listCodecs(registry: CodecRegistry): void {
  for (const line of formatCodecList(registry)) {
    console.log(line);
  }
}

export function listPresets(presets: Preset[]): void {
  for (const line of formatPresetList(presets)) {
    console.log(line);
  }
}
