import { formatDate } from "./datetime.js";

// =============================================================================
// Presets
// =============================================================================

export interface Preset {
  name: string;
  description: string;
  compute(now: Date): string;
}

export const BUILTIN_PRESETS: readonly Preset[] = [
  {
    name: "date",
    description: "current date %Y%m%d",
    compute: (now) => formatDate(now, "%Y%m%d"),
  },
  {
    name: "date_time",
    description: "current date and time %Y%m%d%H%M%S",
    compute: (now) => formatDate(now, "%Y%m%d%H%M%S"),
  },
  {
    name: "time",
    description: "current time %H%M%S",
    compute: (now) => formatDate(now, "%H%M%S"),
  },
  {
    name: "timestamp",
    description: "seconds since the unix epoch",
    compute: (now) => String(Math.floor(now.getTime() / 1000)),
  },
];

/**
 * Preset values for one invocation. The clock is read once, on first use,
 * and every preset value is computed at most once.
 */
export class PresetValues {
  private readonly presets: Map<string, Preset>;
  private readonly values = new Map<string, string>();
  private now: Date | null = null;

  constructor(
    presets: readonly Preset[] = BUILTIN_PRESETS,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.presets = new Map(presets.map((preset) => [preset.name, preset]));
  }

  has(name: string): boolean {
    return this.presets.has(name);
  }

  get(name: string): string | undefined {
    const cached = this.values.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const preset = this.presets.get(name);
    if (!preset) {
      return undefined;
    }

    this.now ??= this.clock();
    const value = preset.compute(this.now);
    this.values.set(name, value);
    return value;
  }

  list(): Preset[] {
    return [...this.presets.values()];
  }
}
