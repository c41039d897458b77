import { describe, it, expect, vi } from "vitest";
import { BUILTIN_PRESETS, PresetValues } from "../src/presets.js";

const NOW = new Date(2024, 0, 5, 9, 7, 3);

describe("PresetValues", () => {
  it("computes the built-in presets from one clock read", () => {
    const clock = vi.fn(() => NOW);
    const presets = new PresetValues(BUILTIN_PRESETS, clock);

    expect(presets.get("date")).toBe("20240105");
    expect(presets.get("date_time")).toBe("20240105090703");
    expect(presets.get("time")).toBe("090703");
    expect(presets.get("timestamp")).toBe(String(NOW.getTime() / 1000));
    expect(presets.get("date")).toBe("20240105");
    expect(clock).toHaveBeenCalledTimes(1);
  });

  it("does not read the clock until a value is needed", () => {
    const clock = vi.fn(() => NOW);
    const presets = new PresetValues(BUILTIN_PRESETS, clock);
    expect(presets.has("date")).toBe(true);
    expect(presets.has("nope")).toBe(false);
    expect(presets.get("nope")).toBeUndefined();
    expect(clock).not.toHaveBeenCalled();
  });

  it("accepts custom presets", () => {
    const presets = new PresetValues([
      { name: "year", description: "current year", compute: (now) => String(now.getFullYear()) },
    ], () => NOW);
    expect(presets.list().map((preset) => preset.name)).toEqual(["year"]);
    expect(presets.get("year")).toBe("2024");
    expect(presets.has("date")).toBe(false);
  });

  it("lists the built-in presets", () => {
    expect(new PresetValues().list().map((preset) => preset.name)).toEqual([
      "date",
      "date_time",
      "time",
      "timestamp",
    ]);
  });
});
