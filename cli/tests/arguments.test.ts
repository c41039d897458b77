import { describe, it, expect } from "vitest";
import { parseArguments } from "../src/arguments.js";

const NONE = new Set<string>();

describe("parseArguments", () => {
  it("reads named assignments", () => {
    const { named, positional } = parseArguments(["arg=val", "Other=x=y"], NONE);
    expect(named).toEqual(
      new Map([
        ["arg", [{ type: "value", value: "val" }]],
        ["other", [{ type: "value", value: "x=y" }]],
      ])
    );
    expect(positional).toEqual([]);
  });

  it("continues the last assignment with bare values", () => {
    const { named } = parseArguments(["arg=val1", "val2", "b=x", "y"], NONE);
    expect(named.get("arg")).toEqual([
      { type: "value", value: "val1" },
      { type: "value", value: "val2" },
    ]);
    expect(named.get("b")).toEqual([
      { type: "value", value: "x" },
      { type: "value", value: "y" },
    ]);
  });

  it("collects values before any assignment as positional", () => {
    const { named, positional } = parseArguments(["v1", "v2", "b=x"], NONE);
    expect(positional).toEqual(["v1", "v2"]);
    expect([...named.keys()]).toEqual(["b"]);
  });

  it("reads file bindings only for template placeholders", () => {
    expect(parseArguments(["file:list.txt"], new Set(["file"])).named.get("file")).toEqual([
      { type: "file", path: "list.txt" },
    ]);
    expect(parseArguments(["host:8080"], new Set(["file"])).positional).toEqual(["host:8080"]);
  });

  it("mixes values and files for one name", () => {
    const { named } = parseArguments(["file=a", "file:list.txt"], new Set(["file"]));
    expect(named.get("file")).toEqual([
      { type: "value", value: "a" },
      { type: "file", path: "list.txt" },
    ]);
  });

  it("keeps explicit empty assignments and skips empty arguments", () => {
    const { named, positional } = parseArguments(["", "a", "arg="], NONE);
    expect(positional).toEqual(["a"]);
    expect(named.get("arg")).toEqual([{ type: "value", value: "" }]);
  });
});
