import chalk from "chalk";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeAll, beforeEach, describe, it, expect } from "vitest";
import { CodecRegistry } from "../src/codecs.js";
import { exportStatements } from "../src/commands/env.js";
import { decodeEscapes, readFormatString } from "../src/commands/generate.js";
import { formatCodecList, formatPresetList } from "../src/commands/list.js";
import { SourceUnavailableError } from "../src/errors.js";
import { createStaticSource } from "../src/sources.js";
import { parseTemplate } from "../src/template.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("exportStatements", () => {
  it("exports assigned values and skips defaults and empties", () => {
    const source = createStaticSource({
      named: { a: ["one"], d: [""] },
      env: { c: ["two", "three"] },
    });
    expect(exportStatements(parseTemplate("<a> <b='x'> <c> <d> <e>"), source)).toEqual([
      'export a="one"',
      String.raw`export c="\\('two' 'three'\\)"`,
    ]);
  });

  it("escapes shell characters inside double quotes", () => {
    const source = createStaticSource({ named: { a: ['$HOME "x" `y`'] } });
    expect(exportStatements(parseTemplate("<a>"), source)).toEqual([
      String.raw`export a="\$HOME \"x\" \`y\`"`,
    ]);
  });
});

describe("decodeEscapes", () => {
  it("decodes line breaks and tabs only", () => {
    expect(decodeEscapes("a\\nb\\tc\\rd")).toBe("a\nb\tc\rd");
    expect(decodeEscapes("\\<x\\>")).toBe("\\<x\\>");
  });
});

describe("readFormatString", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stencil-format-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("prefers the format string option", () => {
    expect(readFormatString({ formatString: "a\\n<b>", template: "ignored" }, {})).toBe("a\n<b>");
  });

  it("reads a template file without its final newline", () => {
    const file = join(dir, "cmd.tpl");
    writeFileSync(file, "ssh <user>@<host>\n");
    expect(readFormatString({ template: file }, {})).toBe("ssh <user>@<host>");
  });

  it("reports missing template files", () => {
    const file = join(dir, "missing.tpl");
    expect(() => readFormatString({ template: file }, {})).toThrow(SourceUnavailableError);
    expect(() => readFormatString({ template: file }, {})).toThrow(`Reading template '${file}' failed:`);
  });
});

describe("list formatting", () => {
  it("marks reducing codecs and aligns descriptions", () => {
    const registry = new CodecRegistry()
      .register({
        name: "upper",
        kind: "value",
        argument: "none",
        description: "Up.",
        apply: (value) => value.toUpperCase(),
      })
      .register({
        name: "count",
        kind: "reduce",
        argument: "none",
        description: "Count.",
        apply: (values) => String(values.length),
      });
    expect(formatCodecList(registry)).toEqual(["count  [list] Count.", "upper  Up."]);
  });

  it("shows presets as placeholders", () => {
    expect(
      formatPresetList([{ name: "date", description: "current date", compute: () => "x" }])
    ).toEqual(["<date>  current date"]);
  });
});
