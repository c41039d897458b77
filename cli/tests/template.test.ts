import { describe, it, expect } from "vitest";
import { TemplateSyntaxError } from "../src/errors.js";
import {
  collectPlaceholders,
  parseTemplate,
  placeholderNames,
  serializeTemplate,
} from "../src/template.js";

function syntaxError(template: string): TemplateSyntaxError {
  try {
    parseTemplate(template);
  } catch (error) {
    if (error instanceof TemplateSyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected '${template}' to be rejected`);
}

describe("parseTemplate", () => {
  it("splits literals and placeholders", () => {
    expect(parseTemplate("hello <name>!")).toEqual([
      { type: "literal", text: "hello " },
      { type: "placeholder", name: "name", repeatable: false, codecs: [], position: 6 },
      { type: "literal", text: "!" },
    ]);
  });

  it("reads the repeatable marker, default and codec chain", () => {
    expect(parseTemplate("<File...='a b'|join:','|upper>")).toEqual([
      {
        type: "placeholder",
        name: "file",
        spelling: "File",
        repeatable: true,
        default: "a b",
        codecs: [{ name: "join", argument: "," }, { name: "upper" }],
        position: 0,
      },
    ]);
  });

  it("accepts the default after the codecs and double quotes", () => {
    const [first] = parseTemplate(`<x|upper="it's">`);
    expect(first).toEqual({
      type: "placeholder",
      name: "x",
      repeatable: false,
      default: "it's",
      codecs: [{ name: "upper" }],
      position: 0,
    });
  });

  it("nests optional groups", () => {
    expect(parseTemplate("a[ <b>[ <c>]]")).toEqual([
      { type: "literal", text: "a" },
      {
        type: "optional",
        children: [
          { type: "literal", text: " " },
          { type: "placeholder", name: "b", repeatable: false, codecs: [], position: 3 },
          {
            type: "optional",
            children: [
              { type: "literal", text: " " },
              { type: "placeholder", name: "c", repeatable: false, codecs: [], position: 8 },
            ],
          },
        ],
      },
    ]);
  });

  it("unescapes brackets and keeps other backslashes", () => {
    expect(parseTemplate("\\<not\\> a \\[tag\\]")).toEqual([
      { type: "literal", text: "<not> a [tag]" },
    ]);
    expect(parseTemplate("a\\nb")).toEqual([{ type: "literal", text: "a\\nb" }]);
  });

  it("treats a stray '>' as text", () => {
    expect(parseTemplate("a > b")).toEqual([{ type: "literal", text: "a > b" }]);
  });

  it("keeps top-level lines starting with '#' as comments", () => {
    expect(parseTemplate("# usage: <a>\necho <a>")).toEqual([
      { type: "comment", text: "# usage: <a>" },
      { type: "literal", text: "\necho " },
      { type: "placeholder", name: "a", repeatable: false, codecs: [], position: 18 },
    ]);
    expect(parseTemplate("# x < y ]")).toEqual([{ type: "comment", text: "# x < y ]" }]);
  });

  it("parses '#' elsewhere as text", () => {
    expect(parseTemplate("a #<b>")).toEqual([
      { type: "literal", text: "a #" },
      { type: "placeholder", name: "b", repeatable: false, codecs: [], position: 3 },
    ]);
    expect(parseTemplate("[\n# <b>]")).toEqual([
      {
        type: "optional",
        children: [
          { type: "literal", text: "\n# " },
          { type: "placeholder", name: "b", repeatable: false, codecs: [], position: 4 },
        ],
      },
    ]);
  });

  it("returns no nodes for an empty template", () => {
    expect(parseTemplate("")).toEqual([]);
  });

  describe("syntax errors", () => {
    it.each([
      ["a]", "Unbalanced ']' at position 1"],
      ["a[b", "Unterminated optional group at position 1"],
      ["<name", "Unterminated placeholder at position 0"],
      ["<a[b]>", "Unterminated placeholder at position 0"],
      ["<a b>", "Unexpected ' ' in placeholder at position 2"],
      ["<1a>", "Expected placeholder name at position 1"],
      ["<a....>", "Repeatable marker must be exactly '...' at position 5"],
      ["<a..>", "Repeatable marker must be exactly '...' at position 2"],
      ["<a='x'='y'>", "Placeholder has more than one default at position 6"],
      ["<a|join:','|>", "Expected codec name at position 12"],
      ["<a|center:'4':'x'>", "Codec 'center' takes at most one argument at position 13"],
      ["<a=x>", "Expected quoted default value at position 3"],
      ["<a='x>", "Unterminated quoted default value at position 3"],
      ["<a|add:'x>", "Unterminated quoted codec argument at position 7"],
    ])("rejects %s", (template, message) => {
      expect(() => parseTemplate(template)).toThrow(message);
    });

    it("carries the code and position", () => {
      const error = syntaxError("ab]");
      expect(error.code).toBe("S001");
      expect(error.position).toBe(2);
      expect(error.toJSON()).toEqual({
        name: "TemplateSyntaxError",
        code: "S001",
        message: "Unbalanced ']' at position 2",
        details: { position: 2 },
      });
    });
  });
});

describe("serializeTemplate", () => {
  it.each([
    "tar -czvf <archive> <file...>",
    "python3 -m http.server[ --bind <lhost>] <lport='8000'>",
    "cp <file|squote> <file|add:'.bak'|squote>",
    `echo <msg="it's"|upper>`,
    "a[ <b>[ <c...|join:','>]]",
    "<Arg|UPPER> <arg>",
    "# list <all> files\nls <dir>\n# done [x]",
  ])("reproduces %s", (template) => {
    expect(serializeTemplate(parseTemplate(template))).toBe(template);
  });

  it("escapes literal brackets", () => {
    const nodes = parseTemplate("\\<a\\> \\[b\\]");
    expect(serializeTemplate(nodes)).toBe("\\<a> \\[b\\]");
    expect(parseTemplate(serializeTemplate(nodes))).toEqual(nodes);
  });

  it("writes the default before codecs", () => {
    expect(serializeTemplate(parseTemplate("<Name|upper='x'>"))).toBe("<Name='x'|upper>");
  });

  it("matches names case-insensitively while keeping their spelling", () => {
    const [first, , second] = parseTemplate("<Arg> <ARG>");
    expect(first).toMatchObject({ name: "arg", spelling: "Arg" });
    expect(second).toMatchObject({ name: "arg", spelling: "ARG" });
    expect(placeholderNames(parseTemplate("<Arg> <ARG>"))).toEqual(["arg"]);
  });
});

describe("collectPlaceholders", () => {
  it("marks occurrences inside optional groups", () => {
    const occurrences = collectPlaceholders(parseTemplate("<a>[<b> [<a>]]"));
    expect(occurrences.map(({ placeholder, optional }) => [placeholder.name, optional])).toEqual([
      ["a", false],
      ["b", true],
      ["a", true],
    ]);
  });

  it("lists names once, in order of first occurrence", () => {
    expect(placeholderNames(parseTemplate("<b> <a> [<b>] <c>"))).toEqual(["b", "a", "c"]);
  });
});
