import { TemplateSyntaxError } from "./errors.js";

// =============================================================================
// Template AST
// =============================================================================

export type TemplateNode = LiteralNode | CommentNode | PlaceholderNode | OptionalNode;

export interface LiteralNode {
  type: "literal";
  text: string;
}

/** A top-level line starting with '#', emitted verbatim. Excludes the line break. */
export interface CommentNode {
  type: "comment";
  text: string;
}

export interface CodecCall {
  /** As written; the registry matches names case-insensitively. */
  name: string;
  argument?: string;
}

export interface PlaceholderNode {
  type: "placeholder";
  /** Lower case. */
  name: string;
  /** The name as written, when it differs from `name`. */
  spelling?: string;
  repeatable: boolean;
  default?: string;
  codecs: CodecCall[];
  /** Offset of the opening '<' in the raw template. */
  position: number;
}

export interface OptionalNode {
  type: "optional";
  children: TemplateNode[];
}

const ESCAPABLE = "<>[]";
const QUOTES = "'\"";
const NAME_START = /[A-Za-z]/;
const NAME_CHAR = /[A-Za-z0-9_]/;
const COMMENT = "#";

// =============================================================================
// Template Parsing
// =============================================================================

/**
 * Parse a format string into an AST.
 * Syntax: <name...='default'|codec:'arg'> for placeholders, [...] for
 * optional parts, with nesting support.
 * Escaping: \< \> \[ \]
 * Top-level lines starting with '#' are comments and are not parsed.
 */
export function parseTemplate(template: string): TemplateNode[] {
  let pos = 0;

  function parseSequence(depth: number): TemplateNode[] {
    const nodes: TemplateNode[] = [];
    let literal = "";

    function flush(): void {
      if (literal) {
        nodes.push({ type: "literal", text: literal });
        literal = "";
      }
    }

    while (pos < template.length) {
      const ch = template[pos];

      if (ch === COMMENT && depth === 0 && (pos === 0 || template[pos - 1] === "\n")) {
        flush();
        const end = template.indexOf("\n", pos);
        const stop = end === -1 ? template.length : end;
        nodes.push({ type: "comment", text: template.slice(pos, stop).replace(/\r$/, "") });
        pos = template[stop - 1] === "\r" ? stop - 1 : stop;
        continue;
      }

      // Handle escapes
      if (ch === "\\" && pos + 1 < template.length) {
        const next = template[pos + 1];
        if (ESCAPABLE.includes(next)) {
          literal += next;
          pos += 2;
          continue;
        }
      }

      // End of the enclosing optional; the caller consumes ']'
      if (ch === "]") {
        if (depth === 0) {
          throw new TemplateSyntaxError("Unbalanced ']'", pos);
        }
        flush();
        return nodes;
      }

      if (ch === "[") {
        flush();
        const start = pos;
        pos++; // consume '['
        const children = parseSequence(depth + 1);
        if (pos >= template.length) {
          throw new TemplateSyntaxError("Unterminated optional group", start);
        }
        pos++; // consume ']'
        nodes.push({ type: "optional", children });
      } else if (ch === "<") {
        flush();
        nodes.push(parsePlaceholder());
      } else {
        literal += ch;
        pos++;
      }
    }

    flush();
    return nodes;
  }

  function parsePlaceholder(): PlaceholderNode {
    const start = pos;
    pos++; // consume '<'

    const spelling = parseName("placeholder name");
    const placeholder: PlaceholderNode = {
      type: "placeholder",
      name: spelling.toLowerCase(),
      repeatable: false,
      codecs: [],
      position: start,
    };
    if (spelling !== placeholder.name) {
      placeholder.spelling = spelling;
    }

    if (template.startsWith("...", pos)) {
      placeholder.repeatable = true;
      pos += 3;
      if (template[pos] === ".") {
        throw new TemplateSyntaxError("Repeatable marker must be exactly '...'", pos);
      }
    } else if (template[pos] === ".") {
      throw new TemplateSyntaxError("Repeatable marker must be exactly '...'", pos);
    }

    while (true) {
      if (pos >= template.length) {
        throw new TemplateSyntaxError("Unterminated placeholder", start);
      }

      const ch = template[pos];

      if (ch === ">") {
        pos++;
        return placeholder;
      }

      if (ch === "=") {
        if (placeholder.default !== undefined) {
          throw new TemplateSyntaxError("Placeholder has more than one default", pos);
        }
        pos++;
        placeholder.default = parseQuoted("default value");
      } else if (ch === "|") {
        pos++;
        const call: CodecCall = { name: parseName("codec name") };
        if (template[pos] === ":") {
          pos++;
          call.argument = parseQuoted("codec argument");
          if (template[pos] === ":") {
            throw new TemplateSyntaxError(
              `Codec '${call.name}' takes at most one argument`,
              pos
            );
          }
        }
        placeholder.codecs.push(call);
      } else if (ch === "<" || ch === "[" || ch === "]") {
        throw new TemplateSyntaxError("Unterminated placeholder", start);
      } else {
        throw new TemplateSyntaxError(`Unexpected '${ch}' in placeholder`, pos);
      }
    }
  }

  function parseName(what: string): string {
    const start = pos;
    if (pos >= template.length || !NAME_START.test(template[pos])) {
      throw new TemplateSyntaxError(`Expected ${what}`, pos);
    }
    while (pos < template.length && NAME_CHAR.test(template[pos])) {
      pos++;
    }
    return template.slice(start, pos);
  }

  function parseQuoted(what: string): string {
    const quote = template[pos];
    if (pos >= template.length || !QUOTES.includes(quote)) {
      throw new TemplateSyntaxError(`Expected quoted ${what}`, pos);
    }
    const end = template.indexOf(quote, pos + 1);
    if (end === -1) {
      throw new TemplateSyntaxError(`Unterminated quoted ${what}`, pos);
    }
    const value = template.slice(pos + 1, end);
    pos = end + 1;
    return value;
  }

  return parseSequence(0);
}

// =============================================================================
// Serialization
// =============================================================================

function quote(value: string): string {
  return value.includes("'") ? `"${value}"` : `'${value}'`;
}

function escapeLiteral(text: string): string {
  return text.replace(/[<[\]]/g, (ch) => `\\${ch}`);
}

/**
 * Turn an AST back into format-string syntax.
 * Defaults are written before the codec chain.
 */
export function serializeTemplate(nodes: TemplateNode[]): string {
  return nodes
    .map((node) => {
      switch (node.type) {
        case "literal":
          return escapeLiteral(node.text);
        case "comment":
          return node.text;
        case "optional":
          return `[${serializeTemplate(node.children)}]`;
        case "placeholder":
          return serializePlaceholder(node);
      }
    })
    .join("");
}

export function serializePlaceholder(placeholder: PlaceholderNode): string {
  let result = `<${placeholder.spelling ?? placeholder.name}`;
  if (placeholder.repeatable) {
    result += "...";
  }
  if (placeholder.default !== undefined) {
    result += `=${quote(placeholder.default)}`;
  }
  for (const codec of placeholder.codecs) {
    result += `|${codec.name}`;
    if (codec.argument !== undefined) {
      result += `:${quote(codec.argument)}`;
    }
  }
  return `${result}>`;
}

// =============================================================================
// Queries
// =============================================================================

export interface PlaceholderOccurrence {
  placeholder: PlaceholderNode;
  /** True when the placeholder sits inside at least one optional group. */
  optional: boolean;
}

/**
 * All placeholder occurrences in template order, nested optionals included.
 */
export function collectPlaceholders(
  nodes: TemplateNode[],
  optional: boolean = false
): PlaceholderOccurrence[] {
  const result: PlaceholderOccurrence[] = [];

  for (const node of nodes) {
    if (node.type === "placeholder") {
      result.push({ placeholder: node, optional });
    } else if (node.type === "optional") {
      result.push(...collectPlaceholders(node.children, true));
    }
  }

  return result;
}

/**
 * Placeholder names in order of first occurrence.
 */
export function placeholderNames(nodes: TemplateNode[]): string[] {
  const names = new Set<string>();
  for (const { placeholder } of collectPlaceholders(nodes)) {
    names.add(placeholder.name);
  }
  return [...names];
}
