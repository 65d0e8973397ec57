/**
 * GVariant text-format reader, for the replies `gdbus call` prints.
 *
 * Covers what D-Bus replies actually contain: tuples, arrays, dictionaries,
 * variants, strings, byte strings, numbers with or without type keywords,
 * booleans, maybe values and `@type` annotations. Tuples and arrays both
 * come back as JS arrays, dictionaries as Maps, variants unwrapped.
 */

export type GVariantKey = string | number | bigint | boolean;

export type GVariant =
  | string
  | number
  | bigint
  | boolean
  | null
  | GVariant[]
  | Map<GVariantKey, GVariant>;

export class GVariantSyntaxError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = "GVariantSyntaxError";
    this.offset = offset;
  }
}

const MAX_DEPTH = 128;

const TYPE_KEYWORDS = new Set([
  "boolean",
  "byte",
  "int16",
  "uint16",
  "int32",
  "uint32",
  "handle",
  "int64",
  "uint64",
  "double",
  "string",
  "objectpath",
  "signature",
]);

const SIMPLE_ESCAPES: Record<string, string> = {
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

class Reader {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseDocument(): GVariant {
    const value = this.parseValue(0);
    this.skipSpace();
    if (this.pos < this.text.length) {
      throw new GVariantSyntaxError("Unexpected trailing input", this.pos);
    }
    return value;
  }

  private parseValue(depth: number): GVariant {
    if (depth > MAX_DEPTH) {
      throw new GVariantSyntaxError("Nesting too deep", this.pos);
    }
    this.skipSpace();
    const ch = this.peek();
    if (ch === undefined) {
      throw new GVariantSyntaxError("Unexpected end of input", this.pos);
    }

    switch (ch) {
      case "(":
        return this.parseSequence("(", ")", depth);
      case "[":
        return this.parseSequence("[", "]", depth);
      case "{":
        return this.parseDict(depth);
      case "<": {
        this.pos++;
        const inner = this.parseValue(depth + 1);
        this.expect(">");
        return inner;
      }
      case "'":
      case '"':
        return this.parseString();
      case "@": {
        // Type annotation, e.g. "@a{sv} {}"; the type string runs to the next space.
        this.pos++;
        while (this.pos < this.text.length && !/\s/.test(this.text[this.pos])) this.pos++;
        return this.parseValue(depth + 1);
      }
    }

    if (ch === "b" && (this.peek(1) === "'" || this.peek(1) === '"')) {
      this.pos++;
      return this.parseString();
    }

    if (/[-+0-9.]/.test(ch)) {
      return this.parseNumber(null);
    }

    const word = this.readWord();
    if (word === "true") return true;
    if (word === "false") return false;
    if (word === "nothing") return null;
    if (word === "just") return this.parseValue(depth + 1);
    if (word === "inf" || word === "nan") return word === "inf" ? Infinity : NaN;
    if (TYPE_KEYWORDS.has(word)) {
      this.skipSpace();
      const next = this.peek();
      if (next === "'" || next === '"') return this.parseString();
      if (word === "boolean") return this.parseValue(depth + 1);
      return this.parseNumber(word);
    }
    throw new GVariantSyntaxError(`Unexpected token '${word || ch}'`, this.pos);
  }

  private parseSequence(open: string, close: string, depth: number): GVariant[] {
    this.expect(open);
    const items: GVariant[] = [];
    this.skipSpace();
    if (this.peek() === close) {
      this.pos++;
      return items;
    }
    for (;;) {
      items.push(this.parseValue(depth + 1));
      this.skipSpace();
      const ch = this.peek();
      if (ch === ",") {
        this.pos++;
        this.skipSpace();
        // Single-element tuples print a trailing comma: "('x',)"
        if (this.peek() === close) {
          this.pos++;
          return items;
        }
        continue;
      }
      if (ch === close) {
        this.pos++;
        return items;
      }
      throw new GVariantSyntaxError(`Expected ',' or '${close}'`, this.pos);
    }
  }

  private parseDict(depth: number): Map<GVariantKey, GVariant> {
    this.expect("{");
    const dict = new Map<GVariantKey, GVariant>();
    this.skipSpace();
    if (this.peek() === "}") {
      this.pos++;
      return dict;
    }

    const firstKey = this.parseKey(depth);
    this.skipSpace();
    if (this.peek() === ",") {
      // Lone dict entry: "{key, value}"
      this.pos++;
      dict.set(firstKey, this.parseValue(depth + 1));
      this.skipSpace();
      this.expect("}");
      return dict;
    }

    this.expect(":");
    dict.set(firstKey, this.parseValue(depth + 1));
    for (;;) {
      this.skipSpace();
      const ch = this.peek();
      if (ch === "}") {
        this.pos++;
        return dict;
      }
      this.expect(",");
      const key = this.parseKey(depth);
      this.skipSpace();
      this.expect(":");
      dict.set(key, this.parseValue(depth + 1));
    }
  }

  private parseKey(depth: number): GVariantKey {
    const start = this.pos;
    const key = this.parseValue(depth + 1);
    if (
      typeof key === "string" ||
      typeof key === "number" ||
      typeof key === "bigint" ||
      typeof key === "boolean"
    ) {
      return key;
    }
    throw new GVariantSyntaxError("Dictionary key must be a basic value", start);
  }

  private parseString(): string {
    const quote = this.peek();
    const start = this.pos;
    this.pos++;
    let out = "";
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch !== "\\") {
        out += ch;
        this.pos++;
        continue;
      }

      const esc = this.text[this.pos + 1];
      if (esc === undefined) break;
      if (esc in SIMPLE_ESCAPES) {
        out += SIMPLE_ESCAPES[esc];
        this.pos += 2;
      } else if (esc === "u" || esc === "U") {
        const width = esc === "u" ? 4 : 8;
        const hex = this.text.slice(this.pos + 2, this.pos + 2 + width);
        if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length !== width) {
          throw new GVariantSyntaxError("Invalid unicode escape", this.pos);
        }
        out += String.fromCodePoint(parseInt(hex, 16));
        this.pos += 2 + width;
      } else if (esc === "x") {
        const hex = /^[0-9a-fA-F]{1,2}/.exec(this.text.slice(this.pos + 2))?.[0] ?? "";
        if (!hex) throw new GVariantSyntaxError("Invalid hex escape", this.pos);
        out += String.fromCharCode(parseInt(hex, 16));
        this.pos += 2 + hex.length;
      } else if (/[0-7]/.test(esc)) {
        const oct = /^[0-7]{1,3}/.exec(this.text.slice(this.pos + 1))?.[0] ?? esc;
        out += String.fromCharCode(parseInt(oct, 8));
        this.pos += 1 + oct.length;
      } else {
        out += esc;
        this.pos += 2;
      }
    }
    throw new GVariantSyntaxError("Unterminated string", start);
  }

  private parseNumber(keyword: string | null): number | bigint {
    const start = this.pos;
    const match = /^[-+]?(?:0[xX][0-9a-fA-F]+|inf|nan|(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)/.exec(
      this.text.slice(this.pos),
    );
    if (!match) {
      throw new GVariantSyntaxError("Expected a number", start);
    }
    const raw = match[0];
    this.pos += raw.length;

    const unsigned = raw.replace(/^[-+]/, "");
    const negative = raw.startsWith("-");
    if (unsigned === "inf") return negative ? -Infinity : Infinity;
    if (unsigned === "nan") return NaN;

    if (/^0[xX]/.test(unsigned) || /^\d+$/.test(unsigned)) {
      if (keyword === "double") return Number(raw);
      const big = BigInt(unsigned) * (negative ? -1n : 1n);
      const asNumber = Number(big);
      return Number.isSafeInteger(asNumber) ? asNumber : big;
    }
    return Number(raw);
  }

  private readWord(): string {
    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.text.slice(this.pos));
    if (!match) return "";
    this.pos += match[0].length;
    return match[0];
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }

  private peek(offset = 0): string | undefined {
    return this.text[this.pos + offset];
  }

  private expect(ch: string): void {
    this.skipSpace();
    if (this.text[this.pos] !== ch) {
      throw new GVariantSyntaxError(`Expected '${ch}'`, this.pos);
    }
    this.pos++;
  }
}

/**
 * Parse one GVariant in text form.
 *
 * @throws {GVariantSyntaxError} On malformed input.
 */
export function parseGVariant(text: string): GVariant {
  return new Reader(text.trim()).parseDocument();
}

/** Quote a string as a GVariant text literal, for gdbus call arguments. */
export function formatGVariantString(value: string): string {
  let out = "'";
  for (const ch of value) {
    if (ch === "'" || ch === "\\") out += `\\${ch}`;
    else if (ch === "\n") out += "\\n";
    else if (ch === "\t") out += "\\t";
    else out += ch;
  }
  return `${out}'`;
}

// ---------------------------------------------------------------------------
// Narrowing helpers for property bags
// ---------------------------------------------------------------------------

export function isGVariantDict(value: GVariant | undefined): value is Map<GVariantKey, GVariant> {
  return value instanceof Map;
}

/** String property, or null when absent or not a string. */
export function dictString(dict: Map<GVariantKey, GVariant>, key: string): string | null {
  const value = dict.get(key);
  return typeof value === "string" ? value : null;
}

/** Boolean property, or false when absent or not a boolean. */
export function dictBoolean(dict: Map<GVariantKey, GVariant>, key: string): boolean {
  return dict.get(key) === true;
}
