import type {
  JsonArrayNode,
  JsonMember,
  JsonNode,
  JsonNumberNode,
  JsonObjectNode,
  JsonStringNode,
} from "../model/json.js";
import type { SourceSpan } from "../model/span.js";

const enum CharCode {
  Tab = 0x09,
  LineFeed = 0x0a,
  CarriageReturn = 0x0d,
  Space = 0x20,
  DoubleQuote = 0x22,
  Plus = 0x2b,
  Comma = 0x2c,
  Minus = 0x2d,
  Dot = 0x2e,
  Slash = 0x2f,
  Zero = 0x30,
  Nine = 0x39,
  Colon = 0x3a,
  UpperE = 0x45,
  OpenBracket = 0x5b,
  Backslash = 0x5c,
  CloseBracket = 0x5d,
  LowerE = 0x65,
  OpenBrace = 0x7b,
  CloseBrace = 0x7d,
}

export interface JsonParseOptions {
  /** Maximum nesting of arrays and objects. */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 512;

/** Thrown by {@link JsonParser}; the stage wrapper turns it into a ParseError. */
export class JsonSyntaxError extends Error {
  readonly offset: number;
  readonly span: SourceSpan;

  constructor(message: string, offset: number, length = 1) {
    super(message);
    this.name = "JsonSyntaxError";
    this.offset = offset;
    this.span = { start: offset, end: offset + length };
  }
}

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

/**
 * Strict RFC 8259 recursive-descent parser producing a span-carrying tree.
 *
 * No comments, trailing commas, single quotes or leading zeros. The first
 * error throws: there is no recovery.
 */
export class JsonParser {
  private readonly text: string;
  private readonly maxDepth: number;
  private pos = 0;
  private depth = 0;

  constructor(text: string, options: JsonParseOptions = {}) {
    this.text = text;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  parse(): JsonNode {
    this.skipWhitespace();
    const node = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw this.unexpected("after the end of the document");
    }
    return node;
  }

  private parseValue(): JsonNode {
    const ch = this.text.charCodeAt(this.pos);
    switch (ch) {
      case CharCode.OpenBrace:
        return this.parseObject();
      case CharCode.OpenBracket:
        return this.parseArray();
      case CharCode.DoubleQuote:
        return this.parseString();
      case CharCode.Minus:
        return this.parseNumber();
      default:
        if (ch >= CharCode.Zero && ch <= CharCode.Nine) return this.parseNumber();
        if (this.text.startsWith("true", this.pos)) return this.keyword("true");
        if (this.text.startsWith("false", this.pos)) return this.keyword("false");
        if (this.text.startsWith("null", this.pos)) return this.keyword("null");
        throw this.unexpected("where a value was expected");
    }
  }

  private keyword(word: "true" | "false" | "null"): JsonNode {
    const start = this.pos;
    this.pos += word.length;
    const span = { start, end: this.pos };
    return word === "null" ? { kind: "null", span } : { kind: "boolean", span, value: word === "true" };
  }

  private enter(): void {
    this.depth += 1;
    if (this.depth > this.maxDepth) {
      throw new JsonSyntaxError(`Nesting exceeds the maximum depth of ${this.maxDepth}`, this.pos);
    }
  }

  private parseObject(): JsonObjectNode {
    const start = this.pos;
    this.enter();
    this.pos += 1; // {
    const members: JsonMember[] = [];
    this.skipWhitespace();
    if (this.text.charCodeAt(this.pos) === CharCode.CloseBrace) {
      this.pos += 1;
      this.depth -= 1;
      return { kind: "object", span: { start, end: this.pos }, members };
    }
    for (;;) {
      if (this.text.charCodeAt(this.pos) !== CharCode.DoubleQuote) {
        if (this.text.charCodeAt(this.pos) === CharCode.CloseBrace && members.length > 0) {
          throw new JsonSyntaxError("Trailing commas are not allowed", this.pos);
        }
        throw this.unexpected("where a property name was expected");
      }
      const key = this.parseString();
      this.skipWhitespace();
      if (this.text.charCodeAt(this.pos) !== CharCode.Colon) {
        throw this.unexpected("where ':' was expected after a property name");
      }
      this.pos += 1;
      this.skipWhitespace();
      const value = this.parseValue();
      members.push({ key: key.value, keySpan: key.span, value });
      this.skipWhitespace();
      const next = this.text.charCodeAt(this.pos);
      if (next === CharCode.Comma) {
        this.pos += 1;
        this.skipWhitespace();
        continue;
      }
      if (next === CharCode.CloseBrace) {
        this.pos += 1;
        break;
      }
      throw this.unexpected("where ',' or '}' was expected");
    }
    this.depth -= 1;
    return { kind: "object", span: { start, end: this.pos }, members };
  }

  private parseArray(): JsonArrayNode {
    const start = this.pos;
    this.enter();
    this.pos += 1; // [
    const items: JsonNode[] = [];
    this.skipWhitespace();
    if (this.text.charCodeAt(this.pos) === CharCode.CloseBracket) {
      this.pos += 1;
      this.depth -= 1;
      return { kind: "array", span: { start, end: this.pos }, items };
    }
    for (;;) {
      if (this.text.charCodeAt(this.pos) === CharCode.CloseBracket) {
        throw new JsonSyntaxError("Trailing commas are not allowed", this.pos);
      }
      items.push(this.parseValue());
      this.skipWhitespace();
      const next = this.text.charCodeAt(this.pos);
      if (next === CharCode.Comma) {
        this.pos += 1;
        this.skipWhitespace();
        continue;
      }
      if (next === CharCode.CloseBracket) {
        this.pos += 1;
        break;
      }
      throw this.unexpected("where ',' or ']' was expected");
    }
    this.depth -= 1;
    return { kind: "array", span: { start, end: this.pos }, items };
  }

  private parseString(): JsonStringNode {
    const start = this.pos;
    this.pos += 1; // opening quote
    let value = "";
    let chunkStart = this.pos;
    for (;;) {
      if (this.pos >= this.text.length) {
        throw new JsonSyntaxError("Unterminated string", start, this.pos - start);
      }
      const ch = this.text.charCodeAt(this.pos);
      if (ch === CharCode.DoubleQuote) {
        value += this.text.slice(chunkStart, this.pos);
        this.pos += 1;
        return { kind: "string", span: { start, end: this.pos }, value };
      }
      if (ch === CharCode.Backslash) {
        value += this.text.slice(chunkStart, this.pos);
        value += this.parseEscape();
        chunkStart = this.pos;
        continue;
      }
      if (ch < CharCode.Space) {
        const hex = ch.toString(16).toUpperCase().padStart(4, "0");
        throw new JsonSyntaxError(`Control character U+${hex} must be escaped in a string`, this.pos);
      }
      this.pos += 1;
    }
  }

  private parseEscape(): string {
    const start = this.pos;
    const marker = this.text[this.pos + 1];
    if (marker === undefined) {
      throw new JsonSyntaxError("Unterminated string", start);
    }
    if (marker === "u") {
      const hex = this.text.slice(this.pos + 2, this.pos + 6);
      if (!/^[0-9A-Fa-f]{4}$/.test(hex)) {
        throw new JsonSyntaxError("Invalid unicode escape; expected four hex digits after '\\u'", start, 2 + hex.length);
      }
      this.pos += 6;
      return String.fromCharCode(parseInt(hex, 16));
    }
    const decoded = ESCAPES[marker];
    if (decoded === undefined) {
      throw new JsonSyntaxError(`Invalid escape sequence '\\${marker}'`, start, 2);
    }
    this.pos += 2;
    return decoded;
  }

  private parseNumber(): JsonNumberNode {
    const start = this.pos;
    if (this.text.charCodeAt(this.pos) === CharCode.Minus) this.pos += 1;

    const intStart = this.pos;
    if (this.text.charCodeAt(this.pos) === CharCode.Zero) {
      this.pos += 1;
      if (this.isDigit(this.text.charCodeAt(this.pos))) {
        throw new JsonSyntaxError("Leading zeros are not allowed in numbers", intStart);
      }
    } else if (!this.consumeDigits()) {
      throw this.unexpected("where a digit was expected");
    }

    if (this.text.charCodeAt(this.pos) === CharCode.Dot) {
      this.pos += 1;
      if (!this.consumeDigits()) throw this.unexpected("where a fraction digit was expected");
    }

    const e = this.text.charCodeAt(this.pos);
    if (e === CharCode.LowerE || e === CharCode.UpperE) {
      this.pos += 1;
      const sign = this.text.charCodeAt(this.pos);
      if (sign === CharCode.Plus || sign === CharCode.Minus) this.pos += 1;
      if (!this.consumeDigits()) throw this.unexpected("where an exponent digit was expected");
    }

    const raw = this.text.slice(start, this.pos);
    return { kind: "number", span: { start, end: this.pos }, value: Number(raw), raw };
  }

  private consumeDigits(): boolean {
    const start = this.pos;
    while (this.isDigit(this.text.charCodeAt(this.pos))) this.pos += 1;
    return this.pos > start;
  }

  private isDigit(ch: number): boolean {
    return ch >= CharCode.Zero && ch <= CharCode.Nine;
  }

  private skipWhitespace(): void {
    for (;;) {
      const ch = this.text.charCodeAt(this.pos);
      if (ch === CharCode.Space || ch === CharCode.Tab || ch === CharCode.LineFeed || ch === CharCode.CarriageReturn) {
        this.pos += 1;
      } else {
        return;
      }
    }
  }

  private unexpected(context: string): JsonSyntaxError {
    if (this.pos >= this.text.length) {
      return new JsonSyntaxError("Unexpected end of input", this.text.length, 0);
    }
    const cp = this.text.codePointAt(this.pos) ?? 0;
    const char = String.fromCodePoint(cp);
    const shown = cp < CharCode.Space ? `U+${cp.toString(16).toUpperCase().padStart(4, "0")}` : `'${char}'`;
    return new JsonSyntaxError(`Unexpected ${shown} ${context}`, this.pos, char.length);
  }
}

/** Parse JSON text into a span-carrying tree. Throws {@link JsonSyntaxError}. */
export function parseJson(text: string, options?: JsonParseOptions): JsonNode {
  return new JsonParser(text, options).parse();
}
