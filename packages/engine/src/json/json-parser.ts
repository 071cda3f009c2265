import { JsonSyntaxError } from "./errors.js";
import { Json, type JsonValue } from "./json-value.js";

const INTEGER = /^-?\d+$/;
const FLOAT = /^-?(?:\d+\.\d*|\.\d+)$/;

function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\r" || char === "\n";
}

function isValueTerminator(char: string): boolean {
  return char === "," || char === "]" || char === "}" || isWhitespace(char);
}

/**
 * Recursive-descent scanner over one immutable input string.
 *
 * The grammar is deliberately lenient in two places: commas between entries
 * are optional, and string escapes are only honoured for finding the closing
 * quote (the raw text between the quotes is kept as-is).
 */
class JsonScanner {
  private cursor = 0;

  constructor(private readonly text: string) {}

  parseDocument(): JsonValue {
    this.skipWhitespace();
    const char = this.peek();
    if (char === "{") return this.parseObject();
    if (char === "[") return this.parseArray();
    if (char === undefined) {
      throw new JsonSyntaxError("Unexpected end of input", this.cursor);
    }
    throw new JsonSyntaxError(
      `Expected '{' or '[' but found '${char}'`,
      this.cursor,
    );
  }

  private parseValue(): JsonValue {
    const char = this.peek();
    if (char === undefined) {
      throw new JsonSyntaxError("Unexpected end of input", this.cursor);
    }
    if (char === "{") return this.parseObject();
    if (char === "[") return this.parseArray();
    if (char === '"') return Json.string(this.scanString());
    return this.parseLiteral();
  }

  private parseObject(): JsonValue {
    const start = this.cursor;
    this.cursor++; // {
    const entries = new Map<string, JsonValue>();

    while (true) {
      this.skipWhitespace();
      const char = this.peek();
      if (char === undefined) {
        throw new JsonSyntaxError("Unterminated object", start);
      }
      if (char === "}") {
        this.cursor++;
        return Json.object(entries);
      }
      if (char !== '"') {
        throw new JsonSyntaxError(
          `Expected a quoted key but found '${char}'`,
          this.cursor,
        );
      }

      const key = this.scanString();
      this.skipKeySeparator();
      entries.set(key, this.parseValue());
      this.skipEntrySeparator();
    }
  }

  private parseArray(): JsonValue {
    const start = this.cursor;
    this.cursor++; // [
    const items: JsonValue[] = [];

    while (true) {
      this.skipWhitespace();
      const char = this.peek();
      if (char === undefined) {
        throw new JsonSyntaxError("Unterminated array", start);
      }
      if (char === "]") {
        this.cursor++;
        return Json.array(items);
      }

      items.push(this.parseValue());
      this.skipEntrySeparator();
    }
  }

  /** Returns the raw text between the quotes and leaves the cursor after the closing one. */
  private scanString(): string {
    const start = this.cursor;
    let escaped = false;
    let index = start + 1;

    while (index < this.text.length) {
      const char = this.text[index];
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        this.cursor = index + 1;
        return this.text.slice(start + 1, index);
      }
      index++;
    }

    throw new JsonSyntaxError("Unterminated string", start);
  }

  private parseLiteral(): JsonValue {
    const start = this.cursor;
    while (this.cursor < this.text.length) {
      if (isValueTerminator(this.text[this.cursor])) break;
      this.cursor++;
    }

    const span = this.text.slice(start, this.cursor);
    if (span === "true") return Json.bool(true);
    if (span === "false") return Json.bool(false);
    if (span === "null") return Json.null();

    if (span.includes(".")) {
      if (FLOAT.test(span)) return Json.float(Number.parseFloat(span));
    } else if (INTEGER.test(span)) {
      const value = Number.parseInt(span, 10);
      if (Number.isSafeInteger(value)) return Json.int(value);
      throw new JsonSyntaxError(`Integer out of range '${span}'`, start);
    }

    throw new JsonSyntaxError(`Unexpected token '${span}'`, start);
  }

  private skipKeySeparator(): void {
    while (this.cursor < this.text.length) {
      const char = this.text[this.cursor];
      if (char !== ":" && !isWhitespace(char)) return;
      this.cursor++;
    }
  }

  private skipEntrySeparator(): void {
    this.skipWhitespace();
    if (this.peek() === ",") {
      this.cursor++;
    }
  }

  private skipWhitespace(): void {
    while (
      this.cursor < this.text.length &&
      isWhitespace(this.text[this.cursor])
    ) {
      this.cursor++;
    }
  }

  private peek(): string | undefined {
    return this.cursor < this.text.length ? this.text[this.cursor] : undefined;
  }
}

/**
 * Parse JSON text whose top level is an object or an array.
 *
 * Escape sequences inside strings are not decoded, and a missing comma
 * between entries is accepted. Text after the top-level value is ignored.
 *
 * @throws JsonSyntaxError
 */
export function parseJson(text: string): JsonValue {
  return new JsonScanner(text).parseDocument();
}
