import { decodeStrict, decodeToString, findSequence } from "../utils/buffer.js";
import type { RequestHeader } from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const SPACE = 0x20;
const COLON = 0x3a;

export class IncompleteRequestDataError extends Error {
  readonly code = "INCOMPLETE_REQUEST_DATA";

  constructor(message: string) {
    super(message);
    this.name = "IncompleteRequestDataError";
  }
}

export interface ParsedHttpRequest {
  header: RequestHeader;
  body: string;
}

function isLineBreak(byte: number): boolean {
  return byte === CR || byte === LF;
}

function isInlineSpace(byte: number): boolean {
  return byte === SPACE || byte === TAB;
}

/**
 * Forward-only cursor over the head of a request (everything before the
 * blank line). Slices always end on ASCII bytes, so each decoded piece is
 * valid UTF-8 on its own.
 */
class RequestHeadScanner {
  private cursor = 0;

  constructor(private readonly bytes: Uint8Array) {}

  readRequestLine(): string[] {
    while (this.cursor < this.bytes.length && isLineBreak(this.current())) {
      this.cursor++;
    }
    const line = this.takeWhile((byte) => !isLineBreak(byte));
    return line.split(" ").filter((token) => token.length > 0);
  }

  /** Skip spaces and line breaks; false once the head is exhausted. */
  skipBlank(): boolean {
    while (
      this.cursor < this.bytes.length &&
      (isLineBreak(this.current()) || isInlineSpace(this.current()))
    ) {
      this.cursor++;
    }
    return this.cursor < this.bytes.length;
  }

  readFieldName(): string {
    const name = this.takeWhile(
      (byte) => byte !== COLON && !isInlineSpace(byte) && !isLineBreak(byte),
    );
    this.takeWhile(isInlineSpace);
    if (this.cursor < this.bytes.length && this.current() === COLON) {
      this.cursor++;
    }
    return name;
  }

  readFieldValue(): string {
    this.takeWhile(isInlineSpace);
    return this.takeWhile((byte) => !isLineBreak(byte));
  }

  private current(): number {
    return this.bytes[this.cursor];
  }

  private takeWhile(predicate: (byte: number) => boolean): string {
    const start = this.cursor;
    while (this.cursor < this.bytes.length && predicate(this.current())) {
      this.cursor++;
    }
    return decodeToString(this.bytes.subarray(start, this.cursor));
  }
}

/**
 * Parse one complete request held in a single buffer.
 *
 * The head ends at the first CR LF CR LF; whatever follows is the body. A
 * buffer with no terminator is treated as head only, with an empty body.
 * Header names keep the case they were sent with.
 *
 * @throws IncompleteRequestDataError when the bytes are not valid UTF-8
 */
export function parseHttpRequest(data: Uint8Array): ParsedHttpRequest {
  if (decodeStrict(data) === null) {
    throw new IncompleteRequestDataError(
      "Request data could not be decoded as UTF-8 text",
    );
  }

  const separatorIndex = findSequence(data, CRLF_CRLF);
  const headEnd = separatorIndex === -1 ? data.length : separatorIndex;
  const body =
    separatorIndex === -1
      ? ""
      : decodeToString(data.subarray(separatorIndex + CRLF_CRLF.length));

  const scanner = new RequestHeadScanner(data.subarray(0, headEnd));
  const [method = "", path = "", version = ""] = scanner.readRequestLine();

  const fields = new Map<string, string>();
  while (scanner.skipBlank()) {
    const name = scanner.readFieldName();
    const value = scanner.readFieldValue();
    if (name.length > 0) {
      fields.set(name, value);
    }
  }

  return { header: { method, path, version, fields }, body };
}
