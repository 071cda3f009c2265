const encoder = new TextEncoder();
const lenientDecoder = new TextDecoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true });

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode UTF-8, replacing malformed sequences with U+FFFD. */
export function decodeToString(data: Uint8Array): string {
  return lenientDecoder.decode(data);
}

/** Decode UTF-8, or return null when the bytes are not valid UTF-8. */
export function decodeStrict(data: Uint8Array): string | null {
  try {
    return strictDecoder.decode(data);
  } catch {
    return null;
  }
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

export function findSequence(buffer: Uint8Array, sequence: Uint8Array): number {
  outer: for (let i = 0; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Growable byte sequence. Capacity doubles as data is appended so that
 * collecting many small socket chunks stays linear.
 */
export class ByteBuffer {
  private data: Uint8Array;
  private used = 0;

  constructor(initial?: Uint8Array | string) {
    this.data = new Uint8Array(64);
    if (initial !== undefined) {
      this.append(initial);
    }
  }

  get length(): number {
    return this.used;
  }

  append(chunk: Uint8Array | string | number): this {
    if (typeof chunk === "number") {
      this.reserve(1);
      this.data[this.used++] = chunk & 0xff;
      return this;
    }

    const bytes = typeof chunk === "string" ? fromString(chunk) : chunk;
    this.reserve(bytes.length);
    this.data.set(bytes, this.used);
    this.used += bytes.length;
    return this;
  }

  /** A copy of the bytes written so far. */
  bytes(): Uint8Array {
    return this.data.slice(0, this.used);
  }

  toText(): string | null {
    return decodeStrict(this.data.subarray(0, this.used));
  }

  clear(): void {
    this.used = 0;
  }

  private reserve(extra: number): void {
    const needed = this.used + extra;
    if (needed <= this.data.length) return;

    let capacity = this.data.length;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.data.subarray(0, this.used));
    this.data = grown;
  }
}
