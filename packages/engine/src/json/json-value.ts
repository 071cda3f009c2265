import { UnsupportedTypeError } from "./errors.js";

export interface JsonNull {
  readonly kind: "null";
}

export interface JsonBool {
  readonly kind: "bool";
  readonly value: boolean;
}

export interface JsonInt {
  readonly kind: "int";
  readonly value: number;
}

export interface JsonFloat {
  readonly kind: "float";
  readonly value: number;
}

export interface JsonString {
  readonly kind: "string";
  readonly value: string;
}

export interface JsonArray {
  readonly kind: "array";
  readonly items: readonly JsonValue[];
}

export interface JsonObject {
  readonly kind: "object";
  readonly entries: ReadonlyMap<string, JsonValue>;
}

export type JsonValue =
  | JsonNull
  | JsonBool
  | JsonInt
  | JsonFloat
  | JsonString
  | JsonArray
  | JsonObject;

export type JsonKind = JsonValue["kind"];

const NULL: JsonNull = Object.freeze({ kind: "null" });

/** Constructors for each JSON variant. Every value they return is frozen. */
export const Json = {
  null(): JsonNull {
    return NULL;
  },

  bool(value: boolean): JsonBool {
    return Object.freeze({ kind: "bool", value });
  },

  int(value: number): JsonInt {
    return Object.freeze({ kind: "int", value });
  },

  float(value: number): JsonFloat {
    return Object.freeze({ kind: "float", value });
  },

  string(value: string): JsonString {
    return Object.freeze({ kind: "string", value });
  },

  array(items: Iterable<JsonValue>): JsonArray {
    return Object.freeze({ kind: "array", items: Object.freeze([...items]) });
  },

  object(
    entries:
      | Iterable<readonly [string, JsonValue]>
      | Readonly<Record<string, JsonValue>>,
  ): JsonObject {
    const pairs: Iterable<readonly [string, JsonValue]> = isEntryIterable(
      entries,
    )
      ? entries
      : Object.entries(entries);
    return Object.freeze({ kind: "object", entries: new Map(pairs) });
  },
} as const;

function isEntryIterable(
  value:
    | Iterable<readonly [string, JsonValue]>
    | Readonly<Record<string, JsonValue>>,
): value is Iterable<readonly [string, JsonValue]> {
  return Symbol.iterator in value;
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert plain JavaScript data into a JsonValue. Integral numbers become
 * ints, other finite numbers floats. Maps are accepted when every key is a
 * string.
 */
export function toJsonValue(input: unknown): JsonValue {
  if (typeof input === "boolean") return Json.bool(input);
  if (typeof input === "string") return Json.string(input);
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new UnsupportedTypeError(`Cannot represent ${input} in JSON`);
    }
    return Number.isSafeInteger(input) ? Json.int(input) : Json.float(input);
  }
  if (typeof input !== "object") {
    throw new UnsupportedTypeError(
      `Unsupported type in JSON conversion: ${typeof input}`,
    );
  }
  if (input === null) return Json.null();

  if (Array.isArray(input)) {
    return Json.array(input.map((item: unknown) => toJsonValue(item)));
  }

  if (input instanceof Map) {
    const entries: Array<[string, JsonValue]> = [];
    for (const [key, value] of input) {
      if (typeof key !== "string") {
        throw new UnsupportedTypeError(
          `Unsupported map key type in JSON conversion: ${typeof key}`,
        );
      }
      entries.push([key, toJsonValue(value)]);
    }
    return Json.object(entries);
  }

  if (!isPlainObject(input)) {
    const name = input.constructor?.name ?? "unknown";
    throw new UnsupportedTypeError(
      `Unsupported type in JSON conversion: ${name}`,
    );
  }

  return Json.object(
    Object.entries(input).map(
      ([key, value]): [string, JsonValue] => [key, toJsonValue(value)],
    ),
  );
}

/** Convert a JsonValue back into plain JavaScript data. */
export function fromJsonValue(value: JsonValue): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "int":
    case "float":
    case "string":
      return value.value;
    case "array":
      return value.items.map(fromJsonValue);
    case "object":
      return Object.fromEntries(
        Array.from(
          value.entries,
          ([key, item]): [string, unknown] => [key, fromJsonValue(item)],
        ),
      );
  }
}
