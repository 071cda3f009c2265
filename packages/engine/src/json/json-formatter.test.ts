import { describe, expect, it } from "vitest";
import { UnsupportedTypeError } from "./errors.js";
import { formatJson, stringify } from "./json-formatter.js";
import { parseJson } from "./json-parser.js";
import { fromJsonValue, Json, type JsonValue, toJsonValue } from "./json-value.js";

describe("formatJson", () => {
  it("formats nested values without whitespace", () => {
    const value = Json.object([
      ["a", Json.int(1)],
      ["b", Json.array([Json.int(1), Json.int(2), Json.int(3)])],
      ["c", Json.object([["d", Json.bool(true)]])],
    ]);

    expect(formatJson(value)).toBe('{"a":1,"b":[1,2,3],"c":{"d":true}}');
  });

  it("formats scalars and empty structures", () => {
    expect(
      formatJson(
        Json.array([
          Json.null(),
          Json.bool(false),
          Json.int(-7),
          Json.array([]),
          Json.object([]),
        ]),
      ),
    ).toBe("[null,false,-7,[],{}]");
  });

  it("keeps a decimal point on integral floats", () => {
    expect(formatJson(Json.array([Json.float(2), Json.float(1.25)]))).toBe(
      "[2.0,1.25]",
    );
  });

  it("writes large and tiny floats in positional notation", () => {
    expect(formatJson(Json.array([Json.float(1e21)]))).toBe(
      "[1000000000000000000000.0]",
    );
    expect(formatJson(Json.array([Json.float(1.5e22)]))).toBe(
      "[15000000000000000000000.0]",
    );
    expect(formatJson(Json.array([Json.float(1e-7)]))).toBe("[0.0000001]");
    expect(formatJson(Json.array([Json.float(-2.5e-8)]))).toBe(
      "[-0.000000025]",
    );
    expect(formatJson(Json.array([Json.float(5e-324)]))).toBe(
      `[0.${"0".repeat(323)}5]`,
    );
  });

  it("keeps the sign of negative zero", () => {
    expect(formatJson(Json.array([Json.float(-0)]))).toBe("[-0.0]");
  });

  it("writes converted plain numbers the parser can read back", () => {
    const text = stringify({ tiny: 0.0000001, huge: 1e21 });
    expect(text).toBe('{"tiny":0.0000001,"huge":1000000000000000000000.0}');
    expect(parseJson(text)).toEqual(
      Json.object([
        ["tiny", Json.float(1e-7)],
        ["huge", Json.float(1e21)],
      ]),
    );
  });

  it("does not escape embedded quotes", () => {
    expect(formatJson(Json.array([Json.string('say "hi"')]))).toBe(
      '["say "hi""]',
    );
  });

  it("emits object keys in insertion order", () => {
    const value = Json.object({ zeta: Json.int(1), alpha: Json.int(2) });
    expect(formatJson(value)).toBe('{"zeta":1,"alpha":2}');
  });

  it("rejects values outside the known variants", () => {
    const bogus: JsonValue = JSON.parse('{"kind":"date"}');
    expect(() => formatJson(bogus)).toThrow(UnsupportedTypeError);
    expect(() => formatJson(bogus)).toThrow(
      "Unsupported JSON value kind: date",
    );
  });

  it("rejects ints that are not integers and non-finite floats", () => {
    expect(() => formatJson(Json.array([Json.int(1.5)]))).toThrow(
      "Cannot format 1.5 as an integer",
    );
    expect(() => formatJson(Json.array([Json.float(Number.NaN)]))).toThrow(
      UnsupportedTypeError,
    );
  });

  it("round-trips canonical values through parseJson", () => {
    const samples: JsonValue[] = [
      Json.object([
        ["id", Json.int(123)],
        ["enabled", Json.bool(true)],
        ["disabled", Json.bool(false)],
        ["ratio", Json.float(1.34)],
        ["whole", Json.float(4)],
        ["name", Json.string("classes of 2024")],
        ["nothing", Json.null()],
        ["friends", Json.array([Json.int(1), Json.int(2), Json.int(-3)])],
      ]),
      Json.array([
        Json.object([["nested", Json.object([["deep", Json.array([])]])]]),
        Json.string(""),
      ]),
    ];

    for (const sample of samples) {
      expect(parseJson(formatJson(sample))).toEqual(sample);
    }
  });

  it("round-trips floats at the edges of the number range", () => {
    const floats = [1e21, 1.5e22, 1e-7, -2.5e-8, 5e-324, Number.MAX_VALUE, 0.1];
    const parsed = parseJson(formatJson(Json.array(floats.map(Json.float))));

    expect(parsed).toEqual(Json.array(floats.map(Json.float)));
  });

  it("round-trips negative zero", () => {
    const parsed = parseJson(formatJson(Json.array([Json.float(-0)])));

    expect(parsed.kind).toBe("array");
    if (parsed.kind !== "array") return;
    const [item] = parsed.items;
    expect(item.kind).toBe("float");
    expect(item.kind === "float" && Object.is(item.value, -0)).toBe(true);
  });
});

describe("toJsonValue / stringify", () => {
  it("converts plain data", () => {
    expect(
      stringify({
        id: 123,
        enabled: true,
        friends: [1, 2, 3, 4],
        ratio: 1.34,
        name: "x",
        none: null,
      }),
    ).toBe(
      '{"id":123,"enabled":true,"friends":[1,2,3,4],"ratio":1.34,"name":"x","none":null}',
    );
  });

  it("converts maps with string keys", () => {
    expect(toJsonValue(new Map([["a", 1]]))).toEqual(
      Json.object([["a", Json.int(1)]]),
    );
  });

  it("rejects values JSON cannot hold", () => {
    expect(() => toJsonValue(undefined)).toThrow(
      "Unsupported type in JSON conversion: undefined",
    );
    expect(() => toJsonValue(() => 1)).toThrow(UnsupportedTypeError);
    expect(() => toJsonValue(new Date(0))).toThrow(
      "Unsupported type in JSON conversion: Date",
    );
    expect(() => toJsonValue(new Map([[1, "a"]]))).toThrow(
      "Unsupported map key type in JSON conversion: number",
    );
    expect(() => toJsonValue(Number.POSITIVE_INFINITY)).toThrow(
      "Cannot represent Infinity in JSON",
    );
  });

  it("converts back to plain data", () => {
    expect(
      fromJsonValue(parseJson('{"a":[1,2.5,"x",null,false],"b":{}}')),
    ).toEqual({ a: [1, 2.5, "x", null, false], b: {} });
  });

  it("keeps a __proto__ key as an own entry", () => {
    const plain = fromJsonValue(parseJson('{"__proto__":{"x":1},"y":2}'));

    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
    expect(Object.entries(Object(plain))).toEqual([
      ["__proto__", { x: 1 }],
      ["y", 2],
    ]);
  });
});
