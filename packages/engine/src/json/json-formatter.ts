import { UnsupportedTypeError } from "./errors.js";
import { type JsonValue, toJsonValue } from "./json-value.js";

const EXPONENT_FORM = /^(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Positional notation for a finite float, always with a decimal point so the
 * value parses back as a float. The parser reads no exponents.
 */
function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw new UnsupportedTypeError(`Cannot format non-finite float ${value}`);
  }
  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  const text = String(Math.abs(value));

  const exponential = EXPONENT_FORM.exec(text);
  if (!exponential) {
    return text.includes(".") ? `${sign}${text}` : `${sign}${text}.0`;
  }

  const [, lead, fraction = "", exponent] = exponential;
  const digits = lead + fraction;
  // position of the decimal point within `digits`
  const point = 1 + Number.parseInt(exponent, 10);

  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${"0".repeat(point - digits.length)}.0`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function formatInt(value: number): string {
  if (!Number.isSafeInteger(value)) {
    throw new UnsupportedTypeError(`Cannot format ${value} as an integer`);
  }
  return String(value);
}

/**
 * Serialize a JsonValue with no inserted whitespace. Strings are emitted
 * between quotes without escaping, mirroring what parseJson accepts.
 *
 * @throws UnsupportedTypeError for values outside the seven JSON variants
 */
export function formatJson(value: JsonValue): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
      return formatInt(value.value);
    case "float":
      return formatFloat(value.value);
    case "string":
      return `"${value.value}"`;
    case "array":
      return `[${value.items.map(formatJson).join(",")}]`;
    case "object": {
      const parts: string[] = [];
      for (const [key, item] of value.entries) {
        parts.push(`"${key}":${formatJson(item)}`);
      }
      return `{${parts.join(",")}}`;
    }
    default:
      return unsupported(value);
  }
}

function unsupported(value: never): never {
  const raw: unknown = value;
  const kind =
    typeof raw === "object" && raw !== null && "kind" in raw
      ? raw.kind
      : typeof raw;
  throw new UnsupportedTypeError(`Unsupported JSON value kind: ${String(kind)}`);
}

/** Format plain JavaScript data as JSON text. */
export function stringify(input: unknown): string {
  return formatJson(toJsonValue(input));
}
