import { createHash } from "node:crypto";
import { ValidationError } from "../errors.js";

export type HexDigest = string;

/**
 * Serializes a JSON-compatible value with object keys sorted recursively and no
 * insignificant whitespace. Array order is preserved. Object members whose value
 * is `undefined` are dropped and `undefined` array items become `null`, as
 * `JSON.stringify` does.
 */
export function canonicalize(value: unknown): string {
  return serialize(value, "$");
}

function serialize(value: unknown, path: string): string {
  if (value === null) {
    return "null";
  }

  switch (typeof value) {
    case "string":
    case "boolean":
      return JSON.stringify(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw new ValidationError("Payload is not canonicalizable", [
          `${path}: non-finite number ${String(value)}`
        ]);
      }
      return JSON.stringify(value);
    case "object":
      break;
    default:
      throw new ValidationError("Payload is not canonicalizable", [
        `${path}: unsupported ${typeof value} value`
      ]);
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown, index) =>
      item === undefined ? "null" : serialize(item, `${path}[${index}]`)
    );
    return `[${items.join(",")}]`;
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  const entries: Array<[string, unknown]> = Object.entries(value);
  const pairs = entries
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${serialize(member, `${path}.${key}`)}`);
  return `{${pairs.join(",")}}`;
}

/** SHA-256 over the UTF-8 canonical form, as 64 lowercase hex characters. */
export function digest(payload: unknown): HexDigest {
  return createHash("sha256").update(canonicalize(payload), "utf8").digest("hex");
}

export function outputHashOf(result: unknown): HexDigest {
  return digest(result);
}
