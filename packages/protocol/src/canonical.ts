/**
 * Canonical encoding and content hashing
 * ========================================
 *
 * canonicalize() turns a document into the one byte string every party will
 * re-derive before checking a hash or a signature:
 *
 *   - object keys sorted at every nesting level (UTF-16 code unit order)
 *   - no insignificant whitespace
 *   - numbers in ECMAScript shortest round-trip form, -0 written as 0,
 *     NaN and ±Infinity rejected
 *   - strings as JSON string literals, UTF-8 encoded
 *   - arrays keep their order
 *
 * Anything outside the DocumentValue union (undefined, bigint, Map, Set,
 * Date, Buffer, class instances, cycles) is a StructuralError naming the
 * JSON path of the offending value.
 */

import { createHash } from "node:crypto";
import { Buffer } from "node:buffer";
import type { Document, DocumentValue } from "./types.js";
import { StructuralError } from "./errors.js";
import { isPlainObject, toHex } from "./utils.js";

function describe(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}

function encodeScalar(value: unknown, path: string): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) {
        throw new StructuralError(`${path}: non-finite number is not representable`);
      }
      return Object.is(value, -0) ? "0" : JSON.stringify(value);
    default:
      if (value === null) {
        return "null";
      }
      throw new StructuralError(`${path}: ${typeof value} value is not representable`);
  }
}

function encodeValue(value: unknown, path: string, ancestors: Set<object>): string {
  if (typeof value !== "object" || value === null) {
    return encodeScalar(value, path);
  }

  if (ancestors.has(value)) {
    throw new StructuralError(`${path}: circular reference`);
  }
  ancestors.add(value);

  try {
    if (Array.isArray(value)) {
      const items: string[] = [];
      // Index loop rather than map(): holes in sparse arrays must be rejected, not skipped
      for (let i = 0; i < value.length; i++) {
        items.push(encodeValue(value[i], `${path}[${i}]`, ancestors));
      }
      return `[${items.join(",")}]`;
    }

    if (!isPlainObject(value)) {
      throw new StructuralError(`${path}: ${describe(value)} value is not representable`);
    }

    const record = value;
    const members = Object.keys(record)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${encodeValue(record[key], `${path}.${key}`, ancestors)}`);
    return `{${members.join(",")}}`;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Deterministic byte encoding of a document or record.
 * @throws StructuralError for any value outside the document value model.
 */
export function canonicalize(value: unknown): Buffer {
  return Buffer.from(encodeValue(value, "$", new Set()), "utf-8");
}

export function sha256(data: Uint8Array): Buffer {
  return createHash("sha256").update(data).digest();
}

/** Hex SHA-256 of the canonical encoding. */
export function contentHash(value: unknown): string {
  return toHex(sha256(canonicalize(value)));
}

/**
 * Rebuilds an untrusted value as a DocumentValue, rejecting anything the
 * canonical encoding could not represent.
 */
export function toDocumentValue(value: unknown, path = "$"): DocumentValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new StructuralError(`${path}: non-finite number is not representable`);
      }
      return value;
    case "object":
      if (value === null) {
        return null;
      }
      if (Array.isArray(value)) {
        const items: DocumentValue[] = [];
        for (let i = 0; i < value.length; i++) {
          items.push(toDocumentValue(value[i], `${path}[${i}]`));
        }
        return items;
      }
      if (isPlainObject(value)) {
        return toDocument(value, path);
      }
      throw new StructuralError(`${path}: ${describe(value)} value is not representable`);
    default:
      throw new StructuralError(`${path}: ${typeof value} value is not representable`);
  }
}

/** As toDocumentValue, but the top level must be an object. */
export function toDocument(value: unknown, path = "$"): Document {
  if (!isPlainObject(value)) {
    throw new StructuralError(`${path}: document must be an object`);
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, member]): [string, DocumentValue] => [
      key,
      toDocumentValue(member, `${path}.${key}`),
    ])
  );
}

/**
 * Decodes canonical bytes back into a document.
 * @throws StructuralError when the bytes are not a canonical JSON object.
 */
export function parseCanonical(bytes: Uint8Array): Document {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString("utf-8"));
  } catch (err) {
    throw new StructuralError("Decrypted content is not valid JSON", { cause: err });
  }

  const document = toDocument(parsed);
  if (!canonicalize(document).equals(bytes)) {
    throw new StructuralError("Decrypted content is not in canonical form");
  }
  return document;
}
