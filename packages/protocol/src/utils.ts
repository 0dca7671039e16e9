/**
 * Hex encoding helpers and input validation.
 * Every binary value in a protected record is a lowercase hex string so the
 * record travels as plain JSON.
 */
import { Buffer } from "node:buffer";
import { StructuralError } from "./errors.js";

/**
 * Validates that a value is a hex string and optionally checks its byte length.
 * @throws StructuralError if the value is not valid hex or has the wrong length.
 */
export function validateHex(value: unknown, label: string, expectedBytes?: number): Buffer {
  // Hex strings must have even length and contain only hex characters
  if (typeof value !== "string" || !/^[0-9a-f]*$/i.test(value) || value.length % 2 !== 0) {
    throw new StructuralError(`${label}: invalid hex encoding`);
  }

  const buf = Buffer.from(value, "hex");

  if (expectedBytes !== undefined && buf.length !== expectedBytes) {
    throw new StructuralError(
      `${label}: expected ${expectedBytes} bytes, got ${buf.length} bytes`
    );
  }

  return buf;
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Own-property lookup that ignores anything inherited from Object.prototype. */
export function ownEntry<T>(map: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}
