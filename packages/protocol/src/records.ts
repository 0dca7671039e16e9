/**
 * Validation of records received as untrusted JSON.
 *
 * Parsers check shape and encodings only (hex, nonce/tag/hash lengths,
 * algorithm suite). They never decrypt and never check signatures; that is
 * what unprotect and verify are for.
 */

import {
  ALGORITHM_SUITE,
  type AnyProtectedTransaction,
  type KeyWraps,
  type LayeredProtectedTransaction,
  type PartyKeys,
  type ProtectedTransaction,
  type SectionEnvelope,
  type ShareRecord,
  type WrappedKeyEntry,
} from "./types.js";
import { HASH_BYTES, NONCE_BYTES, TAG_BYTES } from "./primitives.js";
import { X25519_PUBLIC_KEY_BYTES } from "./keys.js";
import { StructuralError } from "./errors.js";
import { isPlainObject, validateHex } from "./utils.js";

type Fields = Record<string, unknown>;

function requireObject(value: unknown, label: string): Fields {
  if (!isPlainObject(value)) {
    throw new StructuralError(`${label}: expected an object`);
  }
  return value;
}

function requireString(fields: Fields, key: string, label: string): string {
  const value = fields[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new StructuralError(`${label}.${key}: expected a non-empty string`);
  }
  return value;
}

function requireHex(fields: Fields, key: string, label: string, expectedBytes?: number): string {
  const value = requireString(fields, key, label);
  validateHex(value, `${label}.${key}`, expectedBytes);
  return value;
}

function optionalHex(fields: Fields, key: string, label: string): string | undefined {
  // Stored records may carry an explicit null for a missing signature
  const value = fields[key];
  return value === undefined || value === null ? undefined : requireHex(fields, key, label);
}

function requireTimestamp(fields: Fields, key: string, label: string): string {
  const value = requireString(fields, key, label);
  if (Number.isNaN(Date.parse(value))) {
    throw new StructuralError(`${label}.${key}: expected an ISO-8601 timestamp`);
  }
  return value;
}

function requireVersion(fields: Fields, label: string): 1 {
  if (fields.version !== 1) {
    throw new StructuralError(`${label}.version: unsupported version ${String(fields.version)}`);
  }
  return 1;
}

function requireSuite(fields: Fields, label: string): typeof ALGORITHM_SUITE {
  const meta = requireObject(fields.meta, `${label}.meta`);
  for (const [key, expected] of Object.entries(ALGORITHM_SUITE)) {
    if (meta[key] !== expected) {
      throw new StructuralError(`${label}.meta.${key}: expected "${expected}"`);
    }
  }
  return ALGORITHM_SUITE;
}

function parseWrappedKey(value: unknown, label: string): WrappedKeyEntry {
  const fields = requireObject(value, label);
  return {
    recipient_id: requireString(fields, "recipient_id", label),
    wrapped_key: requireHex(fields, "wrapped_key", label),
    nonce: requireHex(fields, "nonce", label, NONCE_BYTES),
    tag: requireHex(fields, "tag", label, TAG_BYTES),
    sender_ephemeral_public_key: requireHex(
      fields,
      "sender_ephemeral_public_key",
      label,
      X25519_PUBLIC_KEY_BYTES
    ),
  };
}

function parseKeyWraps(value: unknown, label: string): KeyWraps {
  const fields = requireObject(value, label);
  const entries = Object.entries(fields);
  if (entries.length === 0) {
    throw new StructuralError(`${label}: expected at least one entry`);
  }

  return Object.fromEntries(
    entries.map(([partyId, entry]): [string, WrappedKeyEntry] => {
      const wrap = parseWrappedKey(entry, `${label}.${partyId}`);
      if (wrap.recipient_id !== partyId) {
        throw new StructuralError(`${label}.${partyId}: recipient_id does not match its key`);
      }
      return [partyId, wrap];
    })
  );
}

function parseParties(fields: Fields, label: string): { seller_id: string; buyer_id: string } {
  const seller_id = requireString(fields, "seller_id", label);
  const buyer_id = requireString(fields, "buyer_id", label);
  if (seller_id === buyer_id) {
    throw new StructuralError(`${label}: seller_id and buyer_id must differ`);
  }
  return { seller_id, buyer_id };
}

/** True when a parsed JSON value looks like a layered record rather than a whole-document one. */
export function isLayeredTransaction(value: unknown): boolean {
  return isPlainObject(value) && value.sections !== undefined && value.ciphertext === undefined;
}

/**
 * @throws StructuralError if any field is missing, of the wrong type or badly encoded
 */
export function parseProtectedTransaction(value: unknown): ProtectedTransaction {
  const label = "transaction";
  const fields = requireObject(value, label);

  const record: ProtectedTransaction = {
    version: requireVersion(fields, label),
    doc_id: requireString(fields, "doc_id", label),
    ...parseParties(fields, label),
    ciphertext: requireHex(fields, "ciphertext", label),
    nonce: requireHex(fields, "nonce", label, NONCE_BYTES),
    auth_tag: requireHex(fields, "auth_tag", label, TAG_BYTES),
    key_wraps: parseKeyWraps(fields.key_wraps, `${label}.key_wraps`),
    content_hash: requireHex(fields, "content_hash", label, HASH_BYTES),
    sig_seller: requireHex(fields, "sig_seller", label),
    created_at: requireTimestamp(fields, "created_at", label),
    meta: requireSuite(fields, label),
  };
  const sigBuyer = optionalHex(fields, "sig_buyer", label);
  return sigBuyer === undefined ? record : { ...record, sig_buyer: sigBuyer };
}

function parseSection(value: unknown, label: string): SectionEnvelope {
  const fields = requireObject(value, label);
  return {
    ciphertext: requireHex(fields, "ciphertext", label),
    nonce: requireHex(fields, "nonce", label, NONCE_BYTES),
    auth_tag: requireHex(fields, "auth_tag", label, TAG_BYTES),
    content_hash: requireHex(fields, "content_hash", label, HASH_BYTES),
    key_wraps: parseKeyWraps(fields.key_wraps, `${label}.key_wraps`),
  };
}

/**
 * @throws StructuralError if any field or section is missing, of the wrong type or badly encoded
 */
export function parseLayeredTransaction(value: unknown): LayeredProtectedTransaction {
  const label = "transaction";
  const fields = requireObject(value, label);

  const sectionFields = requireObject(fields.sections, `${label}.sections`);
  const names = Object.keys(sectionFields);
  if (names.length === 0) {
    throw new StructuralError(`${label}.sections: expected at least one section`);
  }

  const record: LayeredProtectedTransaction = {
    version: requireVersion(fields, label),
    doc_id: requireString(fields, "doc_id", label),
    ...parseParties(fields, label),
    sections: Object.fromEntries(
      names.map((name): [string, SectionEnvelope] => [
        name,
        parseSection(sectionFields[name], `${label}.sections.${name}`),
      ])
    ),
    aggregate_hash: requireHex(fields, "aggregate_hash", label, HASH_BYTES),
    sig_seller: requireHex(fields, "sig_seller", label),
    created_at: requireTimestamp(fields, "created_at", label),
    meta: requireSuite(fields, label),
  };
  const sigBuyer = optionalHex(fields, "sig_buyer", label);
  return sigBuyer === undefined ? record : { ...record, sig_buyer: sigBuyer };
}

/** Dispatch on shape to the matching parser. */
export function parseAnyTransaction(value: unknown): AnyProtectedTransaction {
  return isLayeredTransaction(value) ? parseLayeredTransaction(value) : parseProtectedTransaction(value);
}

/**
 * @throws StructuralError if any field is missing, of the wrong type or badly encoded
 */
export function parseShareRecord(value: unknown): ShareRecord {
  const label = "share";
  const fields = requireObject(value, label);

  const section = fields.section;
  if (section !== undefined && section !== null && (typeof section !== "string" || !section)) {
    throw new StructuralError(`${label}.section: expected a non-empty string`);
  }

  return {
    share_id: requireString(fields, "share_id", label),
    doc_id: requireString(fields, "doc_id", label),
    ...(typeof section === "string" ? { section } : {}),
    from_id: requireString(fields, "from_id", label),
    to_id: requireString(fields, "to_id", label),
    wrapped_key: parseWrappedKey(fields.wrapped_key, `${label}.wrapped_key`),
    bound_hash: requireHex(fields, "bound_hash", label, HASH_BYTES),
    timestamp: requireTimestamp(fields, "timestamp", label),
    signature: requireHex(fields, "signature", label),
  };
}

/** Shape only; key material is checked by validatePartyKeys. */
export function parsePartyKeys(value: unknown): PartyKeys {
  const label = "party";
  const fields = requireObject(value, label);
  return {
    id: requireString(fields, "id", label),
    signing_public_key: requireString(fields, "signing_public_key", label),
    encryption_public_key: requireString(fields, "encryption_public_key", label),
  };
}
