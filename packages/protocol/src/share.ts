/**
 * Share records: signed grants of a content key from one party to another.
 *
 * The discloser signs SHA-256 of the canonical record (every field except
 * `signature`), so anyone holding the discloser's public signing key can
 * check who disclosed what to whom, and when.
 */

import { randomUUID, type KeyObject } from "node:crypto";
import type { Buffer } from "node:buffer";
import type { ShareCheck, ShareRecord, UnsignedShareRecord, WrappedKeyEntry } from "./types.js";
import { canonicalize, sha256 } from "./canonical.js";
import { sign, verifySignature } from "./primitives.js";
import { loadPublicKey, type KeyDirectory } from "./keys.js";
import { AccessDeniedError, SignatureInvalidError, StructuralError } from "./errors.js";
import { toHex, validateHex } from "./utils.js";

/** A share record offered as proof of access, with the directory to check it against. */
export interface AccessGrant {
  share: ShareRecord;
  directory: KeyDirectory;
}

/** Several share records (for example one per section) checked against one directory. */
export interface ShareGrants {
  shares: readonly ShareRecord[];
  directory: KeyDirectory;
}

/** What a share must match to open a given record for a given party. */
export interface ShareScope {
  docId: string;
  boundHash: string;
  partyId: string;
  section?: string;
}

function unsignedBody(record: ShareRecord): UnsignedShareRecord {
  const { signature: _signature, ...body } = record;
  return body;
}

export function shareRecordHash(body: UnsignedShareRecord): Buffer {
  return sha256(canonicalize(body));
}

export interface NewShareRecord {
  docId: string;
  section?: string;
  fromId: string;
  toId: string;
  wrappedKey: WrappedKeyEntry;
  boundHash: string;
}

/** Assemble and sign a share record. */
export function signShareRecord(input: NewShareRecord, signingKey: KeyObject): ShareRecord {
  const body: UnsignedShareRecord = {
    share_id: randomUUID(),
    doc_id: input.docId,
    ...(input.section !== undefined ? { section: input.section } : {}),
    from_id: input.fromId,
    to_id: input.toId,
    wrapped_key: input.wrappedKey,
    bound_hash: input.boundHash,
    timestamp: new Date().toISOString(),
  };
  return { ...body, signature: toHex(sign(signingKey, shareRecordHash(body))) };
}

/**
 * Check a share record's signature under its discloser's registered key.
 * Unknown disclosers surface the directory's NotFoundError unchanged.
 */
export function verifyShareRecord(record: ShareRecord, directory: KeyDirectory): boolean {
  const discloser = directory.getPublicKeys(record.from_id);
  const publicKey = loadPublicKey(
    discloser.signing_public_key,
    "ed25519",
    `${record.from_id} signing public key`
  );

  let signature: Buffer;
  try {
    signature = validateHex(record.signature, "share signature");
  } catch (err) {
    if (err instanceof StructuralError) {
      return false;
    }
    throw err;
  }
  return verifySignature(publicKey, shareRecordHash(unsignedBody(record)), signature);
}

/**
 * Require a share record to be a valid grant for the given scope.
 *
 * @throws AccessDeniedError when the record is addressed to another party,
 *   document, protected record or section, or its signature does not verify
 */
export function assertShareGrant(record: ShareRecord, scope: ShareScope, directory: KeyDirectory): void {
  if (record.to_id !== scope.partyId) {
    throw new AccessDeniedError(`Share ${record.share_id} is not addressed to "${scope.partyId}"`);
  }
  if (record.doc_id !== scope.docId || record.bound_hash !== scope.boundHash) {
    throw new AccessDeniedError(`Share ${record.share_id} does not grant access to this record`);
  }
  if (record.section !== scope.section) {
    throw new AccessDeniedError(
      scope.section === undefined
        ? `Share ${record.share_id} is scoped to a single section`
        : `Share ${record.share_id} does not cover section "${scope.section}"`
    );
  }
  if (record.wrapped_key.recipient_id !== record.to_id) {
    throw new AccessDeniedError(`Share ${record.share_id} carries a key wrapped for another party`);
  }
  if (!verifyShareRecord(record, directory)) {
    throw new AccessDeniedError(`Share ${record.share_id} is not validly signed by "${record.from_id}"`, {
      cause: new SignatureInvalidError("Share record signature does not verify"),
    });
  }
}

/** Audit view of a share record against the record it claims to grant. */
export function checkShare(
  record: ShareRecord,
  docId: string,
  boundHash: string,
  directory: KeyDirectory
): ShareCheck {
  return {
    shareId: record.share_id,
    fromId: record.from_id,
    toId: record.to_id,
    section: record.section ?? null,
    valid:
      record.doc_id === docId &&
      record.bound_hash === boundHash &&
      verifyShareRecord(record, directory),
  };
}
