/**
 * Layered Disclosure Protocol
 * ============================
 *
 * Partitions a document into named sections, each encrypted under its own
 * content key and wrapped for seller and buyer separately. A holder can then
 * disclose section A to a new party without handing over a usable key for B.
 *
 * Sections decrypt independently, so the record as a whole is bound by an
 * aggregate hash over, in name order:
 *
 *   { doc_id, section_names, sections: [{ name, content_hash, key_wraps }] }
 *
 * Dropping, renaming or substituting a section, or moving a wrapped key
 * between parties, changes the aggregate. Each section's ciphertext carries
 * { aggregate_hash, doc_id, section } as associated data, which ties it to
 * this record and this name. The seller (and later the buyer) signs the raw
 * aggregate hash.
 */

import { createPublicKey } from "node:crypto";
import { Buffer } from "node:buffer";
import {
  ALGORITHM_SUITE,
  type Document,
  type LayeredProtectedTransaction,
  type LayeredVerificationReport,
  type SectionEnvelope,
  type SectionMap,
  type ShareRecord,
} from "./types.js";
import { canonicalize, parseCanonical, sha256 } from "./canonical.js";
import {
  aeadDecrypt,
  aeadEncrypt,
  generateContentKey,
  generateNonce,
  HASH_BYTES,
  NONCE_BYTES,
  sign,
  TAG_BYTES,
  verifySignature,
} from "./primitives.js";
import { unwrapFrom, wrapFor } from "./keywrap.js";
import {
  loadPublicKey,
  type DecryptionCapability,
  type KeyDirectory,
  type KeyInput,
  type KeyVault,
  type Recipient,
} from "./keys.js";
import {
  assertShareGrant,
  checkShare,
  signShareRecord,
  type AccessGrant,
  type ShareGrants,
} from "./share.js";
import {
  decodeSignature,
  requireBuyer,
  requireDistinctParties,
  requireUnsigned,
  resolveDocId,
  verifySignatures,
  type ProtectInput,
} from "./transaction.js";
import {
  AccessDeniedError,
  HashMismatchError,
  NotFoundError,
  SignatureInvalidError,
  StructuralError,
} from "./errors.js";
import { ownEntry, toHex, validateHex } from "./utils.js";

export interface LayeredProtectInput extends ProtectInput {
  sections: SectionMap;
}

export interface OpenedLayers {
  /** Fields of every section the party could open, merged */
  document: Document;

  /** Names of the sections that were opened, in name order */
  sections: string[];
}

// ----- Partitioning -----

/**
 * Split a document into section sub-documents.
 * Sections must be non-empty and non-overlapping, name only existing fields,
 * and together cover every field of the document.
 */
export function partitionDocument(document: Document, sections: SectionMap): Map<string, Document> {
  const names = Object.keys(sections);
  if (names.length === 0) {
    throw new StructuralError("At least one section is required");
  }

  const owner = new Map<string, string>();
  const parts = new Map<string, Document>();

  for (const name of names.sort()) {
    const fields = ownEntry(sections, name);
    if (!Array.isArray(fields) || fields.length === 0) {
      throw new StructuralError(`Section "${name}" must list at least one field`);
    }

    const entries: Array<[string, Document[string]]> = [];
    for (const field of fields) {
      if (typeof field !== "string" || !Object.hasOwn(document, field)) {
        throw new StructuralError(`Section "${name}" names unknown field "${String(field)}"`);
      }
      const claimedBy = owner.get(field);
      if (claimedBy !== undefined) {
        throw new StructuralError(`Field "${field}" is assigned to both "${claimedBy}" and "${name}"`);
      }
      owner.set(field, name);
      entries.push([field, document[field]]);
    }
    parts.set(name, Object.fromEntries(entries));
  }

  for (const field of Object.keys(document)) {
    if (!owner.has(field)) {
      throw new StructuralError(`Field "${field}" is not assigned to any section`);
    }
  }
  return parts;
}

// ----- Aggregate binding -----

type SectionBinding = Pick<SectionEnvelope, "content_hash" | "key_wraps">;

export function computeAggregateHash(
  docId: string,
  sections: Readonly<Record<string, SectionBinding>>
): Buffer {
  const names = Object.keys(sections).sort();
  return sha256(
    canonicalize({
      doc_id: docId,
      section_names: names,
      sections: names.map((name) => {
        const section = sections[name];
        return { name, content_hash: section.content_hash, key_wraps: section.key_wraps };
      }),
    })
  );
}

/**
 * Recompute the aggregate from the record's sections and require it to match.
 * @throws HashMismatchError when a section was dropped, renamed or altered
 */
export function verifyAggregate(record: LayeredProtectedTransaction): Buffer {
  const stored = validateHex(record.aggregate_hash, "aggregate_hash", HASH_BYTES);
  if (!computeAggregateHash(record.doc_id, record.sections).equals(stored)) {
    throw new HashMismatchError(`Sections of ${record.doc_id} do not match aggregate_hash`);
  }
  return stored;
}

function sectionAssociatedData(docId: string, section: string, aggregateHash: string): Buffer {
  return canonicalize({ aggregate_hash: aggregateHash, doc_id: docId, section });
}

function sectionFor(record: LayeredProtectedTransaction, name: string): SectionEnvelope {
  const section = ownEntry(record.sections, name);
  if (!section) {
    throw new NotFoundError("section", name);
  }
  return section;
}

function openSection(record: LayeredProtectedTransaction, name: string, contentKey: Buffer): Document {
  const section = sectionFor(record, name);
  const plaintext = aeadDecrypt(
    contentKey,
    validateHex(section.nonce, `${name} nonce`, NONCE_BYTES),
    validateHex(section.ciphertext, `${name} ciphertext`),
    validateHex(section.auth_tag, `${name} auth_tag`, TAG_BYTES),
    sectionAssociatedData(record.doc_id, name, record.aggregate_hash)
  );

  if (toHex(sha256(plaintext)) !== section.content_hash) {
    throw new HashMismatchError(`Decrypted section "${name}" of ${record.doc_id} does not match its content_hash`);
  }
  return parseCanonical(plaintext);
}

function isRejectedGrant(err: unknown): boolean {
  return err instanceof AccessDeniedError || err instanceof NotFoundError;
}

/**
 * First supplied share that is a valid grant of this section to the party.
 * When every candidate fails, the first is returned so that opening it
 * reports why.
 */
function shareFor(
  record: LayeredProtectedTransaction,
  grants: ShareGrants | undefined,
  partyId: string,
  name: string
): AccessGrant | undefined {
  if (!grants) {
    return undefined;
  }
  const candidates = grants.shares.filter((share) => share.to_id === partyId && share.section === name);
  const scope = { docId: record.doc_id, boundHash: record.aggregate_hash, partyId, section: name };
  const valid = candidates.find((share) => {
    try {
      assertShareGrant(share, scope, grants.directory);
      return true;
    } catch (err) {
      if (isRejectedGrant(err)) {
        return false;
      }
      throw err;
    }
  });
  const share = valid ?? candidates[0];
  return share ? { share, directory: grants.directory } : undefined;
}

function resolveSectionKey(
  record: LayeredProtectedTransaction,
  name: string,
  party: DecryptionCapability,
  grant?: AccessGrant
): Buffer {
  const section = sectionFor(record, name);
  const direct = ownEntry(section.key_wraps, party.partyId);
  if (direct) {
    return unwrapFrom(direct, party.encryptionKey(), {
      purpose: "content",
      docId: record.doc_id,
      section: name,
    });
  }

  if (!grant) {
    throw new AccessDeniedError(`"${party.partyId}" has no key for section "${name}" of ${record.doc_id}`);
  }

  assertShareGrant(
    grant.share,
    { docId: record.doc_id, boundHash: record.aggregate_hash, partyId: party.partyId, section: name },
    grant.directory
  );
  return unwrapFrom(grant.share.wrapped_key, party.encryptionKey(), {
    purpose: "share",
    docId: record.doc_id,
    section: name,
  });
}

// ----- Public API -----

/**
 * Encrypt each section of a document under its own content key, wrap every
 * section key for seller and buyer, and sign the aggregate as the seller.
 */
export function protectWithLayers(input: LayeredProtectInput): LayeredProtectedTransaction {
  const { document, seller, buyer } = input;
  requireDistinctParties(seller.partyId, buyer.id);
  const docId = resolveDocId(document, input.docId);
  const parts = partitionDocument(document, input.sections);

  const sellerPublic = createPublicKey(seller.encryptionKey());
  const buyerPublic = loadPublicKey(buyer.encryptionPublicKey, "x25519", `${buyer.id} encryption public key`);

  // Keys and wraps come first: the aggregate covers the wraps, and every
  // section's associated data covers the aggregate.
  const prepared = Array.from(parts, ([name, part]) => {
    const plaintext = canonicalize(part);
    const contentKey = generateContentKey();
    const context = { purpose: "content", docId, section: name } as const;
    return {
      name,
      plaintext,
      contentKey,
      binding: {
        content_hash: toHex(sha256(plaintext)),
        key_wraps: {
          [seller.partyId]: wrapFor(contentKey, seller.partyId, sellerPublic, context),
          [buyer.id]: wrapFor(contentKey, buyer.id, buyerPublic, context),
        },
      },
    };
  });

  const aggregateHash = computeAggregateHash(
    docId,
    Object.fromEntries(prepared.map(({ name, binding }): [string, SectionBinding] => [name, binding]))
  );
  const aggregateHex = toHex(aggregateHash);

  const sections = Object.fromEntries(
    prepared.map(({ name, plaintext, contentKey, binding }): [string, SectionEnvelope] => {
      const nonce = generateNonce();
      const { ciphertext, tag } = aeadEncrypt(
        contentKey,
        nonce,
        plaintext,
        sectionAssociatedData(docId, name, aggregateHex)
      );
      contentKey.fill(0);
      return [
        name,
        { ciphertext: toHex(ciphertext), nonce: toHex(nonce), auth_tag: toHex(tag), ...binding },
      ];
    })
  );

  return {
    version: 1,
    doc_id: docId,
    seller_id: seller.partyId,
    buyer_id: buyer.id,
    sections,
    aggregate_hash: aggregateHex,
    sig_seller: toHex(sign(seller.signingKey(), aggregateHash)),
    created_at: new Date().toISOString(),
    meta: ALGORITHM_SUITE,
  };
}

/**
 * Buyer opens every section through its own wraps, checks the aggregate,
 * each section hash and the seller's signature, then signs the aggregate.
 */
export function counterSignLayered(
  record: LayeredProtectedTransaction,
  buyer: KeyVault,
  sellerSigningPublicKey: KeyInput
): LayeredProtectedTransaction {
  requireUnsigned(record);
  requireBuyer(record, buyer);
  const sellerKey = loadPublicKey(sellerSigningPublicKey, "ed25519", `${record.seller_id} signing public key`);
  const aggregateHash = verifyAggregate(record);

  for (const name of Object.keys(record.sections).sort()) {
    const entry = ownEntry(sectionFor(record, name).key_wraps, buyer.partyId);
    if (!entry) {
      throw new AccessDeniedError(`"${buyer.partyId}" has no key for section "${name}" of ${record.doc_id}`);
    }
    const contentKey = unwrapFrom(entry, buyer.encryptionKey(), {
      purpose: "content",
      docId: record.doc_id,
      section: name,
    });
    try {
      openSection(record, name, contentKey);
    } finally {
      contentKey.fill(0);
    }
  }

  if (!verifySignature(sellerKey, aggregateHash, decodeSignature(record.sig_seller, "sig_seller"))) {
    throw new SignatureInvalidError(`Seller signature on ${record.doc_id} does not verify`);
  }

  return { ...record, sig_buyer: toHex(sign(buyer.signingKey(), aggregateHash)) };
}

/** Public-key-only checks: aggregate integrity, signatures and share records. */
export function verifyLayered(
  record: LayeredProtectedTransaction,
  directory: KeyDirectory,
  shares: readonly ShareRecord[] = []
): LayeredVerificationReport {
  const stored = validateHex(record.aggregate_hash, "aggregate_hash", HASH_BYTES);
  return {
    aggregateOk: computeAggregateHash(record.doc_id, record.sections).equals(stored),
    ...verifySignatures(record, stored, directory),
    shares: shares.map((share) => checkShare(share, record.doc_id, record.aggregate_hash, directory)),
  };
}

/**
 * Issue one share record per requested section. All-or-nothing: every
 * section is opened first, so a discloser missing any one of them gets
 * AccessDeniedError and no record at all.
 */
export function createLayerShareRecords(
  record: LayeredProtectedTransaction,
  discloser: KeyVault,
  recipient: Recipient,
  sectionNames: readonly string[],
  grants?: ShareGrants
): ShareRecord[] {
  if (sectionNames.length === 0) {
    throw new StructuralError("At least one section must be requested");
  }
  verifyAggregate(record);
  const recipientPublic = loadPublicKey(
    recipient.encryptionPublicKey,
    "x25519",
    `${recipient.id} encryption public key`
  );

  const keys = new Map<string, Buffer>();
  try {
    for (const name of new Set(sectionNames)) {
      const contentKey = resolveSectionKey(record, name, discloser, shareFor(record, grants, discloser.partyId, name));
      keys.set(name, contentKey);
      openSection(record, name, contentKey);
    }

    return Array.from(keys, ([name, contentKey]) =>
      signShareRecord(
        {
          docId: record.doc_id,
          section: name,
          fromId: discloser.partyId,
          toId: recipient.id,
          wrappedKey: wrapFor(contentKey, recipient.id, recipientPublic, {
            purpose: "share",
            docId: record.doc_id,
            section: name,
          }),
          boundHash: record.aggregate_hash,
        },
        discloser.signingKey()
      )
    );
  } finally {
    for (const contentKey of keys.values()) {
      contentKey.fill(0);
    }
  }
}

/**
 * Decrypt one section for a party with a direct wrap or a share scoped to
 * exactly this section.
 *
 * @throws HashMismatchError when the record's sections no longer match its aggregate
 * @throws NotFoundError when the section does not exist
 * @throws AccessDeniedError when the party has no key for this section
 */
export function unprotectLayer(
  record: LayeredProtectedTransaction,
  party: DecryptionCapability,
  sectionName: string,
  grant?: AccessGrant
): Document {
  verifyAggregate(record);
  const contentKey = resolveSectionKey(record, sectionName, party, grant);
  try {
    return openSection(record, sectionName, contentKey);
  } finally {
    contentKey.fill(0);
  }
}

/**
 * Open every section the party can reach, directly or through the supplied
 * shares, and merge them into one partial document.
 *
 * @throws AccessDeniedError when the party can open no section at all
 */
export function unprotectLayers(
  record: LayeredProtectedTransaction,
  party: DecryptionCapability,
  grants?: ShareGrants
): OpenedLayers {
  verifyAggregate(record);

  const opened: Array<[string, Document]> = [];
  for (const name of Object.keys(record.sections).sort()) {
    const grant = shareFor(record, grants, party.partyId, name);
    if (!ownEntry(sectionFor(record, name).key_wraps, party.partyId) && !grant) {
      continue;
    }
    opened.push([name, unprotectLayer(record, party, name, grant)]);
  }

  if (opened.length === 0) {
    throw new AccessDeniedError(`"${party.partyId}" has no key for any section of ${record.doc_id}`);
  }

  return {
    document: Object.fromEntries(opened.flatMap(([, part]) => Object.entries(part))),
    sections: opened.map(([name]) => name),
  };
}
