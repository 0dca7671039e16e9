/**
 * Transaction Protocol
 * =====================
 *
 * Protects a whole document between a seller and a buyer:
 *
 *   Draft ──protect──▶ SellerProtected ──counterSign──▶ BuyerCountersigned
 *
 * protect:
 *   1. Canonicalize the document and hash it (content_hash)
 *   2. Encrypt the canonical bytes under a fresh content key (AES-256-GCM),
 *      with { doc_id, content_hash } as associated data
 *   3. Wrap the content key for the seller and for the buyer
 *   4. Seller signs the raw content hash
 *
 * Later disclosures are share records layered on top of a protected record;
 * they never modify it.
 */

import { createPublicKey, randomUUID, type KeyObject } from "node:crypto";
import { Buffer } from "node:buffer";
import {
  ALGORITHM_SUITE,
  type Document,
  type ProtectedTransaction,
  type ShareRecord,
  type TransactionState,
  type VerificationReport,
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
import { assertShareGrant, checkShare, signShareRecord, type AccessGrant } from "./share.js";
import {
  AccessDeniedError,
  HashMismatchError,
  SignatureInvalidError,
  StructuralError,
} from "./errors.js";
import { ownEntry, toHex, validateHex } from "./utils.js";

// ----- Shared helpers (also used by the layered protocol) -----

export interface ProtectInput {
  document: Document;
  seller: KeyVault;
  buyer: Recipient;

  /** Defaults to document.id when it is a string, else a random UUID */
  docId?: string;
}

export function resolveDocId(document: Document, docId?: string): string {
  if (docId !== undefined) {
    if (!docId) {
      throw new StructuralError("doc_id must not be empty");
    }
    return docId;
  }
  const id = ownEntry(document, "id");
  return typeof id === "string" && id ? id : randomUUID();
}

export function requireDistinctParties(sellerId: string, buyerId: string): void {
  if (sellerId === buyerId) {
    throw new StructuralError(`Seller and buyer must be different parties (both "${sellerId}")`);
  }
}

export function requireUnsigned(record: { doc_id: string; sig_buyer?: string }): void {
  if (record.sig_buyer !== undefined) {
    throw new StructuralError(`Transaction ${record.doc_id} is already countersigned`);
  }
}

export function requireBuyer(record: { doc_id: string; buyer_id: string }, buyer: KeyVault): void {
  if (buyer.partyId !== record.buyer_id) {
    throw new AccessDeniedError(`"${buyer.partyId}" is not the buyer of ${record.doc_id}`);
  }
}

export function decodeSignature(signature: string, label: string): Buffer {
  return validateHex(signature, label);
}

/** Signature check where malformed signature bytes simply do not verify. */
function signatureVerifies(publicKey: KeyObject, hash: Buffer, signature: string, label: string): boolean {
  let decoded: Buffer;
  try {
    decoded = decodeSignature(signature, label);
  } catch (err) {
    if (err instanceof StructuralError) {
      return false;
    }
    throw err;
  }
  return verifySignature(publicKey, hash, decoded);
}

function documentAssociatedData(docId: string, contentHash: string): Buffer {
  return canonicalize({ content_hash: contentHash, doc_id: docId });
}

/**
 * Decrypt the record's ciphertext and check the result against content_hash.
 *
 * @throws AuthFailureError when the ciphertext, tag or bound hash was altered
 * @throws HashMismatchError when the decrypted bytes hash to something else
 */
function openDocument(record: ProtectedTransaction, contentKey: Buffer): Document {
  const plaintext = aeadDecrypt(
    contentKey,
    validateHex(record.nonce, "nonce", NONCE_BYTES),
    validateHex(record.ciphertext, "ciphertext"),
    validateHex(record.auth_tag, "auth_tag", TAG_BYTES),
    documentAssociatedData(record.doc_id, record.content_hash)
  );

  if (toHex(sha256(plaintext)) !== record.content_hash) {
    throw new HashMismatchError(`Decrypted content of ${record.doc_id} does not match content_hash`);
  }
  return parseCanonical(plaintext);
}

/**
 * Recover the content key through the party's own wrap, or else through a
 * share record addressed to it.
 */
function resolveContentKey(
  record: ProtectedTransaction,
  party: DecryptionCapability,
  grant?: AccessGrant
): Buffer {
  const direct = ownEntry(record.key_wraps, party.partyId);
  if (direct) {
    return unwrapFrom(direct, party.encryptionKey(), { purpose: "content", docId: record.doc_id });
  }

  if (!grant) {
    throw new AccessDeniedError(`"${party.partyId}" has no key for ${record.doc_id}`);
  }

  assertShareGrant(
    grant.share,
    { docId: record.doc_id, boundHash: record.content_hash, partyId: party.partyId },
    grant.directory
  );
  return unwrapFrom(grant.share.wrapped_key, party.encryptionKey(), {
    purpose: "share",
    docId: record.doc_id,
  });
}

// ----- Public API -----

export function transactionState(record: { sig_buyer?: string }): TransactionState {
  return record.sig_buyer === undefined ? "SellerProtected" : "BuyerCountersigned";
}

/**
 * Encrypt a document for seller and buyer and sign it as the seller.
 * Transition: Draft → SellerProtected.
 */
export function protect(input: ProtectInput): ProtectedTransaction {
  const { document, seller, buyer } = input;
  requireDistinctParties(seller.partyId, buyer.id);
  const docId = resolveDocId(document, input.docId);

  const plaintext = canonicalize(document);
  const hash = sha256(plaintext);
  const contentHashHex = toHex(hash);

  const contentKey = generateContentKey();
  const nonce = generateNonce();
  const { ciphertext, tag } = aeadEncrypt(
    contentKey,
    nonce,
    plaintext,
    documentAssociatedData(docId, contentHashHex)
  );

  const buyerPublic = loadPublicKey(buyer.encryptionPublicKey, "x25519", `${buyer.id} encryption public key`);
  const context = { purpose: "content", docId } as const;
  const keyWraps = {
    [seller.partyId]: wrapFor(contentKey, seller.partyId, createPublicKey(seller.encryptionKey()), context),
    [buyer.id]: wrapFor(contentKey, buyer.id, buyerPublic, context),
  };
  contentKey.fill(0);

  return {
    version: 1,
    doc_id: docId,
    seller_id: seller.partyId,
    buyer_id: buyer.id,
    ciphertext: toHex(ciphertext),
    nonce: toHex(nonce),
    auth_tag: toHex(tag),
    key_wraps: keyWraps,
    content_hash: contentHashHex,
    sig_seller: toHex(sign(seller.signingKey(), hash)),
    created_at: new Date().toISOString(),
    meta: ALGORITHM_SUITE,
  };
}

/**
 * Buyer opens the record, checks it against content_hash and the seller's
 * signature, then adds its own signature over the same hash.
 * Transition: SellerProtected → BuyerCountersigned. The input is not modified.
 *
 * @throws UnwrapFailureError when the buyer's entry cannot be opened
 * @throws HashMismatchError when the decrypted content does not match content_hash
 * @throws SignatureInvalidError when the seller's signature does not verify
 */
export function counterSign(
  record: ProtectedTransaction,
  buyer: KeyVault,
  sellerSigningPublicKey: KeyInput
): ProtectedTransaction {
  requireUnsigned(record);
  requireBuyer(record, buyer);
  const sellerKey = loadPublicKey(sellerSigningPublicKey, "ed25519", `${record.seller_id} signing public key`);

  const entry = ownEntry(record.key_wraps, buyer.partyId);
  if (!entry) {
    throw new AccessDeniedError(`"${buyer.partyId}" has no key for ${record.doc_id}`);
  }
  const contentKey = unwrapFrom(entry, buyer.encryptionKey(), { purpose: "content", docId: record.doc_id });
  try {
    openDocument(record, contentKey);
  } finally {
    contentKey.fill(0);
  }

  const hash = validateHex(record.content_hash, "content_hash", HASH_BYTES);
  if (!verifySignature(sellerKey, hash, decodeSignature(record.sig_seller, "sig_seller"))) {
    throw new SignatureInvalidError(`Seller signature on ${record.doc_id} does not verify`);
  }

  return { ...record, sig_buyer: toHex(sign(buyer.signingKey(), hash)) };
}

/**
 * Check every signature present on the record, and optionally a set of share
 * records, using public keys only. Does not decrypt.
 */
export function verify(
  record: ProtectedTransaction,
  directory: KeyDirectory,
  shares: readonly ShareRecord[] = []
): VerificationReport {
  const hash = validateHex(record.content_hash, "content_hash", HASH_BYTES);
  return {
    ...verifySignatures(record, hash, directory),
    shares: shares.map((share) => checkShare(share, record.doc_id, record.content_hash, directory)),
  };
}

/** Seller and buyer signature checks over a 32-byte hash. */
export function verifySignatures(
  record: { seller_id: string; buyer_id: string; sig_seller: string; sig_buyer?: string },
  hash: Buffer,
  directory: KeyDirectory
): Pick<VerificationReport, "sellerOk" | "buyerOk"> {
  const seller = directory.getPublicKeys(record.seller_id);
  const sellerOk = signatureVerifies(
    loadPublicKey(seller.signing_public_key, "ed25519", `${seller.id} signing public key`),
    hash,
    record.sig_seller,
    "sig_seller"
  );

  if (record.sig_buyer === undefined) {
    return { sellerOk, buyerOk: null };
  }

  const buyer = directory.getPublicKeys(record.buyer_id);
  const buyerOk = signatureVerifies(
    loadPublicKey(buyer.signing_public_key, "ed25519", `${buyer.id} signing public key`),
    hash,
    record.sig_buyer,
    "sig_buyer"
  );
  return { sellerOk, buyerOk };
}

/**
 * Decrypt the record for a party holding either a direct key wrap or a share
 * record addressed to it.
 *
 * @throws AccessDeniedError when neither path applies
 * @throws AuthFailureError (incl. UnwrapFailureError) when a tag does not verify
 * @throws HashMismatchError when the decrypted content does not match content_hash
 */
export function unprotect(
  record: ProtectedTransaction,
  party: DecryptionCapability,
  grant?: AccessGrant
): Document {
  const contentKey = resolveContentKey(record, party, grant);
  try {
    return openDocument(record, contentKey);
  } finally {
    contentKey.fill(0);
  }
}

/**
 * Grant a new party access to a record the discloser can already open.
 * The discloser's access is proven by opening the record first, so a party
 * without access fails before any key is wrapped.
 */
export function createShareRecord(
  record: ProtectedTransaction,
  discloser: KeyVault,
  recipient: Recipient,
  grant?: AccessGrant
): ShareRecord {
  const recipientPublic = loadPublicKey(
    recipient.encryptionPublicKey,
    "x25519",
    `${recipient.id} encryption public key`
  );

  const contentKey = resolveContentKey(record, discloser, grant);
  try {
    openDocument(record, contentKey);
    const wrappedKey = wrapFor(contentKey, recipient.id, recipientPublic, {
      purpose: "share",
      docId: record.doc_id,
    });
    return signShareRecord(
      {
        docId: record.doc_id,
        fromId: discloser.partyId,
        toId: recipient.id,
        wrappedKey,
        boundHash: record.content_hash,
      },
      discloser.signingKey()
    );
  } finally {
    contentKey.fill(0);
  }
}
