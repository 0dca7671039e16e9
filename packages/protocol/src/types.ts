/**
 * Record shapes exchanged between parties and the storage/relay service.
 *
 * All binary values (ciphertexts, nonces, auth tags, hashes, signatures,
 * wrapped keys, ephemeral public keys) are stored as lowercase hex strings
 * for safe JSON serialization.
 */

// --- Documents ---

/** A JSON-like value that canonicalizes to exactly one byte string. */
export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | DocumentObject;

export interface DocumentObject {
  [field: string]: DocumentValue;
}

/** A transaction document: an ordered mapping of field name to value. */
export type Document = DocumentObject;

/** Section name → the document fields that belong to it. */
export type SectionMap = Readonly<Record<string, readonly string[]>>;

// --- Key wrapping ---

/** A content key wrapped so only the named recipient's private encryption key can open it. */
export interface WrappedKeyEntry {
  recipient_id: string;

  /** AES-256-GCM ciphertext of the 32-byte content key, hex-encoded */
  wrapped_key: string;

  /** 12-byte nonce used for the wrap, hex-encoded (24 chars) */
  nonce: string;

  /** 16-byte authentication tag of the wrap, hex-encoded (32 chars) */
  tag: string;

  /** Raw 32-byte X25519 public key of the sender (usually ephemeral), hex-encoded */
  sender_ephemeral_public_key: string;
}

export type KeyWraps = Record<string, WrappedKeyEntry>;

// --- Protected records ---

export const ALGORITHM_SUITE = {
  hash: "sha256",
  cipher: "aes-256-gcm",
  wrap: "x25519-hkdf-sha256-aes-256-gcm",
  signature: "ed25519",
} as const;

export type AlgorithmSuite = typeof ALGORITHM_SUITE;

export type TransactionState = "Draft" | "SellerProtected" | "BuyerCountersigned";

export interface ProtectedTransaction {
  version: 1;
  doc_id: string;
  seller_id: string;
  buyer_id: string;

  /** AES-256-GCM ciphertext of the canonical document bytes */
  ciphertext: string;
  nonce: string;
  auth_tag: string;

  /** One wrapped copy of the content key per authorized party */
  key_wraps: KeyWraps;

  /** SHA-256 of the canonical document bytes */
  content_hash: string;

  /** Seller's Ed25519 signature over the raw content hash */
  sig_seller: string;

  /** Buyer's Ed25519 signature over the raw content hash, once countersigned */
  sig_buyer?: string;

  /** ISO-8601 timestamp of protection */
  created_at: string;
  meta: AlgorithmSuite;
}

/** One independently encrypted section of a layered transaction. */
export interface SectionEnvelope {
  ciphertext: string;
  nonce: string;
  auth_tag: string;

  /** SHA-256 of the section's canonical bytes */
  content_hash: string;
  key_wraps: KeyWraps;
}

export interface LayeredProtectedTransaction {
  version: 1;
  doc_id: string;
  seller_id: string;
  buyer_id: string;
  sections: Record<string, SectionEnvelope>;

  /** Binds every section name, content hash and key-wrap entry of this record */
  aggregate_hash: string;
  sig_seller: string;
  sig_buyer?: string;
  created_at: string;
  meta: AlgorithmSuite;
}

export type AnyProtectedTransaction = ProtectedTransaction | LayeredProtectedTransaction;

// --- Disclosure ---

/**
 * A signed, auditable grant of access from one party to another.
 * `section` is absent for a whole-document grant.
 */
export interface ShareRecord {
  share_id: string;
  doc_id: string;
  section?: string;
  from_id: string;
  to_id: string;
  wrapped_key: WrappedKeyEntry;

  /** content_hash (whole document) or aggregate_hash (layered) of the granted record */
  bound_hash: string;

  /** ISO-8601 timestamp of the grant */
  timestamp: string;

  /** Discloser's Ed25519 signature over SHA-256 of the canonical unsigned record */
  signature: string;
}

export type UnsignedShareRecord = Omit<ShareRecord, "signature">;

// --- Parties ---

/** Public keys of a party, as SPKI PEM strings. */
export interface PartyKeys {
  id: string;
  signing_public_key: string;
  encryption_public_key: string;
}

// --- Verification reports ---

export interface ShareCheck {
  shareId: string;
  fromId: string;
  toId: string;
  section: string | null;
  valid: boolean;
}

export interface VerificationReport {
  sellerOk: boolean;

  /** null when the buyer has not countersigned yet */
  buyerOk: boolean | null;
  shares: ShareCheck[];
}

export interface LayeredVerificationReport extends VerificationReport {
  aggregateOk: boolean;
}
