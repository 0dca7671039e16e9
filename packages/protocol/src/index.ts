/**
 * @tradeseal/protocol — Protected transaction records
 *
 * Re-exports all public types and functions for consumers.
 */
export * from "./types.js";
export * from "./errors.js";
export { canonicalize, contentHash, parseCanonical, sha256, toDocument, toDocumentValue } from "./canonical.js";
export {
  aeadDecrypt,
  aeadEncrypt,
  deriveSharedSecret,
  generateContentKey,
  generateNonce,
  kdf,
  sign,
  verifySignature,
  CONTENT_KEY_BYTES,
  HASH_BYTES,
  NONCE_BYTES,
  SIGNATURE_BYTES,
  TAG_BYTES,
  type AeadOutput,
} from "./primitives.js";
export {
  exportPublicKeyPem,
  loadPrivateKey,
  loadPublicKey,
  partyKeysFor,
  rawX25519PublicKey,
  recipientFrom,
  staticKeyVault,
  validatePartyKeys,
  x25519PublicKeyFromRaw,
  MemoryKeyDirectory,
  type DecryptionCapability,
  type KeyAlgorithm,
  type KeyDirectory,
  type KeyInput,
  type KeyVault,
  type PrivateKeyMaterial,
  type Recipient,
} from "./keys.js";
export {
  unwrapFrom,
  wrapFor,
  CONTENT_KEY_WRAP_LABEL,
  SHARE_KEY_WRAP_LABEL,
  type WrapContext,
  type WrapPurpose,
} from "./keywrap.js";
export {
  assertShareGrant,
  checkShare,
  shareRecordHash,
  signShareRecord,
  verifyShareRecord,
  type AccessGrant,
  type NewShareRecord,
  type ShareGrants,
  type ShareScope,
} from "./share.js";
export {
  counterSign,
  createShareRecord,
  protect,
  transactionState,
  unprotect,
  verify,
  type ProtectInput,
} from "./transaction.js";
export {
  computeAggregateHash,
  counterSignLayered,
  createLayerShareRecords,
  partitionDocument,
  protectWithLayers,
  unprotectLayer,
  unprotectLayers,
  verifyAggregate,
  verifyLayered,
  type LayeredProtectInput,
  type OpenedLayers,
} from "./layered.js";
export {
  isLayeredTransaction,
  parseAnyTransaction,
  parseLayeredTransaction,
  parsePartyKeys,
  parseProtectedTransaction,
  parseShareRecord,
} from "./records.js";
export { isPlainObject, toHex, validateHex } from "./utils.js";
