/**
 * Primitive adapter: thin, explicit-parameter wrappers over node:crypto.
 *
 *   AEAD        AES-256-GCM, 256-bit key, 96-bit nonce, 128-bit tag
 *   Agreement   X25519
 *   KDF         HKDF-SHA256, 32-byte output, one label per purpose
 *   Signatures  Ed25519 over a 32-byte message hash
 *
 * Nothing here stores keys. Nonces are never derived or counted: callers
 * take a fresh one from generateNonce() for every encryption.
 */

import {
  createCipheriv,
  createDecipheriv,
  diffieHellman,
  hkdfSync,
  randomBytes,
  sign as ed25519Sign,
  verify as ed25519Verify,
  type KeyObject,
} from "node:crypto";
import { Buffer } from "node:buffer";
import { AuthFailureError, MalformedKeyError, StructuralError } from "./errors.js";

// ----- Constants -----

const ALGORITHM = "aes-256-gcm" as const;
export const CONTENT_KEY_BYTES = 32; // 256-bit content key
export const NONCE_BYTES = 12;       // 96-bit nonce (NIST recommendation for GCM)
export const TAG_BYTES = 16;         // 128-bit auth tag
export const HASH_BYTES = 32;        // SHA-256 digest
export const SIGNATURE_BYTES = 64;   // Ed25519 signature

export interface AeadOutput {
  ciphertext: Buffer;
  tag: Buffer;
}

export function generateContentKey(): Buffer {
  return randomBytes(CONTENT_KEY_BYTES);
}

export function generateNonce(): Buffer {
  return randomBytes(NONCE_BYTES);
}

function requireSymmetricKey(key: Uint8Array): void {
  if (key.length !== CONTENT_KEY_BYTES) {
    throw new MalformedKeyError(
      `AES-256-GCM requires a ${CONTENT_KEY_BYTES}-byte key, got ${key.length} bytes`
    );
  }
}

function requireLength(value: Uint8Array, expected: number, label: string): void {
  if (value.length !== expected) {
    throw new StructuralError(`${label}: expected ${expected} bytes, got ${value.length} bytes`);
  }
}

/**
 * Encrypt with AES-256-GCM. The associated data is authenticated but not
 * encrypted: decryption fails unless the same bytes are supplied again.
 */
export function aeadEncrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  plaintext: Uint8Array,
  associatedData: Uint8Array
): AeadOutput {
  requireSymmetricKey(key);
  requireLength(nonce, NONCE_BYTES, "nonce");

  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_BYTES });
  cipher.setAAD(associatedData);

  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { ciphertext, tag: cipher.getAuthTag() };
}

/**
 * Decrypt with AES-256-GCM.
 * @throws AuthFailureError on a wrong key, tampered ciphertext or tag, or mismatched associated data
 */
export function aeadDecrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
  tag: Uint8Array,
  associatedData: Uint8Array
): Buffer {
  requireSymmetricKey(key);
  requireLength(nonce, NONCE_BYTES, "nonce");
  requireLength(tag, TAG_BYTES, "auth_tag");

  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_BYTES });
  decipher.setAAD(associatedData);

  // Set the authentication tag BEFORE calling update/final.
  decipher.setAuthTag(tag);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    throw new AuthFailureError(
      "Decryption failed: authentication tag mismatch (data may be tampered)",
      { cause: err }
    );
  }
}

/**
 * X25519 key agreement.
 * @throws MalformedKeyError when either key is not X25519 or the agreement yields no secret
 */
export function deriveSharedSecret(myPrivateKey: KeyObject, theirPublicKey: KeyObject): Buffer {
  if (myPrivateKey.type !== "private" || myPrivateKey.asymmetricKeyType !== "x25519") {
    throw new MalformedKeyError("Key agreement requires an x25519 private key");
  }
  if (theirPublicKey.type !== "public" || theirPublicKey.asymmetricKeyType !== "x25519") {
    throw new MalformedKeyError("Key agreement requires an x25519 public key");
  }

  try {
    return diffieHellman({ privateKey: myPrivateKey, publicKey: theirPublicKey });
  } catch (err) {
    // Low-order points produce an all-zero secret, which OpenSSL refuses
    throw new MalformedKeyError("Key agreement failed", { cause: err });
  }
}

/** HKDF-SHA256 extract-and-expand to a 32-byte symmetric key. */
export function kdf(secret: Uint8Array, contextLabel: string, salt: Uint8Array = Buffer.alloc(0)): Buffer {
  if (!contextLabel) {
    throw new StructuralError("kdf: context label must not be empty");
  }
  return Buffer.from(hkdfSync("sha256", secret, salt, contextLabel, CONTENT_KEY_BYTES));
}

/** Ed25519 signature over a 32-byte message hash. */
export function sign(privateKey: KeyObject, messageHash: Uint8Array): Buffer {
  if (privateKey.type !== "private" || privateKey.asymmetricKeyType !== "ed25519") {
    throw new MalformedKeyError("Signing requires an ed25519 private key");
  }
  requireLength(messageHash, HASH_BYTES, "message hash");
  return ed25519Sign(null, messageHash, privateKey);
}

/**
 * Ed25519 verification. A signature of the wrong length is simply invalid;
 * only a key of the wrong type is an error.
 */
export function verifySignature(
  publicKey: KeyObject,
  messageHash: Uint8Array,
  signature: Uint8Array
): boolean {
  if (publicKey.type !== "public" || publicKey.asymmetricKeyType !== "ed25519") {
    throw new MalformedKeyError("Verification requires an ed25519 public key");
  }
  if (signature.length !== SIGNATURE_BYTES || messageHash.length !== HASH_BYTES) {
    return false;
  }
  return ed25519Verify(null, messageHash, publicKey, signature);
}
