/**
 * Key-Wrap Engine
 * ================
 *
 * Wraps a content key for one recipient:
 *
 *   1. X25519 between the sender key (a fresh ephemeral key unless a static
 *      one is supplied) and the recipient's public encryption key
 *   2. HKDF-SHA256 with a purpose label and salt = senderPub ‖ recipientPub
 *   3. AES-256-GCM over the content key under a fresh nonce
 *
 * The associated data of step 3 is the canonical encoding of
 * { doc_id, recipient_id, section? }, so an entry copied under another
 * recipient id, document or section no longer opens. Purpose labels keep
 * content-key wraps and share wraps from being interchangeable.
 */

import { createPublicKey, generateKeyPairSync, type KeyObject } from "node:crypto";
import { Buffer } from "node:buffer";
import type { WrappedKeyEntry } from "./types.js";
import { canonicalize } from "./canonical.js";
import {
  aeadDecrypt,
  aeadEncrypt,
  CONTENT_KEY_BYTES,
  deriveSharedSecret,
  generateNonce,
  kdf,
  NONCE_BYTES,
  TAG_BYTES,
} from "./primitives.js";
import { rawX25519PublicKey, x25519PublicKeyFromRaw, X25519_PUBLIC_KEY_BYTES } from "./keys.js";
import {
  AuthFailureError,
  MalformedKeyError,
  StructuralError,
  UnwrapFailureError,
} from "./errors.js";
import { toHex, validateHex } from "./utils.js";

export const CONTENT_KEY_WRAP_LABEL = "tradeseal/v1/content-key-wrap";
export const SHARE_KEY_WRAP_LABEL = "tradeseal/v1/share-key-wrap";

export type WrapPurpose = "content" | "share";

/** What a wrapped key is bound to. */
export interface WrapContext {
  purpose: WrapPurpose;
  docId: string;
  section?: string;
}

function labelFor(purpose: WrapPurpose): string {
  return purpose === "share" ? SHARE_KEY_WRAP_LABEL : CONTENT_KEY_WRAP_LABEL;
}

function wrapAssociatedData(recipientId: string, context: WrapContext): Buffer {
  return canonicalize({
    doc_id: context.docId,
    recipient_id: recipientId,
    ...(context.section !== undefined ? { section: context.section } : {}),
  });
}

/**
 * Wrap a content key so only the recipient's private encryption key can open it.
 *
 * @param senderKey - static X25519 private key; a fresh ephemeral key is generated when omitted
 */
export function wrapFor(
  contentKey: Uint8Array,
  recipientId: string,
  recipientPublicKey: KeyObject,
  context: WrapContext,
  senderKey?: KeyObject
): WrappedKeyEntry {
  if (contentKey.length !== CONTENT_KEY_BYTES) {
    throw new MalformedKeyError(
      `content key: expected ${CONTENT_KEY_BYTES} bytes, got ${contentKey.length} bytes`
    );
  }

  const sender = senderKey ?? generateKeyPairSync("x25519").privateKey;
  const senderPublic = rawX25519PublicKey(createPublicKey(sender));
  const recipientPublic = rawX25519PublicKey(recipientPublicKey);

  const secret = deriveSharedSecret(sender, recipientPublicKey);
  const wrapKey = kdf(secret, labelFor(context.purpose), Buffer.concat([senderPublic, recipientPublic]));

  const nonce = generateNonce();
  const { ciphertext, tag } = aeadEncrypt(
    wrapKey,
    nonce,
    contentKey,
    wrapAssociatedData(recipientId, context)
  );
  wrapKey.fill(0);

  return {
    recipient_id: recipientId,
    wrapped_key: toHex(ciphertext),
    nonce: toHex(nonce),
    tag: toHex(tag),
    sender_ephemeral_public_key: toHex(senderPublic),
  };
}

/**
 * Recover a content key from a wrapped entry.
 *
 * @throws StructuralError when the entry's encodings are malformed
 * @throws MalformedKeyError when the private key is not an X25519 private key
 * @throws UnwrapFailureError for the wrong recipient, a tampered entry or the wrong private key
 */
export function unwrapFrom(
  entry: WrappedKeyEntry,
  myPrivateKey: KeyObject,
  context: WrapContext
): Buffer {
  if (myPrivateKey.type !== "private" || myPrivateKey.asymmetricKeyType !== "x25519") {
    throw new MalformedKeyError("Unwrapping requires an x25519 private key");
  }

  const senderPublic = validateHex(
    entry.sender_ephemeral_public_key,
    "sender_ephemeral_public_key",
    X25519_PUBLIC_KEY_BYTES
  );
  const nonce = validateHex(entry.nonce, "wrap nonce", NONCE_BYTES);
  const tag = validateHex(entry.tag, "wrap tag", TAG_BYTES);
  const wrapped = validateHex(entry.wrapped_key, "wrapped_key");
  if (typeof entry.recipient_id !== "string") {
    throw new StructuralError("recipient_id: expected a string");
  }

  const myPublic = rawX25519PublicKey(myPrivateKey);
  let contentKey: Buffer;
  try {
    const secret = deriveSharedSecret(myPrivateKey, x25519PublicKeyFromRaw(senderPublic));
    const wrapKey = kdf(secret, labelFor(context.purpose), Buffer.concat([senderPublic, myPublic]));
    contentKey = aeadDecrypt(wrapKey, nonce, wrapped, tag, wrapAssociatedData(entry.recipient_id, context));
    wrapKey.fill(0);
  } catch (err) {
    if (err instanceof AuthFailureError || err instanceof MalformedKeyError) {
      throw new UnwrapFailureError(`Unable to unwrap content key for "${entry.recipient_id}"`, {
        cause: err,
      });
    }
    throw err;
  }

  if (contentKey.length !== CONTENT_KEY_BYTES) {
    throw new UnwrapFailureError(`Unwrapped key for "${entry.recipient_id}" has the wrong length`);
  }
  return contentKey;
}
