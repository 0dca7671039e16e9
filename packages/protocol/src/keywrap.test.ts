/**
 * Key-wrap engine tests
 *
 * Tests cover:
 *   1. Wrap → unwrap round-trip
 *   2. Wrong private key, relabeled entry, other document or section → UnwrapFailureError
 *   3. Purpose labels keep content and share wraps apart
 *   4. Malformed entries → StructuralError
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createPublicKey, generateKeyPairSync } from "node:crypto";
import {
  generateContentKey,
  rawX25519PublicKey,
  unwrapFrom,
  wrapFor,
  AuthFailureError,
  MalformedKeyError,
  StructuralError,
  UnwrapFailureError,
  type WrapContext,
} from "./index.js";
import { cloneRecord, flipHex } from "./testing.js";

const CONTEXT: WrapContext = { purpose: "content", docId: "tx-1" };

function recipient() {
  return generateKeyPairSync("x25519");
}

describe("Key wrapping", () => {
  it("should unwrap the content key for the intended recipient", () => {
    const contentKey = generateContentKey();
    const bob = recipient();

    const entry = wrapFor(contentKey, "bob", bob.publicKey, CONTEXT);
    assert.equal(entry.recipient_id, "bob");
    assert.equal(entry.nonce.length, 24);
    assert.equal(entry.tag.length, 32);
    assert.equal(entry.sender_ephemeral_public_key.length, 64);

    assert.ok(unwrapFrom(entry, bob.privateKey, CONTEXT).equals(contentKey));
  });

  it("should use a fresh ephemeral sender key per wrap unless a static one is given", () => {
    const contentKey = generateContentKey();
    const bob = recipient();
    const first = wrapFor(contentKey, "bob", bob.publicKey, CONTEXT);
    const second = wrapFor(contentKey, "bob", bob.publicKey, CONTEXT);
    assert.notEqual(first.sender_ephemeral_public_key, second.sender_ephemeral_public_key);

    const sender = generateKeyPairSync("x25519").privateKey;
    const fixed = wrapFor(contentKey, "bob", bob.publicKey, CONTEXT, sender);
    assert.equal(
      fixed.sender_ephemeral_public_key,
      rawX25519PublicKey(createPublicKey(sender)).toString("hex")
    );
    assert.ok(unwrapFrom(fixed, bob.privateKey, CONTEXT).equals(contentKey));
  });

  it("should fail with UnwrapFailureError for another party's private key", () => {
    const entry = wrapFor(generateContentKey(), "bob", recipient().publicKey, CONTEXT);

    assert.throws(() => unwrapFrom(entry, recipient().privateKey, CONTEXT), (err: unknown) => {
      assert.ok(err instanceof UnwrapFailureError);
      assert.ok(err instanceof AuthFailureError);
      assert.equal(err.code, "UNWRAP_FAILURE");
      assert.equal(err.message, 'Unable to unwrap content key for "bob"');
      return true;
    });
  });

  it("should fail when an entry is relabeled for another recipient", () => {
    const bob = recipient();
    const entry = wrapFor(generateContentKey(), "bob", bob.publicKey, CONTEXT);

    const relabeled = { ...cloneRecord(entry), recipient_id: "carol" };
    assert.throws(() => unwrapFrom(relabeled, bob.privateKey, CONTEXT), UnwrapFailureError);
  });

  it("should bind the wrap to its document, section and purpose", () => {
    const bob = recipient();
    const sectionContext: WrapContext = { purpose: "content", docId: "tx-1", section: "terms" };
    const entry = wrapFor(generateContentKey(), "bob", bob.publicKey, sectionContext);

    assert.throws(
      () => unwrapFrom(entry, bob.privateKey, { ...sectionContext, docId: "tx-2" }),
      UnwrapFailureError
    );
    assert.throws(
      () => unwrapFrom(entry, bob.privateKey, { ...sectionContext, section: "payment" }),
      UnwrapFailureError
    );
    assert.throws(() => unwrapFrom(entry, bob.privateKey, CONTEXT), UnwrapFailureError);
    assert.throws(
      () => unwrapFrom(entry, bob.privateKey, { ...sectionContext, purpose: "share" }),
      UnwrapFailureError
    );
  });

  it("should fail when the wrapped key or tag is tampered with", () => {
    const bob = recipient();
    const entry = wrapFor(generateContentKey(), "bob", bob.publicKey, CONTEXT);

    const badKey = { ...entry, wrapped_key: flipHex(entry.wrapped_key) };
    assert.throws(() => unwrapFrom(badKey, bob.privateKey, CONTEXT), UnwrapFailureError);

    const badTag = { ...entry, tag: flipHex(entry.tag) };
    assert.throws(() => unwrapFrom(badTag, bob.privateKey, CONTEXT), UnwrapFailureError);
  });

  it("should reject malformed entries before attempting decryption", () => {
    const bob = recipient();
    const entry = wrapFor(generateContentKey(), "bob", bob.publicKey, CONTEXT);

    assert.throws(() => unwrapFrom({ ...entry, nonce: "abcd" }, bob.privateKey, CONTEXT), {
      name: "StructuralError",
      message: "wrap nonce: expected 12 bytes, got 2 bytes",
    });
    assert.throws(
      () => unwrapFrom({ ...entry, sender_ephemeral_public_key: "zz" }, bob.privateKey, CONTEXT),
      StructuralError
    );
  });

  it("should reject keys of the wrong kind", () => {
    const bob = recipient();
    assert.throws(
      () => wrapFor(generateContentKey().subarray(0, 16), "bob", bob.publicKey, CONTEXT),
      MalformedKeyError
    );

    const entry = wrapFor(generateContentKey(), "bob", bob.publicKey, CONTEXT);
    assert.throws(
      () => unwrapFrom(entry, generateKeyPairSync("ed25519").privateKey, CONTEXT),
      MalformedKeyError
    );
  });
});
