import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { generateKeyPairSync } from "node:crypto";
import {
  exportPublicKeyPem,
  loadPrivateKey,
  loadPublicKey,
  rawX25519PublicKey,
  staticKeyVault,
  x25519PublicKeyFromRaw,
  MalformedKeyError,
  MemoryKeyDirectory,
  NotFoundError,
} from "./index.js";
import { createParty } from "./testing.js";

describe("Key loading", () => {
  it("should load public keys from SPKI PEM and from private KeyObjects", () => {
    const { privateKey } = generateKeyPairSync("ed25519");
    const pem = exportPublicKeyPem(privateKey);

    assert.equal(loadPublicKey(pem, "ed25519", "seller").asymmetricKeyType, "ed25519");
    assert.equal(loadPublicKey(privateKey, "ed25519", "seller").type, "public");
  });

  it("should reject a key of the other algorithm", () => {
    const pem = exportPublicKeyPem(generateKeyPairSync("x25519").publicKey);
    assert.throws(() => loadPublicKey(pem, "ed25519", "seller signing public key"), {
      name: "MalformedKeyError",
      message: "seller signing public key: expected an ed25519 key, got x25519",
    });
  });

  it("should reject text that is not a PEM key", () => {
    assert.throws(() => loadPublicKey("not-a-key", "x25519", "buyer"), {
      message: "buyer: not a PEM-encoded public key",
    });
    assert.throws(() => loadPrivateKey("not-a-key", "x25519", "buyer"), MalformedKeyError);
  });

  it("should refuse a public key where a private key is required", () => {
    const { publicKey } = generateKeyPairSync("x25519");
    assert.throws(() => loadPrivateKey(publicKey, "x25519", "buyer"), {
      message: "buyer: expected a private key, got a public key",
    });
  });

  it("should convert X25519 public keys to raw bytes and back", () => {
    const { publicKey } = generateKeyPairSync("x25519");
    const raw = rawX25519PublicKey(publicKey);

    assert.equal(raw.length, 32);
    assert.ok(rawX25519PublicKey(x25519PublicKeyFromRaw(raw)).equals(raw));
    assert.throws(() => x25519PublicKeyFromRaw(raw.subarray(1)), MalformedKeyError);
  });
});

describe("staticKeyVault", () => {
  it("should reject swapped signing and encryption keys", () => {
    assert.throws(
      () =>
        staticKeyVault("seller", {
          signingKey: generateKeyPairSync("x25519").privateKey,
          encryptionKey: generateKeyPairSync("ed25519").privateKey,
        }),
      { message: "seller signing key: expected an ed25519 key, got x25519" }
    );
  });
});

describe("MemoryKeyDirectory", () => {
  it("should return registered keys and reject unknown parties", () => {
    const seller = createParty("seller");
    const directory = new MemoryKeyDirectory([seller.keys]);

    assert.deepEqual(directory.getPublicKeys("seller"), seller.keys);
    assert.equal(directory.has("buyer"), false);
    assert.throws(() => directory.getPublicKeys("buyer"), (err: unknown) => {
      assert.ok(err instanceof NotFoundError);
      assert.equal(err.resource, "party");
      assert.equal(err.message, "party not found: buyer");
      return true;
    });
  });

  it("should refuse keys that do not load", () => {
    const seller = createParty("seller");
    const directory = new MemoryKeyDirectory();

    assert.throws(
      () => directory.register({ ...seller.keys, encryption_public_key: seller.keys.signing_public_key }),
      MalformedKeyError
    );
    assert.deepEqual(directory.list(), []);
  });

  it("should hand out copies", () => {
    const seller = createParty("seller");
    const directory = new MemoryKeyDirectory([seller.keys]);

    const keys = directory.getPublicKeys("seller");
    keys.id = "mallory";
    assert.equal(directory.getPublicKeys("seller").id, "seller");
  });
});
