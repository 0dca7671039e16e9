/**
 * Party Keys — Vaults and Directories
 * =====================================
 *
 * Each party holds two long-term key pairs:
 *   - Ed25519 for signing (content hashes, share records)
 *   - X25519 for key agreement (unwrapping content keys)
 *
 * Private keys reach the protocol only through a KeyVault capability, one
 * call at a time; nothing here caches them. Public keys are looked up through
 * a KeyDirectory, which the caller injects into every operation that needs
 * another party's keys.
 *
 * Keys are accepted as node:crypto KeyObjects or PEM strings (PKCS#8 for
 * private keys, SPKI for public keys).
 */

import { createPrivateKey, createPublicKey, KeyObject } from "node:crypto";
import { Buffer } from "node:buffer";
import type { PartyKeys } from "./types.js";
import { MalformedKeyError, NotFoundError } from "./errors.js";

export type KeyInput = KeyObject | string;
export type KeyAlgorithm = "ed25519" | "x25519";

export const X25519_PUBLIC_KEY_BYTES = 32;

// SPKI DER prefix of an X25519 public key; the raw 32-byte key follows it
const X25519_SPKI_PREFIX = Buffer.from("302a300506032b656e032100", "hex");

function requireAlgorithm(key: KeyObject, algorithm: KeyAlgorithm, label: string): KeyObject {
  if (key.asymmetricKeyType !== algorithm) {
    throw new MalformedKeyError(
      `${label}: expected an ${algorithm} key, got ${key.asymmetricKeyType ?? key.type}`
    );
  }
  return key;
}

/**
 * Load a private key from a KeyObject or PKCS#8 PEM.
 * @throws MalformedKeyError if the input is not a private key of the given algorithm.
 */
export function loadPrivateKey(input: KeyInput, algorithm: KeyAlgorithm, label: string): KeyObject {
  if (input instanceof KeyObject) {
    if (input.type !== "private") {
      throw new MalformedKeyError(`${label}: expected a private key, got a ${input.type} key`);
    }
    return requireAlgorithm(input, algorithm, label);
  }

  let key: KeyObject;
  try {
    key = createPrivateKey(input);
  } catch (err) {
    throw new MalformedKeyError(`${label}: not a PEM-encoded private key`, { cause: err });
  }
  return requireAlgorithm(key, algorithm, label);
}

/**
 * Load a public key from a KeyObject (public or private) or SPKI PEM.
 * @throws MalformedKeyError if the input is not a key of the given algorithm.
 */
export function loadPublicKey(input: KeyInput, algorithm: KeyAlgorithm, label: string): KeyObject {
  if (input instanceof KeyObject) {
    if (input.type === "secret") {
      throw new MalformedKeyError(`${label}: expected a public key, got a secret key`);
    }
    const key = input.type === "private" ? createPublicKey(input) : input;
    return requireAlgorithm(key, algorithm, label);
  }

  let key: KeyObject;
  try {
    key = createPublicKey(input);
  } catch (err) {
    throw new MalformedKeyError(`${label}: not a PEM-encoded public key`, { cause: err });
  }
  return requireAlgorithm(key, algorithm, label);
}

export function exportPublicKeyPem(key: KeyObject): string {
  const publicKey = key.type === "private" ? createPublicKey(key) : key;
  const pem = publicKey.export({ type: "spki", format: "pem" });
  return typeof pem === "string" ? pem : pem.toString("utf-8");
}

/** Raw 32-byte form of an X25519 public key, as carried in wrapped-key entries. */
export function rawX25519PublicKey(key: KeyObject): Buffer {
  const publicKey = requireAlgorithm(
    key.type === "private" ? createPublicKey(key) : key,
    "x25519",
    "x25519 public key"
  );
  return publicKey.export({ type: "spki", format: "der" }).subarray(X25519_SPKI_PREFIX.length);
}

export function x25519PublicKeyFromRaw(raw: Uint8Array): KeyObject {
  if (raw.length !== X25519_PUBLIC_KEY_BYTES) {
    throw new MalformedKeyError(
      `x25519 public key: expected ${X25519_PUBLIC_KEY_BYTES} bytes, got ${raw.length} bytes`
    );
  }
  return createPublicKey({
    key: Buffer.concat([X25519_SPKI_PREFIX, raw]),
    format: "der",
    type: "spki",
  });
}

// ----- Private-key capabilities -----

/** Access to a party's private decryption key for the duration of one call. */
export interface DecryptionCapability {
  readonly partyId: string;
  encryptionKey(): KeyObject;
}

/** Access to both of a party's private keys for the duration of one call. */
export interface KeyVault extends DecryptionCapability {
  signingKey(): KeyObject;
}

export interface PrivateKeyMaterial {
  signingKey: KeyInput;
  encryptionKey: KeyInput;
}

/**
 * Wrap already-materialized private keys in a KeyVault.
 * Both keys are validated up front so a bad key fails here rather than
 * halfway through a protocol call.
 */
export function staticKeyVault(partyId: string, material: PrivateKeyMaterial): KeyVault {
  const signingKey = loadPrivateKey(material.signingKey, "ed25519", `${partyId} signing key`);
  const encryptionKey = loadPrivateKey(material.encryptionKey, "x25519", `${partyId} encryption key`);
  return {
    partyId,
    signingKey: () => signingKey,
    encryptionKey: () => encryptionKey,
  };
}

/** Public keys matching a vault's private keys. */
export function partyKeysFor(vault: KeyVault): PartyKeys {
  return {
    id: vault.partyId,
    signing_public_key: exportPublicKeyPem(vault.signingKey()),
    encryption_public_key: exportPublicKeyPem(vault.encryptionKey()),
  };
}

// ----- Public-key directory -----

/** The identity/key registry as the protocol sees it. */
export interface KeyDirectory {
  /** @throws NotFoundError when the party is unknown */
  getPublicKeys(partyId: string): PartyKeys;
}

/** A recipient of a wrapped content key. */
export interface Recipient {
  id: string;
  encryptionPublicKey: KeyInput;
}

export function recipientFrom(keys: PartyKeys): Recipient {
  return { id: keys.id, encryptionPublicKey: keys.encryption_public_key };
}

/** Validates that both public keys of a PartyKeys entry load with the right algorithm. */
export function validatePartyKeys(keys: PartyKeys): void {
  loadPublicKey(keys.signing_public_key, "ed25519", `${keys.id} signing public key`);
  loadPublicKey(keys.encryption_public_key, "x25519", `${keys.id} encryption public key`);
}

/** In-process KeyDirectory backed by a Map. */
export class MemoryKeyDirectory implements KeyDirectory {
  private readonly parties = new Map<string, PartyKeys>();

  constructor(parties: Iterable<PartyKeys> = []) {
    for (const keys of parties) {
      this.register(keys);
    }
  }

  /**
   * Add or replace a party's public keys.
   * @throws MalformedKeyError if either key is not a valid SPKI PEM of the right algorithm
   */
  register(keys: PartyKeys): void {
    validatePartyKeys(keys);
    this.parties.set(keys.id, { ...keys });
  }

  has(partyId: string): boolean {
    return this.parties.has(partyId);
  }

  getPublicKeys(partyId: string): PartyKeys {
    const keys = this.parties.get(partyId);
    if (!keys) {
      throw new NotFoundError("party", partyId);
    }
    return { ...keys };
  }

  list(): PartyKeys[] {
    return Array.from(this.parties.values(), (keys) => ({ ...keys }));
  }
}
