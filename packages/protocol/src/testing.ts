/**
 * Helpers for tests and local tooling: throwaway parties with fresh keys.
 * Not for production key management.
 */
import { generateKeyPairSync } from "node:crypto";
import type { PartyKeys } from "./types.js";
import {
  MemoryKeyDirectory,
  partyKeysFor,
  recipientFrom,
  staticKeyVault,
  type KeyVault,
  type Recipient,
} from "./keys.js";

export interface TestParty {
  vault: KeyVault;
  keys: PartyKeys;
  recipient: Recipient;
}

export function createParty(id: string): TestParty {
  const vault = staticKeyVault(id, {
    signingKey: generateKeyPairSync("ed25519").privateKey,
    encryptionKey: generateKeyPairSync("x25519").privateKey,
  });
  const keys = partyKeysFor(vault);
  return { vault, keys, recipient: recipientFrom(keys) };
}

export function directoryOf(...parties: TestParty[]): MemoryKeyDirectory {
  return new MemoryKeyDirectory(parties.map((party) => party.keys));
}

/** Deep clone so mutations in a test don't affect the original */
export function cloneRecord<T>(record: T): T {
  return structuredClone(record);
}

/** Flip the last hex digit of a value */
export function flipHex(value: string): string {
  const last = value.slice(-1);
  return value.slice(0, -1) + (last === "0" ? "1" : "0");
}
