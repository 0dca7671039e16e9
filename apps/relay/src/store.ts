/**
 * In-memory storage for party keys, protected records and share records.
 *
 * Records are stored opaquely: the relay checks shape and consistency, never
 * signatures and never plaintext. Everything is lost on restart.
 */

import {
  canonicalize,
  transactionState,
  MemoryKeyDirectory,
  NotFoundError,
  StructuralError,
  type AnyProtectedTransaction,
  type KeyDirectory,
  type LayeredProtectedTransaction,
  type PartyKeys,
  type ShareRecord,
  type TransactionState,
} from "@tradeseal/protocol";
import { ConflictError } from "./errors.js";

export type TransactionKind = "whole" | "layered";

export interface TransactionSummary {
  doc_id: string;
  kind: TransactionKind;
  seller_id: string;
  buyer_id: string;
  state: TransactionState;
  bound_hash: string;
  sections: string[] | null;
  created_at: string;
}

function isLayered(record: AnyProtectedTransaction): record is LayeredProtectedTransaction {
  return "sections" in record;
}

/** content_hash or aggregate_hash: what signatures and shares are bound to. */
export function boundHashOf(record: AnyProtectedTransaction): string {
  return isLayered(record) ? record.aggregate_hash : record.content_hash;
}

export class RelayStore {
  private readonly parties = new MemoryKeyDirectory();
  private readonly transactions = new Map<string, AnyProtectedTransaction>();
  private readonly shares = new Map<string, ShareRecord[]>();
  private readonly shareIds = new Set<string>();

  /** Registered public keys, as a directory for protocol calls. */
  get directory(): KeyDirectory {
    return this.parties;
  }

  // ----- Parties -----

  /**
   * @throws ConflictError when the id is already registered
   * @throws MalformedKeyError when either key does not load
   */
  registerParty(keys: PartyKeys): PartyKeys {
    if (this.parties.has(keys.id)) {
      throw new ConflictError(`Party already registered: ${keys.id}`);
    }
    this.parties.register(keys);
    return this.parties.getPublicKeys(keys.id);
  }

  getParty(partyId: string): PartyKeys {
    return this.parties.getPublicKeys(partyId);
  }

  // ----- Transactions -----

  addTransaction(record: AnyProtectedTransaction): void {
    if (this.transactions.has(record.doc_id)) {
      throw new ConflictError(`Transaction already stored: ${record.doc_id}`);
    }
    this.transactions.set(record.doc_id, record);
    this.shares.set(record.doc_id, []);
  }

  getTransaction(docId: string): AnyProtectedTransaction {
    const record = this.transactions.get(docId);
    if (!record) {
      throw new NotFoundError("document", docId);
    }
    return record;
  }

  /** Newest first */
  listTransactions(): TransactionSummary[] {
    return Array.from(this.transactions.values(), (record) => ({
      doc_id: record.doc_id,
      kind: isLayered(record) ? ("layered" as const) : ("whole" as const),
      seller_id: record.seller_id,
      buyer_id: record.buyer_id,
      state: transactionState(record),
      bound_hash: boundHashOf(record),
      sections: isLayered(record) ? Object.keys(record.sections).sort() : null,
      created_at: record.created_at,
    })).sort((a, b) => new Date(b.created_at).getTime() - new Date(a.created_at).getTime());
  }

  /**
   * Replace a seller-protected record with its countersigned version.
   * The incoming record must be the stored one plus a buyer signature.
   *
   * @throws ConflictError when the stored record is already countersigned or
   *   the incoming one differs from it in anything but sig_buyer
   */
  countersign(docId: string, record: AnyProtectedTransaction): AnyProtectedTransaction {
    const stored = this.getTransaction(docId);
    if (stored.sig_buyer !== undefined) {
      throw new ConflictError(`Transaction already countersigned: ${docId}`);
    }
    if (record.sig_buyer === undefined) {
      throw new ConflictError(`Countersigned record for ${docId} carries no buyer signature`);
    }
    if (!canonicalize(record).equals(canonicalize({ ...stored, sig_buyer: record.sig_buyer }))) {
      throw new ConflictError(`Countersigned record does not match stored transaction ${docId}`);
    }

    this.transactions.set(docId, record);
    return record;
  }

  // ----- Shares -----

  /**
   * @throws NotFoundError when the transaction is unknown
   * @throws StructuralError when the share names another transaction, another
   *   version of it or a missing section, or names no section of a layered one
   * @throws ConflictError when the share id is already stored
   */
  addShare(docId: string, share: ShareRecord): void {
    const record = this.getTransaction(docId);
    if (share.doc_id !== docId) {
      throw new StructuralError(`Share ${share.share_id} is for ${share.doc_id}, not ${docId}`);
    }
    if (share.bound_hash !== boundHashOf(record)) {
      throw new StructuralError(`Share ${share.share_id} is bound to a different record than ${docId}`);
    }
    if (share.section === undefined && isLayered(record)) {
      throw new StructuralError(`Share ${share.share_id} must name a section of layered transaction ${docId}`);
    }
    if (share.section !== undefined && !(isLayered(record) && Object.hasOwn(record.sections, share.section))) {
      throw new StructuralError(`Transaction ${docId} has no section "${share.section}"`);
    }
    if (this.shareIds.has(share.share_id)) {
      throw new ConflictError(`Share already stored: ${share.share_id}`);
    }

    this.shareIds.add(share.share_id);
    this.shares.get(docId)?.push(share);
  }

  listShares(docId: string, section?: string): ShareRecord[] {
    this.getTransaction(docId);
    const shares = this.shares.get(docId) ?? [];
    return section === undefined ? [...shares] : shares.filter((share) => share.section === section);
  }
}
