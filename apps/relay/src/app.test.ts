/**
 * Relay API tests
 *
 * Drives the Fastify app in-process with inject(); no port is opened.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type { FastifyInstance } from "fastify";
import {
  counterSign,
  createLayerShareRecords,
  createShareRecord,
  parseProtectedTransaction,
  parseShareRecord,
  protect,
  protectWithLayers,
  unprotect,
  unprotectLayer,
  verify,
  type ProtectedTransaction,
} from "@tradeseal/protocol";
import { createParty } from "@tradeseal/protocol/testing";
import { buildApp } from "./app.js";
import { RelayStore } from "./store.js";

const seller = createParty("seller");
const buyer = createParty("buyer");
const auditor = createParty("auditor");

function protectTestDocument(): ProtectedTransaction {
  return protect({ document: { id: "tx-1", amount: 100 }, seller: seller.vault, buyer: buyer.recipient });
}

describe("Relay API", () => {
  let app: FastifyInstance;
  let store: RelayStore;

  beforeEach(async () => {
    store = new RelayStore();
    app = await buildApp({ store, logger: false });
  });

  afterEach(async () => {
    await app.close();
  });

  async function registerAll(): Promise<void> {
    for (const party of [seller, buyer, auditor]) {
      const response = await app.inject({ method: "POST", url: "/parties", payload: party.keys });
      assert.equal(response.statusCode, 201);
    }
  }

  it("should report health", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { status: "ok" });
  });

  describe("parties", () => {
    it("should register and return public keys", async () => {
      await registerAll();

      const response = await app.inject({ method: "GET", url: "/parties/buyer" });
      assert.equal(response.statusCode, 200);
      assert.deepEqual(response.json(), buyer.keys);
    });

    it("should map conflicts, bad keys and unknown parties to statuses", async () => {
      await registerAll();

      const duplicate = await app.inject({ method: "POST", url: "/parties", payload: seller.keys });
      assert.equal(duplicate.statusCode, 409);
      assert.deepEqual(duplicate.json(), { error: "Party already registered: seller", code: "CONFLICT" });

      const badKey = await app.inject({
        method: "POST",
        url: "/parties",
        payload: { id: "mallory", signing_public_key: "not-a-key", encryption_public_key: "not-a-key" },
      });
      assert.equal(badKey.statusCode, 400);
      assert.equal(badKey.json().code, "MALFORMED_KEY");

      const missing = await app.inject({ method: "GET", url: "/parties/nobody" });
      assert.equal(missing.statusCode, 404);
      assert.deepEqual(missing.json(), { error: "party not found: nobody", code: "NOT_FOUND" });
    });
  });

  describe("transactions", () => {
    it("should store and return a record unchanged", async () => {
      const record = protectTestDocument();

      const created = await app.inject({ method: "POST", url: "/transactions", payload: record });
      assert.equal(created.statusCode, 201);

      const fetched = await app.inject({ method: "GET", url: "/transactions/tx-1" });
      assert.equal(fetched.statusCode, 200);
      assert.deepEqual(parseProtectedTransaction(fetched.json()), record);

      const list = await app.inject({ method: "GET", url: "/transactions" });
      assert.deepEqual(list.json(), [
        {
          doc_id: "tx-1",
          kind: "whole",
          seller_id: "seller",
          buyer_id: "buyer",
          state: "SellerProtected",
          bound_hash: record.content_hash,
          sections: null,
          created_at: record.created_at,
        },
      ]);
    });

    it("should reject malformed and duplicate records", async () => {
      const record = protectTestDocument();

      const malformed = await app.inject({
        method: "POST",
        url: "/transactions",
        payload: { ...record, auth_tag: "00" },
      });
      assert.equal(malformed.statusCode, 400);
      assert.deepEqual(malformed.json(), {
        error: "transaction.auth_tag: expected 16 bytes, got 1 bytes",
        code: "STRUCTURAL",
      });

      await app.inject({ method: "POST", url: "/transactions", payload: record });
      const duplicate = await app.inject({ method: "POST", url: "/transactions", payload: record });
      assert.equal(duplicate.statusCode, 409);

      const unknown = await app.inject({ method: "GET", url: "/transactions/tx-404" });
      assert.equal(unknown.statusCode, 404);
    });

    it("should accept a countersigned record once", async () => {
      const record = protectTestDocument();
      await app.inject({ method: "POST", url: "/transactions", payload: record });
      const signed = counterSign(record, buyer.vault, seller.keys.signing_public_key);

      const accepted = await app.inject({ method: "POST", url: "/transactions/tx-1/countersign", payload: signed });
      assert.equal(accepted.statusCode, 200);
      assert.equal(accepted.json().sig_buyer, signed.sig_buyer);

      const again = await app.inject({ method: "POST", url: "/transactions/tx-1/countersign", payload: signed });
      assert.equal(again.statusCode, 409);
    });
  });

  describe("shares", () => {
    it("should relay a disclosure from buyer to auditor end to end", async () => {
      await registerAll();
      const record = counterSign(protectTestDocument(), buyer.vault, seller.keys.signing_public_key);
      await app.inject({ method: "POST", url: "/transactions", payload: record });

      const share = createShareRecord(record, buyer.vault, auditor.recipient);
      const posted = await app.inject({ method: "POST", url: "/transactions/tx-1/shares", payload: share });
      assert.equal(posted.statusCode, 201);

      // The auditor fetches everything from the relay and checks it locally
      const fetchedRecord = parseProtectedTransaction(
        (await app.inject({ method: "GET", url: "/transactions/tx-1" })).json()
      );
      const listed: unknown[] = (await app.inject({ method: "GET", url: "/transactions/tx-1/shares" })).json();
      const fetchedShare = parseShareRecord(listed[0]);

      assert.deepEqual(unprotect(fetchedRecord, auditor.vault, { share: fetchedShare, directory: store.directory }), {
        id: "tx-1",
        amount: 100,
      });
      assert.deepEqual(verify(fetchedRecord, store.directory, [fetchedShare]).shares[0].valid, true);
    });

    it("should filter section shares", async () => {
      await registerAll();
      const record = protectWithLayers({
        document: { id: "tx-9", amount: 250, bank_account: "test-account" },
        sections: { terms: ["id", "amount"], payment: ["bank_account"] },
        seller: seller.vault,
        buyer: buyer.recipient,
      });
      await app.inject({ method: "POST", url: "/transactions", payload: record });

      const [termsShare] = createLayerShareRecords(record, buyer.vault, auditor.recipient, ["terms"]);
      await app.inject({ method: "POST", url: "/transactions/tx-9/shares", payload: termsShare });

      const terms = await app.inject({ method: "GET", url: "/transactions/tx-9/shares?section=terms" });
      const payment = await app.inject({ method: "GET", url: "/transactions/tx-9/shares?section=payment" });
      assert.equal(terms.json().length, 1);
      assert.deepEqual(payment.json(), []);

      const share = parseShareRecord(terms.json()[0]);
      assert.deepEqual(unprotectLayer(record, auditor.vault, "terms", { share, directory: store.directory }), {
        id: "tx-9",
        amount: 250,
      });
    });

    it("should reject a share posted under another transaction", async () => {
      const record = protectTestDocument();
      await app.inject({ method: "POST", url: "/transactions", payload: record });
      const share = createShareRecord(record, buyer.vault, auditor.recipient);

      const unknown = await app.inject({ method: "POST", url: "/transactions/tx-2/shares", payload: share });
      assert.equal(unknown.statusCode, 404);
      assert.equal(unknown.json().code, "NOT_FOUND");
    });
  });

  it("should answer unknown routes with a JSON 404", async () => {
    const response = await app.inject({ method: "GET", url: "/nowhere" });
    assert.equal(response.statusCode, 404);
    assert.deepEqual(response.json(), { error: "Route not found: GET /nowhere", code: "NOT_FOUND" });
  });
});
