/**
 * Transaction routes
 *
 * POST /transactions                     — Store a protected or layered record
 * GET  /transactions                     — List stored records (summary only)
 * GET  /transactions/:docId              — Retrieve a stored record
 * POST /transactions/:docId/countersign  — Replace a record with its countersigned version
 *
 * Records stay encrypted end to end; the relay never holds a private key.
 */

import type { FastifyPluginAsync } from "fastify";
import { parseAnyTransaction } from "@tradeseal/protocol";
import type { RelayStore } from "../store.js";

interface DocParams {
  docId: string;
}

export interface TransactionRouteOptions {
  store: RelayStore;
}

export const transactionRoutes: FastifyPluginAsync<TransactionRouteOptions> = async (app, { store }) => {
  app.post<{ Body: unknown }>("/transactions", async (request, reply) => {
    const record = parseAnyTransaction(request.body);
    store.addTransaction(record);

    request.log.info(
      { event: "transaction_stored", docId: record.doc_id, sellerId: record.seller_id, buyerId: record.buyer_id },
      "Transaction stored"
    );
    return reply.status(201).send(record);
  });

  app.get("/transactions", async () => store.listTransactions());

  app.get<{ Params: DocParams }>("/transactions/:docId", async (request) => {
    return store.getTransaction(request.params.docId);
  });

  app.post<{ Params: DocParams; Body: unknown }>("/transactions/:docId/countersign", async (request) => {
    const { docId } = request.params;
    const record = store.countersign(docId, parseAnyTransaction(request.body));

    request.log.info({ event: "transaction_countersigned", docId }, "Transaction countersigned");
    return record;
  });
};
