/**
 * Share routes
 *
 * POST /transactions/:docId/shares           — Store a signed share record
 * GET  /transactions/:docId/shares?section=  — List share records, optionally for one section
 */

import type { FastifyPluginAsync } from "fastify";
import { parseShareRecord } from "@tradeseal/protocol";
import type { RelayStore } from "../store.js";

interface DocParams {
  docId: string;
}

interface ShareQuery {
  section?: string;
}

export interface ShareRouteOptions {
  store: RelayStore;
}

export const shareRoutes: FastifyPluginAsync<ShareRouteOptions> = async (app, { store }) => {
  app.post<{ Params: DocParams; Body: unknown }>("/transactions/:docId/shares", async (request, reply) => {
    const { docId } = request.params;
    const share = parseShareRecord(request.body);
    store.addShare(docId, share);

    request.log.info(
      {
        event: "share_stored",
        docId,
        shareId: share.share_id,
        fromId: share.from_id,
        toId: share.to_id,
        section: share.section ?? null,
      },
      "Share record stored"
    );
    return reply.status(201).send(share);
  });

  app.get<{ Params: DocParams; Querystring: ShareQuery }>("/transactions/:docId/shares", async (request) => {
    return store.listShares(request.params.docId, request.query.section);
  });
};
