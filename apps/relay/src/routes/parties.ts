/**
 * Party routes
 *
 * POST /parties     — Register a party's public signing and encryption keys
 * GET  /parties/:id — Look up a party's public keys
 */

import type { FastifyPluginAsync } from "fastify";
import { parsePartyKeys } from "@tradeseal/protocol";
import type { RelayStore } from "../store.js";

interface PartyParams {
  id: string;
}

export interface PartyRouteOptions {
  store: RelayStore;
}

export const partyRoutes: FastifyPluginAsync<PartyRouteOptions> = async (app, { store }) => {
  app.post<{ Body: unknown }>("/parties", async (request, reply) => {
    const keys = store.registerParty(parsePartyKeys(request.body));
    request.log.info({ event: "party_registered", partyId: keys.id }, "Party registered");
    return reply.status(201).send(keys);
  });

  app.get<{ Params: PartyParams }>("/parties/:id", async (request) => {
    return store.getParty(request.params.id);
  });
};
