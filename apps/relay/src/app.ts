/**
 * Fastify application factory.
 *
 * Kept separate from the entry point so tests can build an app around their
 * own store and drive it with inject().
 */

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { isProtocolError, type ProtocolErrorCode } from "@tradeseal/protocol";
import { config } from "./config.js";
import { ConflictError } from "./errors.js";
import { RelayStore } from "./store.js";
import { partyRoutes } from "./routes/parties.js";
import { transactionRoutes } from "./routes/transactions.js";
import { shareRoutes } from "./routes/shares.js";

export interface BuildAppOptions {
  store?: RelayStore;

  /** Pass false to silence request logging (tests) */
  logger?: boolean;
}

const STATUS_BY_CODE: Record<ProtocolErrorCode, number> = {
  STRUCTURAL: 400,
  MALFORMED_KEY: 400,
  AUTH_FAILURE: 422,
  UNWRAP_FAILURE: 422,
  HASH_MISMATCH: 422,
  SIGNATURE_INVALID: 422,
  ACCESS_DENIED: 403,
  NOT_FOUND: 404,
};

function describeError(error: FastifyError): { status: number; code: string } {
  if (isProtocolError(error)) {
    return { status: STATUS_BY_CODE[error.code], code: error.code };
  }
  if (error instanceof ConflictError) {
    return { status: 409, code: error.code };
  }
  // Fastify's own errors: unparseable JSON, body too large, ...
  if (error.statusCode !== undefined && error.statusCode < 500) {
    return { status: error.statusCode, code: error.code };
  }
  return { status: 500, code: "INTERNAL" };
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const store = options.store ?? new RelayStore();

  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
    bodyLimit: config.bodyLimit,
  });

  await app.register(cors, {
    origin: config.corsOrigin,
    methods: ["GET", "POST"],
  });

  app.setErrorHandler((error, request, reply) => {
    const { status, code } = describeError(error);

    if (status >= 500) {
      request.log.error({ err: error }, "Request failed");
      return reply.status(status).send({ error: "Internal Server Error", code });
    }

    // Structured log for audit; messages never carry plaintext or key material
    request.log.warn(
      { event: "request_rejected", method: request.method, url: request.url, status, code },
      error.message
    );
    return reply.status(status).send({ error: error.message, code });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ error: `Route not found: ${request.method} ${request.url}`, code: "NOT_FOUND" });
  });

  await app.register(partyRoutes, { store });
  await app.register(transactionRoutes, { store });
  await app.register(shareRoutes, { store });

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}
