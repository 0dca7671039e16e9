/**
 * Relay server — Entry Point
 *
 * Starts the Fastify relay on the configured host and port.
 */

import { buildApp } from "./app.js";
import { config } from "./config.js";

const app = await buildApp();

try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port, host: config.host }, "Relay listening");
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, "Received shutdown signal");
  try {
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
