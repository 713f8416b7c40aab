// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint.
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";

import { buildApp } from "./app.js";

const { app, runtime } = buildApp();
const { logger, searchController, store } = runtime;

const server = serve({ fetch: app.fetch, port: runtime.config.port }, (info) => {
  logger.info({ port: info.port }, "listening");
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "shutting down");
  await searchController.cancel();
  try {
    store.flush();
  } catch (err) {
    logger.error({ err }, "library list could not be saved on exit");
  }
  server.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}
