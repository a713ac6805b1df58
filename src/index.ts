import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { makeLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = makeLogger(config.logLevel);
const app = buildApp(config, { logger });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      },
    );
  });
}

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info(`Payment broker listening on http://${config.host}:${config.port}`);
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "Failed to start");
    process.exit(1);
  });
