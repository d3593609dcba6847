import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);
const app = buildApp({ config, logger });

app
  .listen({ port: config.port, host: config.host })
  .then((address) => {
    logger.info({ address }, "payment processor core listening");
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "failed to start");
    process.exit(1);
  });
