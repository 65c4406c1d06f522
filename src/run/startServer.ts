import { createApp, VERSION } from "../app.js";
import { loadConfigFromProcess } from "../config/env.js";
import { createServer } from "../http/server.js";
import { createLogger, setLogLevel } from "../logging/logger.js";

const log = createLogger("server");

async function main() {
  const config = loadConfigFromProcess();
  setLogLevel(config.logLevel);

  const app = createApp(config);
  const server = createServer({
    orchestrator: app.orchestrator,
    rateLimiter: app.rateLimiter,
    forgetQueue: app.forgetQueue,
    hashIdentifier: app.hashIdentifier,
    apiKeys: config.apiKeys,
    adminApiKeys: config.adminApiKeys,
    version: VERSION
  });

  server.listen(config.port, () => {
    log.info("server listening", { port: config.port, store: app.store.name, version: VERSION });
  });

  const shutdown = () => {
    log.info("shutting down");
    server.close(() => {
      app.close().then(
        () => process.exit(0),
        (e: unknown) => {
          log.error("shutdown failed", { error: e });
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((e: unknown) => {
  log.error("startup failed", { error: e });
  process.exit(1);
});
