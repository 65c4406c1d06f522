import { createApp } from "../app.js";
import { loadConfigFromProcess } from "../config/env.js";
import { compactIdentifier } from "../domain/normalize.js";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../logging/logger.js";

const log = createLogger("forget");

async function main() {
  const companyId = process.argv[2];
  if (!companyId) throw new Error("Usage: npm run forget -- <companyId>");

  const config = loadConfigFromProcess();
  // Without Redis the cache lives inside the server process; nothing to reach from here.
  if (!config.redisUrl) throw new ConfigurationError("REDIS_URL is required to enqueue forget jobs");

  const app = createApp(config);
  try {
    const companyHash = app.hashIdentifier(compactIdentifier(companyId));
    const jobId = await app.forgetQueue.enqueue(companyHash);
    log.info("forget enqueued", { companyHash, jobId });
  } finally {
    await app.close();
  }
}

main().catch((e: unknown) => {
  log.error("forget failed", { error: e });
  process.exit(1);
});
