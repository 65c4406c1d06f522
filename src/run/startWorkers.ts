import { Worker } from "bullmq";
import { createRedis } from "../app.js";
import { CompanyIndex } from "../cache/CompanyIndex.js";
import { RedisStore } from "../cache/RedisStore.js";
import { loadConfigFromProcess } from "../config/env.js";
import { ConfigurationError } from "../errors.js";
import { createForgetCompanyJob, type ForgetJobData, type ForgetJobResult } from "../jobs/forgetCompany.worker.js";
import { FORGET_QUEUE } from "../jobs/queues.js";
import { createLogger, setLogLevel } from "../logging/logger.js";

const log = createLogger("workers");

const config = loadConfigFromProcess();
setLogLevel(config.logLevel);
if (!config.redisUrl) throw new ConfigurationError("REDIS_URL is required to run workers");

// Separate connections: BullMQ blocks its worker connection.
const index = new CompanyIndex(new RedisStore(createRedis(config.redisUrl, "store")));

const worker = new Worker<ForgetJobData, ForgetJobResult>(FORGET_QUEUE, createForgetCompanyJob(index), {
  connection: createRedis(config.redisUrl, "queue"),
  concurrency: 2
});

worker.on("failed", (job, err) => {
  log.error("forget job failed", { jobId: job?.id, attempts: job?.attemptsMade, error: err });
});

log.info("Workers started.");
