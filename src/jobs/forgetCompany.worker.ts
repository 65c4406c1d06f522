import type { CompanyIndex } from "../cache/CompanyIndex.js";
import { createLogger } from "../logging/logger.js";

const log = createLogger("forget-company");

// Only the keyed hash of the company id ever travels through the queue.
export type ForgetJobData = { companyHash: string };

export type ForgetJobResult = { evicted: number };

export interface ForgetQueue {
  enqueue(companyHash: string): Promise<string>;
}

export function forgetJobId(companyHash: string): string {
  return `forget-${companyHash}`;
}

export function createForgetCompanyJob(index: CompanyIndex) {
  return async function forgetCompanyJob(job: { data: ForgetJobData }): Promise<ForgetJobResult> {
    const { companyHash } = job.data;
    const evicted = await index.evict(companyHash);
    log.info("company forgotten", { companyHash, evicted });
    return { evicted };
  };
}

/**
 * Runs forget jobs in this process. Used when no Redis is configured, where
 * the cache is process-local anyway.
 */
export class InlineForgetQueue implements ForgetQueue {
  private readonly job: ReturnType<typeof createForgetCompanyJob>;
  private readonly pending = new Set<Promise<unknown>>();

  constructor(index: CompanyIndex) {
    this.job = createForgetCompanyJob(index);
  }

  async enqueue(companyHash: string): Promise<string> {
    const run = this.job({ data: { companyHash } })
      .catch((err: unknown) => log.error("forget job failed", { companyHash, error: err }))
      .finally(() => this.pending.delete(run));
    this.pending.add(run);
    return forgetJobId(companyHash);
  }

  /** Resolves once every job enqueued so far has finished. */
  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
