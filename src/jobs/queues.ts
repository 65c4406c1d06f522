import { Queue, type JobsOptions } from "bullmq";
import type { Redis } from "ioredis";
import { forgetJobId, type ForgetJobData, type ForgetQueue } from "./forgetCompany.worker.js";

export const FORGET_QUEUE = "forget_company";

// The part of a BullMQ Queue the forget queue uses.
export type ForgetJobQueue = {
  add(name: string, data: ForgetJobData, opts?: JobsOptions): Promise<unknown>;
  close(): Promise<void>;
};

export function createForgetQueue(connection: Redis): Queue<ForgetJobData> {
  return new Queue<ForgetJobData>(FORGET_QUEUE, { connection });
}

/**
 * Hands forget requests to the BullMQ worker process. The job id is fixed per
 * company so repeated requests collapse while one is pending; finished and
 * failed jobs are removed so a later request for the same company runs again.
 */
export class BullForgetQueue implements ForgetQueue {
  constructor(private readonly queue: ForgetJobQueue) {}

  async enqueue(companyHash: string): Promise<string> {
    const jobId = forgetJobId(companyHash);
    await this.queue.add(FORGET_QUEUE, { companyHash }, {
      jobId,
      attempts: 3,
      backoff: { type: "exponential", delay: 1000 },
      removeOnComplete: true,
      removeOnFail: true
    });
    return jobId;
  }

  close(): Promise<void> {
    return this.queue.close();
  }
}
