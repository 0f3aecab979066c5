import { Queue, type ConnectionOptions } from "bullmq";
import { loadConfig } from "./config";
import type { ExportFormat } from "./types";

export const exportQueueName = "exports";
export const exportJobName = "export";

export type ExportJobData = {
  compareId: string;
  format: ExportFormat;
};

/** What the HTTP layer needs from the queue; tests pass an in-memory implementation. Jobs are keyed by `exportJobId`. */
export interface ExportQueue {
  enqueue(data: ExportJobData): Promise<void>;
}

export function exportJobId(data: ExportJobData): string {
  return `${data.compareId}__export_${data.format}`;
}

export function redisConnection(redisUrl = loadConfig().redisUrl): ConnectionOptions {
  const u = new URL(redisUrl);
  const db = u.pathname.replace(/^\//, "");
  return {
    host: u.hostname,
    port: u.port ? Number(u.port) : 6379,
    username: u.username ? decodeURIComponent(u.username) : undefined,
    password: u.password ? decodeURIComponent(u.password) : undefined,
    db: db ? Number(db) : undefined,
    maxRetriesPerRequest: null
  };
}

let queue: Queue<ExportJobData> | null = null;

function getQueue(): Queue<ExportJobData> {
  if (!queue) queue = new Queue<ExportJobData>(exportQueueName, { connection: redisConnection() });
  return queue;
}

export const bullExportQueue: ExportQueue = {
  async enqueue(data) {
    const jobId = exportJobId(data);
    // A finished job with the same id would make add() a no-op.
    const previous = await getQueue().getJob(jobId);
    if (previous && ((await previous.isCompleted()) || (await previous.isFailed()))) await previous.remove();
    await getQueue().add(exportJobName, data, {
      jobId,
      attempts: 3,
      backoff: { type: "exponential", delay: 2_000 }
    });
  }
};

export async function closeExportQueue(): Promise<void> {
  if (queue) {
    await queue.close();
    queue = null;
  }
}
