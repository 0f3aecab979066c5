import { Worker } from "bullmq";
import { loadConfig } from "./lib/config";
import { processExportJob, recordExportFailure } from "./lib/exportJob";
import { createLogger } from "./lib/logger";
import { exportQueueName, redisConnection, type ExportJobData } from "./lib/queue";

const log = createLogger("worker");
const config = loadConfig();

const worker = new Worker<ExportJobData, string>(
  exportQueueName,
  async (job) => {
    log.info({ jobId: job.id, ...job.data, attempt: job.attemptsMade + 1 }, "export job started");
    return processExportJob(job);
  },
  { connection: redisConnection(config.redisUrl), concurrency: 2 }
);

worker.on("failed", (job, err) => {
  if (!job) {
    log.error({ err }, "export job failed without job context");
    return;
  }
  recordExportFailure(job, err).catch((e: unknown) => {
    log.error({ err: e, jobId: job.id }, "could not record export failure");
  });
});

worker.on("error", (err) => {
  log.error({ err }, "worker error");
});

log.info({ queue: exportQueueName }, "export worker started");

async function shutdown(signal: string): Promise<void> {
  log.info({ signal }, "worker shutting down");
  await worker.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    log.error({ err }, "worker close failed");
    process.exit(1);
  });
}

process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGTERM", () => onSignal("SIGTERM"));
