import { createApp } from "./app";
import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/logger";
import { bullExportQueue, closeExportQueue } from "./lib/queue";

const log = createLogger("server");
const config = loadConfig();

const app = createApp({ exportQueue: bullExportQueue });
const server = app.listen(config.port, () => {
  log.info({ port: config.port, artifactsDir: config.artifactsDir }, "api listening");
});

function shutdown(signal: string): void {
  log.info({ signal }, "shutting down");
  server.close(() => {
    closeExportQueue()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, "queue close failed");
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
