import { createServer } from "http";
import { createApp } from "./app";
import { config } from "./config";
import { withSource } from "./logger";
import { Deduplicator } from "./utils/deduplication";

const bootLog = withSource("boot");
bootLog.info({ env: config.nodeEnv, port: config.port }, "starting server");
bootLog.info(
  {
    logLevel: config.logLevel,
    metricsEnabled: config.metricsEnabled,
    maxDocumentBytes: config.maxDocumentBytes,
    dedup: { ...config.dedup, seeded: config.dedup.seed !== undefined },
  },
  "environment summary"
);

// Throws IllegalConfigurationError on a bad DEDUP_* combination
const deduplicator = new Deduplicator(config.dedup);
const app = createApp({ deduplicator, metricsEnabled: config.metricsEnabled });
const server = createServer(app);

function setupShutdown() {
  const stopOnce = () => {
    bootLog.info("shutting down");
    server.close((err) => {
      if (err) {
        bootLog.error({ err }, "error while closing server");
        process.exitCode = 1;
      }
    });
  };
  process.once("SIGINT", stopOnce);
  process.once("SIGTERM", stopOnce);
}
setupShutdown();

server.listen(config.port, "0.0.0.0", () => {
  bootLog.info({ port: config.port }, "serving");
});
