import { parseEnv } from "@stratarag/config";
import { createLogger } from "@stratarag/logger";
import { createQueues, parseRedisConnection } from "@stratarag/queue";
import { createPipelineServices } from "@stratarag/runtime";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = parseEnv(process.env);
  const logger = createLogger({ level: config.logLevel, service: "stratarag-api" });
  const services = await createPipelineServices(config, logger);
  const { ingestQueue, deleteDocumentQueue } = createQueues({
    connection: parseRedisConnection(config.redis.url),
  });

  const app = createApp({
    services,
    queues: { ingest: ingestQueue, deleteDocument: deleteDocumentQueue },
  });
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, vectorStore: config.vectorStore.provider }, "api listening");
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "shutting down");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await Promise.all([ingestQueue.close(), deleteDocumentQueue.close()]);
    await services.close();
    logger.info("api stopped");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  createLogger({ service: "stratarag-api" }).fatal({ err }, "api failed to start");
  process.exit(1);
});
