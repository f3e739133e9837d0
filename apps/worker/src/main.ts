import { parseEnv } from "@stratarag/config";
import { createLogger } from "@stratarag/logger";
import { QUEUE_NAMES, createDeadLetterQueue, parseRedisConnection } from "@stratarag/queue";
import { createPipelineServices } from "@stratarag/runtime";
import { createWorkers } from "./workers.js";

async function main(): Promise<void> {
  const config = parseEnv(process.env);
  const logger = createLogger({ level: config.logLevel, service: "stratarag-worker" });
  if (config.vectorStore.provider === "memory") {
    logger.warn("VECTOR_STORE=memory: chunks written by this worker are not visible to the API process");
  }

  const connection = parseRedisConnection(config.redis.url);
  const services = await createPipelineServices(config, logger);
  const deadLetter = createDeadLetterQueue(connection);
  const workers = createWorkers({ connection, services, deadLetter });

  logger.info({ workers: workers.length, queues: Object.values(QUEUE_NAMES) }, "worker started");

  const shutdown = async (): Promise<void> => {
    logger.info("shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await deadLetter.close();
    await services.close();
    logger.info("all workers closed");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err: unknown) => {
  createLogger({ service: "stratarag-worker" }).fatal({ err }, "worker failed to start");
  process.exit(1);
});
