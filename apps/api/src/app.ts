import express from "express";
import type { Express } from "express";
import type { ApiContext } from "./context.js";
import { createRequestContextMiddleware } from "./middleware/request-context.js";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { knowledgeBaseRoutes } from "./routes/knowledge-bases.js";
import { documentRoutes } from "./routes/documents.js";
import { queryRoutes } from "./routes/query.js";
import { healthRoutes } from "./routes/health.js";

/** Base64 inflates by a third; this admits documents of roughly 37 MB. */
const BODY_LIMIT = "50mb";

export function createApp(context: ApiContext): Express {
  const { logger } = context.services;
  const app = express();

  app.disable("x-powered-by");
  app.use(createRequestContextMiddleware(logger));
  app.use(express.json({ limit: BODY_LIMIT }));

  app.use(healthRoutes(context));
  app.use("/v1/knowledge-bases/:name/documents", documentRoutes(context));
  app.use("/v1/knowledge-bases", knowledgeBaseRoutes(context));
  app.use("/v1", queryRoutes(context));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));
  return app;
}
