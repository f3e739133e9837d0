import { Router } from "express";
import type { ApiContext } from "../context.js";
import { handle } from "../http.js";

export function healthRoutes({ services }: ApiContext): Router {
  const router = Router();

  router.get(
    "/health",
    handle(async (_req, res) => {
      const vectorStore = await services.vectorStore.healthCheck().catch((err: unknown) => {
        services.logger.warn({ err }, "vector store health check failed");
        return false;
      });
      res.status(vectorStore ? 200 : 503).json({
        success: vectorStore,
        data: { status: vectorStore ? "ok" : "degraded", checks: { vectorStore } },
      });
    }),
  );

  return router;
}
