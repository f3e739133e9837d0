import { Router } from "express";
import { AppError } from "@stratarag/errors";
import { answer } from "@stratarag/core";
import { createLoggerTraceSink } from "@stratarag/logger";
import type { ApiContext } from "../context.js";
import { handle, parseBody, send } from "../http.js";
import { responseSignal } from "../middleware/abort.js";
import { requestLogger } from "../middleware/request-context.js";
import { answerSchema, routeSchema, searchSchema } from "../schemas.js";

export function queryRoutes({ services }: ApiContext): Router {
  const router = Router();

  router.post(
    "/search",
    handle(async (req, res) => {
      const body = parseBody(searchSchema, req.body);
      const logger = requestLogger(req, services.logger);
      const results = await services.retriever.search(body, {
        signal: responseSignal(res),
        trace: createLoggerTraceSink(logger),
      });
      send(res, 200, results);
    }),
  );

  router.post(
    "/route",
    handle(async (req, res) => {
      const body = parseBody(routeSchema, req.body);
      const logger = requestLogger(req, services.logger);
      const result = await services.router.routeQuery(body.query, {
        topK: body.topK,
        candidates: body.candidates,
        signal: responseSignal(res),
        trace: createLoggerTraceSink(logger),
      });
      send(res, 200, result);
    }),
  );

  router.post(
    "/answer",
    handle(async (req, res) => {
      const deps = services.answer;
      if (!deps) {
        throw new AppError({
          message: "Answer generation is not configured",
          statusCode: 503,
          code: "LLM_UNAVAILABLE",
        });
      }
      const body = parseBody(answerSchema, req.body);
      const logger = requestLogger(req, services.logger);
      const result = await answer(body, { ...deps, logger }, {
        signal: responseSignal(res),
        trace: createLoggerTraceSink(logger),
      });
      send(res, 200, result);
    }),
  );

  return router;
}
