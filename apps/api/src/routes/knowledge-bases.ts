import { Router } from "express";
import type { KnowledgeBaseDescriptor } from "@stratarag/types";
import type { ApiContext } from "../context.js";
import { handle, param, parseBody, send } from "../http.js";
import { createKnowledgeBaseSchema, updateKnowledgeBaseSchema } from "../schemas.js";

/** The description embedding stays server-side; only its size is exposed. */
export function toKnowledgeBaseView(descriptor: KnowledgeBaseDescriptor) {
  return {
    name: descriptor.name,
    description: descriptor.description,
    category: descriptor.category,
    dimensions: descriptor.descriptionEmbedding.length,
    createdAt: descriptor.createdAt.toISOString(),
    updatedAt: descriptor.updatedAt.toISOString(),
  };
}

export function knowledgeBaseRoutes({ services }: ApiContext): Router {
  const router = Router();
  const manager = services.knowledgeBases;

  router.post(
    "/",
    handle(async (req, res) => {
      const body = parseBody(createKnowledgeBaseSchema, req.body);
      const created = await manager.create(body);
      send(res, 201, toKnowledgeBaseView(created));
    }),
  );

  router.get(
    "/",
    handle(async (_req, res) => {
      const all = await manager.list();
      send(res, 200, all.map(toKnowledgeBaseView));
    }),
  );

  router.get(
    "/:name",
    handle(async (req, res) => {
      send(res, 200, toKnowledgeBaseView(await manager.get(param(req, "name"))));
    }),
  );

  router.patch(
    "/:name",
    handle(async (req, res) => {
      const body = parseBody(updateKnowledgeBaseSchema, req.body);
      const updated = await manager.update(param(req, "name"), body);
      send(res, 200, toKnowledgeBaseView(updated));
    }),
  );

  router.delete(
    "/:name",
    handle(async (req, res) => {
      const name = param(req, "name");
      await manager.delete(name);
      send(res, 200, { name, deleted: true });
    }),
  );

  return router;
}
