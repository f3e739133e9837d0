import type {
  CreateKnowledgeBaseRequest,
  IKnowledgeBaseStore,
  KnowledgeBaseDescriptor,
  UpdateKnowledgeBaseRequest,
} from "@stratarag/types";
import {
  ConflictError,
  ExternalServiceError,
  NotFoundError,
  ValidationError,
} from "@stratarag/errors";
import type { IEmbeddingProvider } from "@stratarag/embeddings";
import type { IVectorStore } from "@stratarag/vector-store";
import type { Logger } from "@stratarag/logger";
import type { SemanticRouter } from "./semantic-router.js";

export const KNOWLEDGE_BASE_NAME = /^[A-Za-z0-9_-]{1,64}$/;
const DEFAULT_CATEGORY = "general";

export interface KnowledgeBaseManagerDeps {
  store: IKnowledgeBaseStore;
  vectorStore: IVectorStore;
  embeddingProvider: IEmbeddingProvider;
  router: SemanticRouter;
  logger?: Logger;
  now?: () => Date;
}

export function validateKnowledgeBaseName(name: string): void {
  if (!KNOWLEDGE_BASE_NAME.test(name)) {
    throw new ValidationError("Invalid knowledge base name", {
      name: "1-64 characters: letters, digits, '-' or '_'",
    });
  }
}

/**
 * Knowledge base lifecycle. Every change that affects routing refreshes the
 * router before returning.
 */
export class KnowledgeBaseManager {
  private readonly deps: KnowledgeBaseManagerDeps;
  private readonly now: () => Date;

  constructor(deps: KnowledgeBaseManagerDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  async list(): Promise<KnowledgeBaseDescriptor[]> {
    return this.deps.store.list();
  }

  async get(name: string): Promise<KnowledgeBaseDescriptor> {
    const descriptor = await this.deps.store.get(name);
    if (!descriptor) {
      throw new NotFoundError(`Knowledge base '${name}' not found`);
    }
    return descriptor;
  }

  async create(request: CreateKnowledgeBaseRequest): Promise<KnowledgeBaseDescriptor> {
    validateKnowledgeBaseName(request.name);
    const description = request.description.trim();
    if (description.length === 0) {
      throw new ValidationError("Description is required", { description: "required" });
    }
    if (await this.deps.store.get(request.name)) {
      throw new ConflictError(`Knowledge base '${request.name}' already exists`);
    }

    const embedding = await this.embedDescription(description);
    await this.deps.vectorStore.ensureCollection(request.name, embedding.length);

    const timestamp = this.now();
    const descriptor: KnowledgeBaseDescriptor = {
      name: request.name,
      description,
      category: request.category?.trim() || DEFAULT_CATEGORY,
      descriptionEmbedding: embedding,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    // A concurrent create of the same name may have won since the check above
    if (!(await this.deps.store.insert(descriptor))) {
      throw new ConflictError(`Knowledge base '${request.name}' already exists`);
    }
    await this.deps.router.refresh();

    this.deps.logger?.info({ kb: descriptor.name, dimensions: embedding.length }, "knowledge base created");
    return descriptor;
  }

  async update(name: string, request: UpdateKnowledgeBaseRequest): Promise<KnowledgeBaseDescriptor> {
    const current = await this.get(name);
    const description = request.description?.trim();
    if (description !== undefined && description.length === 0) {
      throw new ValidationError("Description must not be empty", { description: "empty" });
    }

    const category = request.category?.trim() || current.category;
    const newDescription =
      description !== undefined && description !== current.description ? description : undefined;
    if (newDescription === undefined && category === current.category) {
      return current;
    }

    const updated: KnowledgeBaseDescriptor = { ...current, category, updatedAt: this.now() };
    if (newDescription !== undefined) {
      updated.description = newDescription;
      updated.descriptionEmbedding = await this.embedDescription(newDescription);
    }
    await this.deps.store.upsert(updated);
    await this.deps.router.refresh();

    this.deps.logger?.info({ kb: name, reembedded: newDescription !== undefined }, "knowledge base updated");
    return updated;
  }

  async delete(name: string): Promise<void> {
    await this.get(name);
    await this.deps.vectorStore.deleteCollection(name);
    await this.deps.store.remove(name);
    await this.deps.router.refresh();
    this.deps.logger?.info({ kb: name }, "knowledge base deleted");
  }

  private async embedDescription(description: string): Promise<number[]> {
    const { embeddings } = await this.deps.embeddingProvider.embed(description, { inputType: "document" });
    const vector = embeddings[0];
    if (!vector || vector.length === 0) {
      throw new ExternalServiceError("Embedding provider returned no vector", this.deps.embeddingProvider.name);
    }
    return vector;
  }
}
