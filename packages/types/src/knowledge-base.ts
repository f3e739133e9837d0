export interface KnowledgeBaseDescriptor {
  name: string;
  description: string;
  category: string;
  descriptionEmbedding: number[];
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateKnowledgeBaseRequest {
  name: string;
  description: string;
  category?: string;
}

export interface UpdateKnowledgeBaseRequest {
  description?: string;
  category?: string;
}

/**
 * Durable home of knowledge base descriptors. `list()` returns descriptors
 * in the order they were first created.
 */
export interface IKnowledgeBaseStore {
  list(): Promise<KnowledgeBaseDescriptor[]>;
  get(name: string): Promise<KnowledgeBaseDescriptor | null>;
  /** Stores the descriptor unless the name is taken. False when it was. */
  insert(descriptor: KnowledgeBaseDescriptor): Promise<boolean>;
  upsert(descriptor: KnowledgeBaseDescriptor): Promise<void>;
  remove(name: string): Promise<boolean>;
}

export interface RouteMatch {
  knowledgeBase: string;
  score: number;
  description: string;
  category: string;
}

export type RouteMissReason = "no-descriptors" | "below-floor";

export interface RouteResult {
  knowledgeBase: string | null;
  score: number;
  matches: RouteMatch[];
  reason?: RouteMissReason;
}
