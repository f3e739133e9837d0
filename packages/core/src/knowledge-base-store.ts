import type { IKnowledgeBaseStore, KnowledgeBaseDescriptor } from "@stratarag/types";

function copy(descriptor: KnowledgeBaseDescriptor): KnowledgeBaseDescriptor {
  return { ...descriptor, descriptionEmbedding: [...descriptor.descriptionEmbedding] };
}

/** Process-local descriptor store, used when no database is configured. */
export class InMemoryKnowledgeBaseStore implements IKnowledgeBaseStore {
  // Map iteration order is insertion order, which is creation order here
  private descriptors = new Map<string, KnowledgeBaseDescriptor>();

  async list(): Promise<KnowledgeBaseDescriptor[]> {
    return [...this.descriptors.values()].map(copy);
  }

  async get(name: string): Promise<KnowledgeBaseDescriptor | null> {
    const descriptor = this.descriptors.get(name);
    return descriptor ? copy(descriptor) : null;
  }

  async insert(descriptor: KnowledgeBaseDescriptor): Promise<boolean> {
    if (this.descriptors.has(descriptor.name)) {
      return false;
    }
    this.descriptors.set(descriptor.name, copy(descriptor));
    return true;
  }

  async upsert(descriptor: KnowledgeBaseDescriptor): Promise<void> {
    this.descriptors.set(descriptor.name, copy(descriptor));
  }

  async remove(name: string): Promise<boolean> {
    return this.descriptors.delete(name);
  }
}
