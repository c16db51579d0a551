// A memory is a short fact about the user, optionally embedded for semantic recall.

export interface MemoryMetadata {
  importance?: number;          // 1-10, as scored at extraction time
  category?: string;            // e.g. "preference", "fact", "personal_info"
  entities?: string[];          // Named things the memory mentions, in order
  extra?: Record<string, unknown>;  // Forward-compatible keys
}

export interface MemoryRecord {
  id: number;
  content: string;
  embedding: Float32Array | null;
  createdAt: Date;
  updatedAt: Date;
  metadata: MemoryMetadata;
}

export interface MemoryUpdate {
  content?: string;
  embedding?: Float32Array;
  metadata?: MemoryMetadata;
}

export interface RankedMemory {
  memory: MemoryRecord;
  similarity: number;      // Raw cosine similarity (-1..1), 0 when not comparable
}

// What the completion service proposes for storage
export interface CandidateMemory {
  content: string;
  importance?: number;
  category?: string;
  entities?: string[];
}

// Compact id+content view handed to the curation prompt
export interface MemoryListing {
  id: number;
  content: string;
}

export interface ProcessOptions {
  extract?: boolean;
  curate?: boolean;
  limit?: number;
}

export interface ProcessResult {
  newMemories: MemoryRecord[];
  deletedMemories: number[];
  relevantMemories: RankedMemory[];
}

export interface GenerationParams {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface RespondOptions extends GenerationParams {
  extract?: boolean;
  curate?: boolean;
}

export interface RespondResult extends ProcessResult {
  response: string;
}
