/**
 * Error taxonomy.
 *
 * Storage, embedding, final chat and configuration faults propagate to the caller.
 * Extraction and curation completions are fail-soft and never raise these.
 */

export class MemoriaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MemoriaError';
  }
}

// SQLite failure while reading or writing the memory table
export class StorageFault extends MemoriaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageFault';
  }
}

export class EmbeddingFault extends MemoriaError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = 'EmbeddingFault';
    this.status = options?.status;
  }
}

export class CompletionFault extends MemoriaError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = 'CompletionFault';
    this.status = options?.status;
  }
}

export class ConfigError extends MemoriaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// Input rejected before it reaches storage (e.g. embedding dimension mismatch)
export class ValidationError extends MemoriaError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
