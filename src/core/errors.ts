/**
 * Error types raised by the engine. Expected absence (missing fields, missing
 * vision document) is never an error; these cover misconfiguration and
 * integration mistakes only.
 */

/** Thrown by createGateConfig when any setting is out of range */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/** Two non-empty embeddings of different length were compared */
export class EmbeddingShapeError extends Error {
  constructor(readonly left: number, readonly right: number) {
    super(`Embedding length mismatch: ${left} vs ${right}`);
    this.name = 'EmbeddingShapeError';
  }
}

/** Snapshot JSON did not have the expected shape */
export class SnapshotError extends Error {
  constructor(message: string, readonly path: string) {
    super(`${path}: ${message}`);
    this.name = 'SnapshotError';
  }
}

/** Non-2xx response from an LLM or embedding endpoint */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly retryAfter?: number,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/** Vision document exists but is not valid YAML of the expected shape */
export class VisionDocumentError extends Error {
  constructor(message: string, readonly source: string) {
    super(`${source}: ${message}`);
    this.name = 'VisionDocumentError';
  }
}
