/**
 * Error types shared across the pipeline stages
 */

interface StoreUnavailableOptions extends ErrorOptions {
  dbPath?: string;
  troubleshooting?: string[];
}

export class StoreUnavailableError extends Error {
  readonly dbPath?: string;

  readonly troubleshooting: string[];

  constructor(message: string, { dbPath, troubleshooting = [], ...options }: StoreUnavailableOptions = {}) {
    super(message, options);
    this.name = 'StoreUnavailableError';
    this.dbPath = dbPath;
    this.troubleshooting = troubleshooting;
  }
}

export function isStoreUnavailableError(error: unknown): error is StoreUnavailableError {
  return error instanceof StoreUnavailableError;
}

/**
 * A model or speech response that arrived but cannot be used (empty, not JSON,
 * wrong shape). Always treated as transient.
 */
export class MalformedResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}
