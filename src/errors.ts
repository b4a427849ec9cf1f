// Failure taxonomy for ingestion and storage. Source-level failures are isolated per source,
// store failures propagate to the caller, config failures are rejected before anything is scheduled.

export class AddonError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or file fetch failed for one playlist/guide source. */
export class SourceUnavailable extends AddonError {
  readonly source: string;
  constructor(source: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.source = source;
  }
}

/** Malformed playlist or guide content. */
export class ParseFailure extends AddonError {
  readonly source: string;
  constructor(source: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.source = source;
  }
}

/** Backing key-value store unreachable after retries. */
export class StoreUnavailable extends AddonError {}

export class ConfigInvalid extends AddonError {
  readonly field?: string;
  constructor(message: string, field?: string, options?: ErrorOptions) {
    super(message, options);
    this.field = field;
  }
}

export function formatError(error: unknown): string {
  let message: string;
  if (error instanceof Error) {
    message = error.message;
  } else if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    message = error.message;
  } else {
    message = String(error);
  }
  // trailing punctuation would double up with the caller's own
  return message.replace(/[.!?]+$/, '');
}
