export class PageStackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The request was rejected before any side effect: empty key, bad pop count,
 * unknown destination, duplicate page id or a disposed stack.
 */
export class PreconditionViolationError extends PageStackError {}

export class ResourceLoadError extends PageStackError {
  public readonly key: string;

  constructor(key: string, cause?: unknown) {
    super(`Failed to load asset: "${key}"`, { cause });
    this.key = key;
  }
}

export class DuplicatePreloadError extends PageStackError {
  public readonly key: string;

  constructor(key: string) {
    super(`The resource with key "${key}" has already been preloaded.`);
    this.key = key;
  }
}

export class TransitionCancelledError extends PageStackError {
  constructor(message = 'Transition cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isTransitionCancelled(
  error: unknown
): error is TransitionCancelledError {
  return error instanceof TransitionCancelledError;
}
