/**
 * Base class for all domain errors.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when a page fails to load (timeout or network failure).
 */
export class NavigationError extends DomainError {
  constructor(
    public readonly url: string,
    reason: string,
    public readonly isRetryable: boolean = true
  ) {
    super(`Failed to navigate to ${url}: ${reason}`);
  }
}

/**
 * Error thrown when a selector cannot be resolved or an element
 * operation fails on the page.
 */
export class SelectorError extends DomainError {
  constructor(
    public readonly selector: string,
    public readonly originalError?: unknown
  ) {
    const detail = originalError instanceof Error ? originalError.message : String(originalError);
    super(`Selector '${selector}' failed: ${detail}`);
  }
}

/**
 * Error thrown when configuration is missing or invalid.
 */
export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Normalizes an unknown thrown value into a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
