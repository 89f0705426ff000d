/**
 * Cache Errors & Failure Messages
 *
 * Error classes thrown inside the cache layer, and the mapping from failure
 * reasons to messages that are safe to show to callers.
 * Never expose stack traces or technical details in user messages.
 */

export type FailureReason =
  | "NOT_FOUND"
  | "PROVIDER_ERROR"
  | "DECODE_ERROR"
  | "STORE_ERROR"
  | "INVALID_KEY"
  | "INVALID_ARGUMENT"
  | "UNKNOWN_ERROR";

export interface FailureMessageInfo {
  userMessage: string;
  retryable: boolean;
  suggestedAction?: string;
}

/**
 * Base class for every failure raised by the cache layer
 */
export class CacheError extends Error {
  readonly reason: FailureReason;

  constructor(reason: FailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheError";
    this.reason = reason;
  }
}

/**
 * Stored payload cannot be reversed by the codec
 */
export class DecodeError extends CacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DECODE_ERROR", message, options);
    this.name = "DecodeError";
  }
}

/**
 * Backend unavailable, or malformed on-disk state
 */
export class StoreError extends CacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_ERROR", message, options);
    this.name = "StoreError";
  }
}

export class InvalidKeyError extends CacheError {
  constructor(message: string) {
    super("INVALID_KEY", message);
    this.name = "InvalidKeyError";
  }
}

/**
 * External collaborator (lyrics provider, vocabulary extractor) failed
 */
export class ProviderError extends CacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PROVIDER_ERROR", message, options);
    this.name = "ProviderError";
  }
}

const FAILURE_MESSAGES: Record<FailureReason, FailureMessageInfo> = {
  NOT_FOUND: {
    userMessage: "No lyrics were found for this song.",
    retryable: false,
    suggestedAction: "Check the song title and artist spelling",
  },
  PROVIDER_ERROR: {
    userMessage: "The lyrics source is unavailable right now. Please try again later.",
    retryable: true,
    suggestedAction: "Try again in a few minutes",
  },
  DECODE_ERROR: {
    userMessage: "A cached entry was damaged and could not be read.",
    retryable: true,
    suggestedAction: "Try again to refetch the entry",
  },
  STORE_ERROR: {
    userMessage: "The cache storage could not be accessed.",
    retryable: true,
    suggestedAction: "Check that the cache directory is writable",
  },
  INVALID_KEY: {
    userMessage: "A song title is required.",
    retryable: false,
    suggestedAction: "Provide a non-empty song title",
  },
  INVALID_ARGUMENT: {
    userMessage: "The request contained an invalid value.",
    retryable: false,
  },
  UNKNOWN_ERROR: {
    userMessage: "An unexpected error occurred. Please try again.",
    retryable: true,
    suggestedAction: "Try again",
  },
};

function isFailureReason(reason: string): reason is FailureReason {
  return Object.prototype.hasOwnProperty.call(FAILURE_MESSAGES, reason);
}

/**
 * Get user-friendly message for a failure reason
 */
export function getFailureMessage(reason: string): FailureMessageInfo {
  return isFailureReason(reason) ? FAILURE_MESSAGES[reason] : FAILURE_MESSAGES.UNKNOWN_ERROR;
}

/**
 * Check if a failure is retryable
 */
export function isRetryable(reason: string): boolean {
  return getFailureMessage(reason).retryable;
}

/**
 * Classify any thrown value
 */
export function toFailureReason(error: unknown): FailureReason {
  return error instanceof CacheError ? error.reason : "UNKNOWN_ERROR";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
