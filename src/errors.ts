import { Logger } from "./logging";
import { sentryCaptureException } from "./telemetry/sentryClient";

const logger = new Logger("errors");

/**
 * Raised by an inventory adapter when the caller may not read a resource. Recovered locally: an
 * inaccessible project is still listed, as a placeholder without children.
 */
export class AccessDeniedError extends Error {
  constructor(
    message: string,
    public readonly resource?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AccessDeniedError";
  }
}

/** A whole fetch (listing projects, zones or instances) failed; the cache was left as it was. */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly cause: Error,
  ) {
    super(message, { cause });
    this.name = "FetchError";
  }
}

/** The caller aborted the operation; the cache was left as it was. */
export class CancelledOperationError extends Error {
  constructor(message: string = "Operation was cancelled", options?: ErrorOptions) {
    super(message, options);
    this.name = "CancelledOperationError";
  }
}

/** A locator or tracked-project id does not (or no longer) refer to anything in the tree. */
export class UnknownIdentityError extends Error {
  constructor(public readonly identity: string) {
    super(`Unknown identity: ${identity}`);
    this.name = "UnknownIdentityError";
  }
}

export function isAccessDeniedError(error: unknown): error is AccessDeniedError {
  return error instanceof AccessDeniedError;
}

/** Was this a cancellation, either ours or the `AbortError` raised by fetch-style APIs? */
export function isCancellation(error: unknown): boolean {
  return (
    error instanceof CancelledOperationError ||
    (error instanceof Error && error.name === "AbortError")
  );
}

/**
 * Check if an {@link Error} has a `cause` property of type `Error`, indicating it has at least
 * one nested error.
 */
export function hasErrorCause(error: Error): error is Error & { cause: Error } {
  return "cause" in error && error.cause instanceof Error;
}

/** Extract the full error chain from a nested error. */
export function getNestedErrorChain(error: Error): Record<string, string | undefined>[] {
  const chain: Record<string, string | undefined>[] = [];
  let currentError: Error | undefined = error;
  let level = 0;
  while (currentError) {
    chain.push({
      [`errorType${level}`]: currentError.name,
      [`errorMessage${level}`]: currentError.message,
      [`errorStack${level}`]: currentError.stack,
    });
    currentError = hasErrorCause(currentError) ? currentError.cause : undefined;
    level++;
  }
  return chain;
}

/** Error class wrapper with a custom name and message, used for Sentry tracking. */
export class CustomError extends Error {
  constructor(
    public readonly name: string,
    public readonly message: string,
    public readonly cause: Error,
  ) {
    super(message);
    this.name = name;
  }
}

/** Extra data to attach to a Sentry event. */
export interface SentryContext {
  tags?: Record<string, string | number | boolean>;
  extra?: Record<string, unknown>;
}

/**
 * Log the provided error along with any additional information, and optionally send to Sentry.
 *
 * Nested errors (with `cause` properties) are unrolled into the logged context.
 *
 * @param e Error to log
 * @param message Text to add in the logger.error() message and top-level Sentry error message
 * @param sentryContext Optional Sentry context; the error is only sent to Sentry when given
 */
export function logError(e: unknown, message: string, sentryContext: SentryContext = {}): void {
  if (!(e instanceof Error)) {
    logger.error(`non-Error passed: ${JSON.stringify(e)}`);
    return;
  }

  let errorContext: Record<string, string | undefined> = {
    errorType: e.name,
    errorMessage: e.message,
    errorStack: e.stack,
  };

  if (hasErrorCause(e)) {
    const errorChain = getNestedErrorChain(e.cause);
    if (errorChain.length) {
      errorContext = {
        ...errorContext,
        errors: JSON.stringify(errorChain, null, 2),
      };
    }
  }

  logger.error(`Error: ${message} --> ${e}`, { ...errorContext, ...sentryContext });

  if (Object.keys(sentryContext).length) {
    const wrappedError = new CustomError(e.name, `${message}: ${e.message}`, e);
    sentryCaptureException(wrappedError, {
      captureContext: {
        tags: sentryContext.tags,
        extra: { ...(sentryContext.extra ?? {}), ...errorContext },
      },
    });
  }
}
