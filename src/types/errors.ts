/**
 * Error Taxonomy
 *
 * Every failure the renderer can produce is one of these classes. Retryable
 * kinds (navigation timeout, transient fetch) never reach callers of fetch();
 * they are logged and the attempt is retried. Cleanup failures are logged
 * only. Provisioning and session-state failures propagate.
 */

export type ErrorCode =
  | 'NAVIGATION_TIMEOUT'
  | 'TRANSIENT_FETCH'
  | 'PROVISIONING_FAILED'
  | 'CLEANUP_FAILED'
  | 'SESSION_STATE';

export type FailureKind = 'timeout' | 'transient';

/**
 * Base class for all renderer errors
 */
export class RendererError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RendererError';
  }
}

/**
 * Navigation or selector wait exceeded its timeout
 */
export class NavigationTimeoutError extends RendererError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super('NAVIGATION_TIMEOUT', `Timed out after ${timeoutMs}ms loading ${url}`, options);
    this.name = 'NavigationTimeoutError';
  }
}

/**
 * Any other failure while opening, navigating or extracting a page
 */
export class TransientFetchError extends RendererError {
  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('TRANSIENT_FETCH', `Fetch of ${url} failed: ${message}`, options);
    this.name = 'TransientFetchError';
  }
}

/**
 * Installing the browser binary or its OS dependencies failed
 */
export class ProvisioningFailure extends RendererError {
  constructor(
    message: string,
    public readonly details: {
      command?: string;
      exitCode?: number | string;
      stdout?: string;
      stderr?: string;
    } = {},
    options?: { cause?: unknown }
  ) {
    super('PROVISIONING_FAILED', message, options);
    this.name = 'ProvisioningFailure';
  }
}

/**
 * Closing a page, environment or the engine failed
 */
export class CleanupError extends RendererError {
  constructor(
    public readonly target: string,
    options?: { cause?: unknown }
  ) {
    super('CLEANUP_FAILED', `Failed to close ${target}: ${describeError(options?.cause)}`, options);
    this.name = 'CleanupError';
  }
}

/**
 * An operation was called in a lifecycle state that does not allow it
 */
export class SessionStateError extends RendererError {
  constructor(
    public readonly operation: string,
    public readonly state: string
  ) {
    super('SESSION_STATE', `Cannot ${operation} while session is ${state}`);
    this.name = 'SessionStateError';
  }
}

/**
 * Extract a readable message from anything a catch block hands us
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Playwright rejects with an error named TimeoutError when navigation or a
 * selector wait runs out of time; anything else counts as transient.
 */
export function classifyFetchFailure(error: unknown): FailureKind {
  if (error instanceof NavigationTimeoutError) {
    return 'timeout';
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'timeout';
  }
  return 'transient';
}

/**
 * Wrap a thrown value in the matching taxonomy class
 */
export function toFetchError(
  error: unknown,
  url: string,
  timeoutMs: number
): NavigationTimeoutError | TransientFetchError {
  if (error instanceof NavigationTimeoutError || error instanceof TransientFetchError) {
    return error;
  }
  if (classifyFetchFailure(error) === 'timeout') {
    return new NavigationTimeoutError(url, timeoutMs, { cause: error });
  }
  return new TransientFetchError(url, describeError(error), { cause: error });
}
