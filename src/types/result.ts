/**
 * Result Pattern Implementation
 *
 * Port adapters return Result<T> and never throw. Calls into ports the
 * host supplies go through settle(), so a throw or rejection from a
 * collaborator arrives as a Failure like any other.
 */

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: string,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}

/**
 * Extract a readable message from anything that was thrown
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return 'Unknown error';
}

/**
 * Run a port call, folding throws and rejections into a Failure with `code`
 */
export async function settle<T>(
  code: string,
  fn: () => Promise<Result<T>>
): Promise<Result<T>> {
  try {
    return await fn();
  } catch (err) {
    return failure(code, errorMessage(err));
  }
}
