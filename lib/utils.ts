import { describeError } from '@/lib/errors';

/**
 * Resolve user id from explicit payload or environment defaults.
 * @param explicit - user id provided by caller
 * @param options - control requirement of the user id
 * @returns - resolved user id or undefined when not required
 */
export function resolveUserId(explicit?: string, options: { required?: boolean } = {}): string | undefined {
  const userId = explicit || process.env.SUPABASE_DEFAULT_USER_ID;
  if (!userId && options.required) {
    throw new Error('User id is required to scope data operations');
  }
  return userId;
}

/**
 * Log and rethrow service errors in a consistent way.
 * @param message - contextual log
 * @param error - caught error
 * @returns - never; throws a new error with context
 */
export function handleServiceError(message: string, error: unknown): never {
  const details = describeError(error);
  console.error(message, details);
  throw new Error(`${message}: ${details}`);
}
