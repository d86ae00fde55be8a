import { createError } from './factory';
import { isProviderError, type Resource } from '../types/errors';

type Ctx = Record<string, unknown>;

/**
 * Runs a single upstream round-trip. Anything the wrapped client throws is rethrown as an
 * `UPSTREAM` ProviderError whose `cause` is the original error; ProviderErrors pass through.
 */
export async function withRpcOp<T>(
  resource: Resource,
  operation: string,
  message: string,
  ctx: Ctx,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (isProviderError(e)) throw e;
    throw createError('UPSTREAM', {
      resource,
      operation,
      message,
      context: ctx,
      cause: e,
    });
  }
}
