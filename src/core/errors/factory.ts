// src/core/errors/factory.ts
import { ProviderError, type ErrorEnvelope, type ErrorType } from '../types/errors';

export { shapeCause } from './cause';

/** Creates a ProviderError of the specified type, with the provided details. */
export function createError(type: ErrorType, input: Omit<ErrorEnvelope, 'type'>): ProviderError {
  return new ProviderError({ ...input, type });
}
