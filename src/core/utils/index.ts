export * from './hash';
export * from './number';
export * from './bytes';

// Exhaustiveness helper for discriminated unions
export function assertNever(x: never): never {
  throw new Error('Unexpected variant: ' + String(x));
}
