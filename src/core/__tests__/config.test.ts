import { describe, it, expect } from 'vitest';
import { resolveEndpoint, RPC_URL_ENV } from '../config';

describe('config.resolveEndpoint', () => {
  it('prefers the explicit endpoint', () => {
    expect(resolveEndpoint('ws://localhost:8546', { RPC_URL: 'http://localhost:8545' })).toBe(
      'ws://localhost:8546',
    );
  });

  it('keeps an explicit empty endpoint', () => {
    expect(resolveEndpoint('', { RPC_URL: 'http://localhost:8545' })).toBe('');
  });

  it('falls back to RPC_URL, then to the empty string', () => {
    expect(RPC_URL_ENV).toBe('RPC_URL');
    expect(resolveEndpoint(undefined, { RPC_URL: 'http://localhost:8545' })).toBe(
      'http://localhost:8545',
    );
    expect(resolveEndpoint(undefined, {})).toBe('');
  });
});
