// src/core/config.ts

export type Env = Record<string, string | undefined>;

export const RPC_URL_ENV = 'RPC_URL';

/** Options accepted by every connect entry point. */
export interface ConnectOptions {
  /** Environment consulted when no endpoint is passed. Defaults to `process.env`. */
  env?: Env;
}

/** An explicit endpoint wins; otherwise `RPC_URL` from the environment, else ''. */
export function resolveEndpoint(endpoint: string | undefined, env: Env = process.env): string {
  if (endpoint !== undefined) return endpoint;
  return env[RPC_URL_ENV] ?? '';
}
