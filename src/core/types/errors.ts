// src/core/types/errors.ts

import { formatEnvelopePretty } from '../errors/formatter';
import { shapeCause } from '../errors/cause';

const hasSymbolInspect = typeof Symbol === 'function' && typeof Symbol.for === 'function';
const kInspect: symbol | undefined = hasSymbolInspect
  ? Symbol.for('nodejs.util.inspect.custom')
  : undefined;

export type ErrorType =
  | 'MISSING_ENDPOINT'
  | 'INVALID_URL'
  | 'TRANSPORT_UNAVAILABLE'
  | 'INVALID_HASH'
  | 'INVALID_ARGUMENT'
  | 'UPSTREAM'
  | 'MALFORMED_RESPONSE'
  | 'STATE';

/** Resource surface */
export type Resource = 'provider' | 'eth' | 'trace';

/** Envelope carried by every error this package throws. */
export interface ErrorEnvelope {
  /** Resource surface that raised the error. */
  resource: Resource;
  /** Operation, e.g. 'eth.getChainId' */
  operation: string;
  /** Broad category */
  type: ErrorType;
  /** Human-readable, stable message for developers. */
  message: string;

  /** Optional detail (endpoint, hash, transport kind, ...) */
  context?: Record<string, unknown>;

  /** Original thrown value, untouched */
  cause?: unknown;
}

/** Error class.
 * Raised by connect and by every query operation. The envelope says what failed and where;
 * `cause` keeps the wrapped client's original error.
 */
export class ProviderError extends Error {
  constructor(public readonly envelope: ErrorEnvelope) {
    super(
      formatEnvelopePretty(envelope),
      envelope.cause !== undefined ? { cause: envelope.cause } : undefined,
    );
    this.name = 'ProviderError';
  }

  get type(): ErrorType {
    return this.envelope.type;
  }

  toJSON() {
    const { cause, ...rest } = this.envelope;
    return {
      name: this.name,
      ...rest,
      ...(cause !== undefined ? { cause: shapeCause(cause) } : {}),
    };
  }
}

if (kInspect) {
  Object.defineProperty(ProviderError.prototype, kInspect, {
    value(this: ProviderError) {
      return `${this.name}: ${formatEnvelopePretty(this.envelope)}`;
    },
    enumerable: false,
  });
}

//  ---- Type guards ----
export function isProviderError(e: unknown): e is ProviderError {
  if (!e || typeof e !== 'object') return false;

  const maybe = e as { envelope?: unknown };
  if (!('envelope' in maybe)) return false;

  const envelope = maybe.envelope as Record<string, unknown> | undefined;
  return typeof envelope?.type === 'string' && typeof envelope?.message === 'string';
}

export function isProviderErrorOfType(e: unknown, type: ErrorType): e is ProviderError {
  return isProviderError(e) && e.envelope.type === type;
}

export const OP_PROVIDER = {
  connect: 'provider.connect',
  connectHttp: 'provider.connect:http',
  connectWs: 'provider.connect:ws',
  connectIpc: 'provider.connect:ipc',
} as const;

export const OP_ETH = {
  getChainId: 'eth.getChainId',
  getBlockNumber: 'eth.getBlockNumber',
  getCodeAt: 'eth.getCodeAt',
  getTransactionByHash: 'eth.getTransactionByHash',
  getLogs: 'eth.getLogs',
} as const;

export const OP_TRACE = {
  replayTransaction: 'trace.replayTransaction',
  replayBlockTransactions: 'trace.replayBlockTransactions',
} as const;
