// src/core/provider.ts

import type { RpcTransport } from './rpc/types';
import { createEthRpc, type EthRpc } from './rpc/eth';
import { selectTransport, type TransportKind } from './transport/select';
import { resolveEndpoint, type ConnectOptions } from './config';
import { createError } from './errors/factory';
import { isProviderError, OP_ETH, OP_PROVIDER, OP_TRACE } from './types/errors';
import { assertNever } from './utils';

/** Exactly one transport-bound client, fixed for the provider's lifetime. */
export type TransportVariant<H, W, I> =
  | { readonly kind: 'http'; readonly client: H }
  | { readonly kind: 'ws'; readonly client: W }
  | { readonly kind: 'ipc'; readonly client: I };

/**
 * How an adapter opens each transport with its client library.
 * `http` must not touch the network; `ws` and `ipc` resolve once the socket is usable.
 */
export interface TransportConnectors<H, W, I> {
  http(url: URL): H;
  ws(endpoint: string): Promise<W>;
  ipc(path: string): Promise<I>;
  /** Reduces a connected client to a JSON-RPC request function. */
  toTransport(client: H | W | I): RpcTransport;
  /** Releases whatever the client holds open (sockets, pollers). */
  release(variant: TransportVariant<H, W, I>): Promise<void>;
}

export interface MultiTransportProvider<H, W, I> extends EthRpc {
  readonly kind: TransportKind;
  readonly variant: TransportVariant<H, W, I>;
  /** The library-native client behind the active transport. */
  readonly client: H | W | I;
  /** Releases the underlying socket. The provider is unusable afterwards. */
  destroy(): Promise<void>;
}

// Scheme and host for URLs, the path itself for IPC. Keeps API keys in paths out of errors.
export function describeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint);
    return url.host ? `${url.protocol}//${url.host}` : url.protocol;
  } catch {
    return endpoint;
  }
}

async function openSocket<T>(
  kind: 'ws' | 'ipc',
  endpoint: string,
  open: (endpoint: string) => Promise<T>,
): Promise<T> {
  try {
    return await open(endpoint);
  } catch (e) {
    if (isProviderError(e)) throw e;
    throw createError('TRANSPORT_UNAVAILABLE', {
      resource: 'provider',
      operation: kind === 'ws' ? OP_PROVIDER.connectWs : OP_PROVIDER.connectIpc,
      message:
        kind === 'ws' ? 'WebSocket handshake failed.' : 'Could not connect to the IPC socket.',
      context: { transport: kind, endpoint: describeEndpoint(endpoint) },
      cause: e,
    });
  }
}

async function openVariant<H, W, I>(
  endpoint: string,
  connectors: TransportConnectors<H, W, I>,
): Promise<TransportVariant<H, W, I>> {
  const kind = selectTransport(endpoint);
  switch (kind) {
    case 'http': {
      let url: URL;
      try {
        url = new URL(endpoint);
      } catch (e) {
        throw createError('INVALID_URL', {
          resource: 'provider',
          operation: OP_PROVIDER.connectHttp,
          message: 'Endpoint looks like an HTTP URL but could not be parsed.',
          context: { transport: kind },
          cause: e,
        });
      }
      return { kind, client: connectors.http(url) };
    }
    case 'ws':
      return { kind, client: await openSocket(kind, endpoint, (e) => connectors.ws(e)) };
    case 'ipc':
      return { kind, client: await openSocket(kind, endpoint, (e) => connectors.ipc(e)) };
    default:
      return assertNever(kind);
  }
}

/** Wraps an already-open variant. */
export function createMultiTransportProvider<H, W, I>(
  variant: TransportVariant<H, W, I>,
  connectors: Pick<TransportConnectors<H, W, I>, 'toTransport' | 'release'>,
): MultiTransportProvider<H, W, I> {
  const rpc = createEthRpc(connectors.toTransport(variant.client));
  let destroyed = false;

  function live(operation: string): EthRpc {
    if (destroyed) {
      throw createError('STATE', {
        resource: 'provider',
        operation,
        message: 'Provider has been destroyed.',
        context: { transport: variant.kind },
      });
    }
    return rpc;
  }

  return {
    kind: variant.kind,
    variant,
    client: variant.client,

    getChainId: async () => live(OP_ETH.getChainId).getChainId(),
    getBlockNumber: async () => live(OP_ETH.getBlockNumber).getBlockNumber(),
    getCodeAt: async (address) => live(OP_ETH.getCodeAt).getCodeAt(address),
    getTransactionByHash: async (hash) =>
      live(OP_ETH.getTransactionByHash).getTransactionByHash(hash),
    traceReplayTransaction: async (hash, traceTypes) =>
      live(OP_TRACE.replayTransaction).traceReplayTransaction(hash, traceTypes),
    traceReplayBlockTransactions: async (blockNumber, traceTypes) =>
      live(OP_TRACE.replayBlockTransactions).traceReplayBlockTransactions(blockNumber, traceTypes),
    getLogs: async (filter) => live(OP_ETH.getLogs).getLogs(filter),

    async destroy() {
      if (destroyed) return;
      destroyed = true;
      await connectors.release(variant);
    },
  };
}

/**
 * Resolves the endpoint, opens the matching transport and returns a provider over it.
 * Fails with MISSING_ENDPOINT, INVALID_URL or TRANSPORT_UNAVAILABLE.
 */
export async function connect<H, W, I>(
  endpoint: string | undefined,
  connectors: TransportConnectors<H, W, I>,
  options: ConnectOptions = {},
): Promise<MultiTransportProvider<H, W, I>> {
  const resolved = resolveEndpoint(endpoint, options.env);
  if (resolved === '') {
    throw createError('MISSING_ENDPOINT', {
      resource: 'provider',
      operation: OP_PROVIDER.connect,
      message: 'No RPC endpoint provided.',
    });
  }

  const variant = await openVariant(resolved, connectors);
  return createMultiTransportProvider(variant, connectors);
}
