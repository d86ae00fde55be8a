// src/adapters/viem/provider.ts
import { createPublicClient, http, webSocket, type PublicClient } from 'viem';
import { ipc } from 'viem/node';

import {
  connect,
  type MultiTransportProvider,
  type TransportConnectors,
  type TransportVariant,
} from '../../core/provider';
import type { ConnectOptions } from '../../core/config';
import type { RpcTransport } from '../../core/rpc/types';

// One request per call: viem's transports otherwise retry and reconnect on their own.
const SINGLE_SHOT = { retryCount: 0 } as const;
const NO_RECONNECT = { ...SINGLE_SHOT, reconnect: false } as const;

function createHttpClient(url: URL) {
  return createPublicClient({ transport: http(url.toString(), SINGLE_SHOT) });
}

// viem opens sockets lazily; asking for the rpc client waits for the handshake.
async function createWsClient(endpoint: string) {
  const client = createPublicClient({ transport: webSocket(endpoint, NO_RECONNECT) });
  await client.transport.getRpcClient();
  return client;
}

async function createIpcClient(path: string) {
  const client = createPublicClient({ transport: ipc(path, NO_RECONNECT) });
  await client.transport.getRpcClient();
  return client;
}

export type ViemHttpClient = ReturnType<typeof createHttpClient>;
export type ViemWsClient = Awaited<ReturnType<typeof createWsClient>>;
export type ViemIpcClient = Awaited<ReturnType<typeof createIpcClient>>;

export type ViemTransportVariant = TransportVariant<ViemHttpClient, ViemWsClient, ViemIpcClient>;
export type ViemMultiTransportProvider = MultiTransportProvider<
  ViemHttpClient,
  ViemWsClient,
  ViemIpcClient
>;

type UntypedRequest = (args: { method: string; params: unknown[] }) => Promise<unknown>;

// viem types `request` against its own RPC schema; trace_* methods are not in it.
export function transportFromViem(client: Pick<PublicClient, 'request'>): RpcTransport {
  const request = client.request as unknown as UntypedRequest;
  return (method, params = []) => request({ method, params });
}

export const viemConnectors: TransportConnectors<ViemHttpClient, ViemWsClient, ViemIpcClient> = {
  http: createHttpClient,
  ws: createWsClient,
  ipc: createIpcClient,
  toTransport: transportFromViem,
  async release(variant) {
    // http holds nothing open between requests
    if (variant.kind === 'http') return;
    const rpcClient = await variant.client.transport.getRpcClient();
    rpcClient.close();
  },
};

/** Connects through viem, picking HTTP, WebSocket or IPC from the endpoint. */
export function connectViem(
  endpoint?: string,
  options?: ConnectOptions,
): Promise<ViemMultiTransportProvider> {
  return connect(endpoint, viemConnectors, options);
}
