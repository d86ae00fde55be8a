// src/adapters/ethers/provider.ts
import { JsonRpcProvider, WebSocketProvider, IpcSocketProvider } from 'ethers';

import {
  connect,
  type MultiTransportProvider,
  type TransportConnectors,
  type TransportVariant,
} from '../../core/provider';
import type { ConnectOptions } from '../../core/config';
import type { RpcTransport } from '../../core/rpc/types';

export type EthersTransportVariant = TransportVariant<
  JsonRpcProvider,
  WebSocketProvider,
  IpcSocketProvider
>;
export type EthersMultiTransportProvider = MultiTransportProvider<
  JsonRpcProvider,
  WebSocketProvider,
  IpcSocketProvider
>;

type EthersClient = JsonRpcProvider | WebSocketProvider | IpcSocketProvider;

// Each call is its own JSON-RPC request; network detection runs once, not on a poll.
const HTTP_OPTIONS = { staticNetwork: true, batchMaxCount: 1 } as const;

async function teardown(provider: EthersClient): Promise<void> {
  try {
    await provider.destroy();
  } catch (e) {
    // eslint-disable-next-line no-console
    console.debug('[evm-transport-provider] non-fatal warning: could not close provider', e);
  }
}

// Resolves once ethers has started the provider (socket open, network detected).
// A provider whose socket never became usable is dropped; the handshake error is the one thrown.
async function ready(
  provider: WebSocketProvider | IpcSocketProvider,
  onSocketError: (fail: (err: unknown) => void) => void,
): Promise<void> {
  try {
    await new Promise<void>((resolve, reject) => {
      onSocketError(reject);
      provider._waitUntilReady().then(resolve, reject);
    });
  } catch (e) {
    await teardown(provider);
    throw e;
  }
}

async function createWsProvider(endpoint: string): Promise<WebSocketProvider> {
  const provider = new WebSocketProvider(endpoint);
  await ready(provider, (fail) => {
    provider.websocket.onerror = (err: unknown) => fail(err);
  });
  return provider;
}

async function createIpcProvider(path: string): Promise<IpcSocketProvider> {
  const provider = new IpcSocketProvider(path);
  let open = false;
  await ready(provider, (fail) => {
    // ethers registers no 'error' listener on the socket. This one stays for the provider's
    // lifetime: before the handshake an error fails the connect, after it the provider is closed.
    provider.socket.on('error', (err: Error) => {
      if (open) void teardown(provider);
      else fail(err);
    });
  });
  open = true;
  return provider;
}

export function transportFromEthers(provider: EthersClient): RpcTransport {
  return (method, params = []) => provider.send(method, params);
}

export const ethersConnectors: TransportConnectors<
  JsonRpcProvider,
  WebSocketProvider,
  IpcSocketProvider
> = {
  http: (url) => new JsonRpcProvider(url.toString(), undefined, HTTP_OPTIONS),
  ws: createWsProvider,
  ipc: createIpcProvider,
  toTransport: transportFromEthers,
  // For HTTP this stops network detection, which otherwise retries every second.
  release: (variant) => teardown(variant.client),
};

/** Connects through ethers, picking HTTP, WebSocket or IPC from the endpoint. */
export function connectEthers(
  endpoint?: string,
  options?: ConnectOptions,
): Promise<EthersMultiTransportProvider> {
  return connect(endpoint, ethersConnectors, options);
}
