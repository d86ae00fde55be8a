// index.ts

export * as errors from './core/errors/factory';
export { formatEnvelopePretty } from './core/errors/formatter';

export { ProviderError, isProviderError, isProviderErrorOfType } from './core/types/errors';

export { connect, createMultiTransportProvider, describeEndpoint } from './core/provider';
export type {
  MultiTransportProvider,
  TransportConnectors,
  TransportVariant,
} from './core/provider';
export { selectTransport } from './core/transport/select';
export type { TransportKind } from './core/transport/select';
export { resolveEndpoint, RPC_URL_ENV } from './core/config';
export type { ConnectOptions, Env } from './core/config';

export * as ethRpc from './core/rpc/eth';
export type { EthRpc } from './core/rpc/eth';

// Core types (type-only so we don't emit)
export type * from './core/rpc/types';
export type * from './core/types/errors';
export type * from './core/types/primitives';
