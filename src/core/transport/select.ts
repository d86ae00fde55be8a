// src/core/transport/select.ts

export type TransportKind = 'http' | 'ws' | 'ipc';

/**
 * Picks a transport by sniffing the endpoint (case-insensitive, in this order):
 * anything containing "http" is HTTP, then anything containing "ws" is WebSocket,
 * everything else is treated as an IPC socket path.
 *
 * A WebSocket endpoint whose host or path contains "http" therefore resolves to HTTP.
 */
export function selectTransport(endpoint: string): TransportKind {
  const lower = endpoint.toLowerCase();
  if (lower.includes('http')) return 'http';
  if (lower.includes('ws')) return 'ws';
  return 'ipc';
}
