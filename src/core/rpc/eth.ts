// src/core/rpc/eth.ts

import type {
  RpcTransport,
  Transaction,
  Log,
  LogFilter,
  TraceType,
  TraceResults,
  TraceResultsWithTransactionHash,
  TransactionTrace,
  StateDiff,
  VmTrace,
} from './types';
import type { Hex, Address, Hash } from '../types/primitives';
import { createError } from '../errors/factory';
import { withRpcOp } from '../errors/rpc';
import { OP_ETH, OP_TRACE } from '../types/errors';
import { isHash66 } from '../utils/hash';
import { isQuantity, toQuantity } from '../utils/number';
import { hexToBytes, isBytesHex } from '../utils/bytes';

/** Read-only node queries shared by every transport. */
export interface EthRpc {
  // Fetches the chain id (`eth_chainId`).
  getChainId(): Promise<number>;

  // Fetches the latest block number (`eth_blockNumber`).
  getBlockNumber(): Promise<bigint>;

  // Fetches the deployed bytecode at `address`; empty when the account has no code.
  getCodeAt(address: Address): Promise<Uint8Array>;

  // Fetches a transaction by hash, or null when the node does not know it.
  getTransactionByHash(hash: Hash): Promise<Transaction | null>;

  // Re-executes a transaction and returns the requested traces.
  traceReplayTransaction(hash: string, traceTypes: readonly TraceType[]): Promise<TraceResults>;

  // Re-executes every transaction of a block and returns their traces.
  traceReplayBlockTransactions(
    blockNumber: bigint | number,
    traceTypes: readonly TraceType[],
  ): Promise<TraceResultsWithTransactionHash[]>;

  // Fetches the logs matching `filter`.
  getLogs(filter: LogFilter): Promise<Log[]>;
}

const METHODS = {
  chainId: 'eth_chainId',
  blockNumber: 'eth_blockNumber',
  getCode: 'eth_getCode',
  getTransactionByHash: 'eth_getTransactionByHash',
  getLogs: 'eth_getLogs',
  replayTransaction: 'trace_replayTransaction',
  replayBlockTransactions: 'trace_replayBlockTransactions',
} as const;

type Raw = Record<string, unknown>;

const isRecord = (x: unknown): x is Raw => x !== null && typeof x === 'object';

function malformed(operation: string, message: string, context: Raw) {
  return createError('MALFORMED_RESPONSE', {
    resource: operation.startsWith('trace.') ? 'trace' : 'eth',
    operation,
    message,
    context,
  });
}

// ---- scalar parsers -------------------------------------------------------

function ensureBigInt(value: unknown, field: string, operation: string): bigint {
  if (isQuantity(value)) return BigInt(value);
  throw malformed(operation, `Malformed response: ${field} must be a hex quantity.`, {
    field,
    valueType: typeof value,
  });
}

function ensureNumber(value: unknown, field: string, operation: string): number {
  const big = ensureBigInt(value, field, operation);
  if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw malformed(operation, `Malformed response: ${field} exceeds the safe integer range.`, {
      field,
    });
  }
  return Number(big);
}

function ensureHex(value: unknown, field: string, operation: string): Hex {
  if (typeof value === 'string' && value.startsWith('0x')) return value as Hex;
  throw malformed(operation, `Malformed response: ${field} must be 0x-prefixed hex.`, {
    field,
    valueType: typeof value,
  });
}

function optional<T>(
  parse: (v: unknown, field: string, op: string) => T,
  value: unknown,
  field: string,
  operation: string,
): T | undefined {
  return value === undefined || value === null ? undefined : parse(value, field, operation);
}

function nullable<T>(
  parse: (v: unknown, field: string, op: string) => T,
  value: unknown,
  field: string,
  operation: string,
): T | null {
  return value === undefined || value === null ? null : parse(value, field, operation);
}

function ensureRecord(value: unknown, what: string, operation: string): Raw {
  if (isRecord(value) && !Array.isArray(value)) return value;
  throw malformed(operation, `Malformed ${what} response: expected object.`, {
    receivedType: typeof value,
  });
}

function ensureArray(value: unknown, what: string, operation: string): unknown[] {
  if (Array.isArray(value)) return value;
  throw malformed(operation, `Malformed ${what} response: expected array.`, {
    receivedType: typeof value,
  });
}

// ---- normalizers ----------------------------------------------------------

/** Parses a transaction hash argument; anything but 32 bytes of 0x-hex is rejected. */
export function parseTxHash(value: string, operation: string = OP_TRACE.replayTransaction): Hash {
  const trimmed = value.trim();
  const prefixed = /^0x/i.test(trimmed) ? `0x${trimmed.slice(2)}` : `0x${trimmed}`;
  if (isHash66(prefixed)) return prefixed;
  throw createError('INVALID_HASH', {
    resource: operation.startsWith('trace.') ? 'trace' : 'eth',
    operation,
    message: 'Invalid transaction hash: expected 32 bytes of hex.',
    context: { txHash: value },
  });
}

/** Encodes a block number argument; negative or fractional numbers are rejected. */
export function parseBlockNumber(
  value: bigint | number,
  operation: string,
  field = 'blockNumber',
): Hex {
  const valid =
    typeof value === 'bigint' ? value >= 0n : Number.isSafeInteger(value) && value >= 0;
  if (valid) return toQuantity(value);
  throw createError('INVALID_ARGUMENT', {
    resource: operation.startsWith('trace.') ? 'trace' : 'eth',
    operation,
    message: `Invalid ${field}: expected a non-negative integer.`,
    context: { [field]: String(value) },
  });
}

export function normalizeTransaction(raw: unknown): Transaction {
  const op = OP_ETH.getTransactionByHash;
  const r = ensureRecord(raw, 'transaction', op);

  const tx: Transaction = {
    hash: ensureHex(r.hash, 'hash', op),
    blockHash: nullable(ensureHex, r.blockHash, 'blockHash', op),
    blockNumber: nullable(ensureBigInt, r.blockNumber, 'blockNumber', op),
    transactionIndex: nullable(ensureNumber, r.transactionIndex, 'transactionIndex', op),
    from: ensureHex(r.from, 'from', op),
    to: nullable(ensureHex, r.to, 'to', op),
    value: ensureBigInt(r.value, 'value', op),
    nonce: ensureNumber(r.nonce, 'nonce', op),
    gas: ensureBigInt(r.gas, 'gas', op),
    input: ensureHex(r.input, 'input', op),
    // Legacy nodes omit `type`.
    type: optional(ensureNumber, r.type, 'type', op) ?? 0,
  };

  const gasPrice = optional(ensureBigInt, r.gasPrice, 'gasPrice', op);
  const maxFeePerGas = optional(ensureBigInt, r.maxFeePerGas, 'maxFeePerGas', op);
  const maxPriorityFeePerGas = optional(
    ensureBigInt,
    r.maxPriorityFeePerGas,
    'maxPriorityFeePerGas',
    op,
  );
  const chainId = optional(ensureNumber, r.chainId, 'chainId', op);
  const v = optional(ensureBigInt, r.v, 'v', op);
  const rSig = optional(ensureHex, r.r, 'r', op);
  const sSig = optional(ensureHex, r.s, 's', op);

  if (gasPrice !== undefined) tx.gasPrice = gasPrice;
  if (maxFeePerGas !== undefined) tx.maxFeePerGas = maxFeePerGas;
  if (maxPriorityFeePerGas !== undefined) tx.maxPriorityFeePerGas = maxPriorityFeePerGas;
  if (chainId !== undefined) tx.chainId = chainId;
  if (v !== undefined) tx.v = v;
  if (rSig !== undefined) tx.r = rSig;
  if (sSig !== undefined) tx.s = sSig;

  return tx;
}

export function normalizeLog(raw: unknown, index: number): Log {
  const op = OP_ETH.getLogs;
  const r = ensureRecord(raw, `log #${index}`, op);
  return {
    address: ensureHex(r.address, 'address', op),
    topics: ensureArray(r.topics, `log #${index} topics`, op).map((t) => ensureHex(t, 'topic', op)),
    data: ensureHex(r.data, 'data', op),
    blockNumber: nullable(ensureBigInt, r.blockNumber, 'blockNumber', op),
    blockHash: nullable(ensureHex, r.blockHash, 'blockHash', op),
    transactionHash: nullable(ensureHex, r.transactionHash, 'transactionHash', op),
    transactionIndex: nullable(ensureNumber, r.transactionIndex, 'transactionIndex', op),
    logIndex: nullable(ensureNumber, r.logIndex, 'logIndex', op),
    removed: r.removed === true,
  };
}

export function normalizeTraceResults(raw: unknown, operation: string): TraceResults {
  const r = ensureRecord(raw, 'trace', operation);
  const trace = r.trace === null || r.trace === undefined ? [] : r.trace;
  return {
    output: optional(ensureHex, r.output, 'output', operation) ?? '0x',
    trace: ensureArray(trace, 'trace', operation).map(
      (t) => ensureRecord(t, 'trace entry', operation) as TransactionTrace,
    ),
    stateDiff: isRecord(r.stateDiff) ? (r.stateDiff as StateDiff) : null,
    vmTrace: isRecord(r.vmTrace) ? (r.vmTrace as VmTrace) : null,
  };
}

// Serializes a filter into the `eth_getLogs` parameter object.
export function encodeLogFilter(filter: LogFilter): Raw {
  const out: Raw = {};
  if (filter.address !== undefined) out.address = filter.address;
  if (filter.topics !== undefined) out.topics = filter.topics;
  if (filter.blockHash !== undefined) {
    out.blockHash = filter.blockHash;
    return out;
  }
  if (filter.fromBlock !== undefined) {
    out.fromBlock =
      typeof filter.fromBlock === 'bigint'
        ? parseBlockNumber(filter.fromBlock, OP_ETH.getLogs, 'fromBlock')
        : filter.fromBlock;
  }
  if (filter.toBlock !== undefined) {
    out.toBlock =
      typeof filter.toBlock === 'bigint'
        ? parseBlockNumber(filter.toBlock, OP_ETH.getLogs, 'toBlock')
        : filter.toBlock;
  }
  return out;
}

// Constructs an EthRpc over the given transport function.
export function createEthRpc(transport: RpcTransport): EthRpc {
  return {
    async getChainId() {
      return withRpcOp('eth', OP_ETH.getChainId, 'Failed to fetch chain id.', {}, async () => {
        const raw: unknown = await transport(METHODS.chainId, []);
        return ensureNumber(raw, 'chainId', OP_ETH.getChainId);
      });
    },

    async getBlockNumber() {
      return withRpcOp(
        'eth',
        OP_ETH.getBlockNumber,
        'Failed to fetch block number.',
        {},
        async () => {
          const raw: unknown = await transport(METHODS.blockNumber, []);
          return ensureBigInt(raw, 'blockNumber', OP_ETH.getBlockNumber);
        },
      );
    },

    async getCodeAt(address) {
      return withRpcOp(
        'eth',
        OP_ETH.getCodeAt,
        'Failed to fetch code.',
        { address },
        async () => {
          const raw: unknown = await transport(METHODS.getCode, [address, 'latest']);
          if (!isBytesHex(raw)) {
            throw malformed(OP_ETH.getCodeAt, 'Malformed code response: expected hex bytes.', {
              address,
              valueType: typeof raw,
            });
          }
          return hexToBytes(raw);
        },
      );
    },

    async getTransactionByHash(hash) {
      return withRpcOp(
        'eth',
        OP_ETH.getTransactionByHash,
        'Failed to fetch transaction.',
        { txHash: hash },
        async () => {
          const raw: unknown = await transport(METHODS.getTransactionByHash, [hash]);
          if (raw === null || raw === undefined) return null;
          return normalizeTransaction(raw);
        },
      );
    },

    async traceReplayTransaction(hash, traceTypes) {
      // Rejected before any request goes out.
      const txHash = parseTxHash(hash, OP_TRACE.replayTransaction);
      return withRpcOp(
        'trace',
        OP_TRACE.replayTransaction,
        'Failed to replay transaction.',
        { txHash, traceTypes },
        async () => {
          const raw: unknown = await transport(METHODS.replayTransaction, [
            txHash,
            [...traceTypes],
          ]);
          return normalizeTraceResults(raw, OP_TRACE.replayTransaction);
        },
      );
    },

    async traceReplayBlockTransactions(blockNumber, traceTypes) {
      const op = OP_TRACE.replayBlockTransactions;
      // Rejected before any request goes out.
      const block = parseBlockNumber(blockNumber, op);
      return withRpcOp(
        'trace',
        op,
        'Failed to replay block transactions.',
        { blockNumber, traceTypes },
        async () => {
          const raw: unknown = await transport(METHODS.replayBlockTransactions, [
            block,
            [...traceTypes],
          ]);
          return ensureArray(raw, 'block trace', op).map((entry) => {
            const r = ensureRecord(entry, 'block trace entry', op);
            return {
              ...normalizeTraceResults(r, op),
              transactionHash: ensureHex(r.transactionHash, 'transactionHash', op),
            };
          });
        },
      );
    },

    async getLogs(filter) {
      const params = encodeLogFilter(filter);
      return withRpcOp('eth', OP_ETH.getLogs, 'Failed to fetch logs.', { filter }, async () => {
        const raw: unknown = await transport(METHODS.getLogs, [params]);
        return ensureArray(raw, 'logs', OP_ETH.getLogs).map((entry, i) => normalizeLog(entry, i));
      });
    },
  };
}
