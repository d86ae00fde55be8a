import type { Hex, Address, Hash } from '../types/primitives';

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type RpcTransport = (method: string, params?: unknown[]) => Promise<any>;

export type BlockTag = 'latest' | 'earliest' | 'pending' | 'safe' | 'finalized';

export type Transaction = {
  hash: Hash;
  blockHash: Hash | null;
  blockNumber: bigint | null;
  transactionIndex: number | null;
  from: Address;
  to: Address | null;
  value: bigint;
  nonce: number;
  gas: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  input: Hex;
  type: number;
  chainId?: number;
  v?: bigint;
  r?: Hex;
  s?: Hex;
};

export type Log = {
  address: Address;
  topics: Hex[];
  data: Hex;
  blockNumber: bigint | null;
  blockHash: Hash | null;
  transactionHash: Hash | null;
  transactionIndex: number | null;
  logIndex: number | null;
  removed: boolean;
};

/** A topic position matches one value, any of several values, or anything (null). */
export type TopicFilter = Hex | Hex[] | null;

export type LogFilter = {
  address?: Address | Address[];
  topics?: TopicFilter[];
} & (
  | { fromBlock?: bigint | BlockTag; toBlock?: bigint | BlockTag; blockHash?: never }
  | { blockHash: Hash; fromBlock?: never; toBlock?: never }
);

export type TraceType = 'trace' | 'vmTrace' | 'stateDiff';

// Parity-style traces. Action and result payloads depend on the trace type
// ("call", "create", "suicide", "reward"), so they stay as the node sent them.
export type TransactionTrace = {
  type: string;
  action: Record<string, unknown>;
  result: Record<string, unknown> | null;
  error?: string;
  subtraces: number;
  traceAddress: number[];
};

export type StateDiff = Record<Address, Record<string, unknown>>;

export type VmTrace = {
  code: Hex;
  ops: Record<string, unknown>[];
};

export type TraceResults = {
  output: Hex;
  trace: TransactionTrace[];
  stateDiff: StateDiff | null;
  vmTrace: VmTrace | null;
};

export type TraceResultsWithTransactionHash = TraceResults & {
  transactionHash: Hash;
};
