/* eslint-disable @typescript-eslint/no-explicit-any */
import { describe, it, expect, vi } from 'vitest';
import { createEthRpc, encodeLogFilter, parseTxHash } from '../eth';
import type { RpcTransport } from '../types';
import { isProviderError, isProviderErrorOfType } from '../../types/errors';
import type { Address, Hash } from '../../types/primitives';

// Minimal transport fake (map method -> value or function)
function fakeTransport(map: Record<string, any>): RpcTransport {
  return (method, params = []) => {
    const handler = map[method];
    if (handler === undefined) return Promise.reject(new Error(`unexpected method: ${method}`));
    const result = typeof handler === 'function' ? handler(...params) : handler;
    return Promise.resolve(result);
  };
}

const ADDR = '0x1111111111111111111111111111111111111111' as Address;
const TX_HASH = ('0x' + 'ab'.repeat(32)) as Hash;
const BLOCK_HASH = ('0x' + 'cd'.repeat(32)) as Hash;

async function rejection(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (e) {
    return e;
  }
  throw new Error('expected to throw');
}

describe('rpc/eth.getChainId', () => {
  it('decodes the hex quantity', async () => {
    const rpc = createEthRpc(fakeTransport({ eth_chainId: '0x539' }));
    expect(await rpc.getChainId()).toBe(1337);
  });

  it('rejects a non-quantity response as MALFORMED_RESPONSE', async () => {
    const rpc = createEthRpc(fakeTransport({ eth_chainId: 'abc' }));
    const err = await rejection(rpc.getChainId());
    expect(isProviderErrorOfType(err, 'MALFORMED_RESPONSE')).toBe(true);
  });
});

describe('rpc/eth.getBlockNumber', () => {
  it('returns a bigint', async () => {
    const rpc = createEthRpc(fakeTransport({ eth_blockNumber: '0x10' }));
    expect(await rpc.getBlockNumber()).toBe(16n);
  });
});

describe('rpc/eth.getCodeAt', () => {
  it('queries the latest block and decodes the bytecode', async () => {
    const seen: unknown[][] = [];
    const rpc = createEthRpc(
      fakeTransport({
        eth_getCode: (...params: unknown[]) => {
          seen.push(params);
          return '0x6001ff';
        },
      }),
    );

    const code = await rpc.getCodeAt(ADDR);
    expect(Array.from(code)).toEqual([0x60, 0x01, 0xff]);
    expect(seen).toEqual([[ADDR, 'latest']]);
  });

  it('returns an empty byte array for accounts without code', async () => {
    const rpc = createEthRpc(fakeTransport({ eth_getCode: '0x' }));
    const code = await rpc.getCodeAt(ADDR);
    expect(code).toBeInstanceOf(Uint8Array);
    expect(code.length).toBe(0);
  });
});

describe('rpc/eth.getTransactionByHash', () => {
  it('returns null when the node does not know the hash', async () => {
    const rpc = createEthRpc(fakeTransport({ eth_getTransactionByHash: null }));
    expect(await rpc.getTransactionByHash(TX_HASH)).toBeNull();
  });

  it('normalizes quantities of a mined transaction', async () => {
    const rpc = createEthRpc(
      fakeTransport({
        eth_getTransactionByHash: {
          hash: TX_HASH,
          blockHash: BLOCK_HASH,
          blockNumber: '0x64',
          transactionIndex: '0x2',
          from: ADDR,
          to: null,
          value: '0xde0b6b3a7640000',
          nonce: '0x7',
          gas: '0x5208',
          maxFeePerGas: '0x3b9aca00',
          maxPriorityFeePerGas: '0x1',
          input: '0x',
          type: '0x2',
          chainId: '0x1',
        },
      }),
    );

    expect(await rpc.getTransactionByHash(TX_HASH)).toEqual({
      hash: TX_HASH,
      blockHash: BLOCK_HASH,
      blockNumber: 100n,
      transactionIndex: 2,
      from: ADDR,
      to: null,
      value: 1_000_000_000_000_000_000n,
      nonce: 7,
      gas: 21000n,
      maxFeePerGas: 1_000_000_000n,
      maxPriorityFeePerGas: 1n,
      input: '0x',
      type: 2,
      chainId: 1,
    });
  });

  it('keeps pending transactions (no block) and defaults a missing type to 0', async () => {
    const rpc = createEthRpc(
      fakeTransport({
        eth_getTransactionByHash: {
          hash: TX_HASH,
          blockHash: null,
          blockNumber: null,
          transactionIndex: null,
          from: ADDR,
          to: ADDR,
          value: '0x0',
          nonce: '0x0',
          gas: '0x5208',
          gasPrice: '0x2',
          input: '0xabcdef',
        },
      }),
    );

    const tx = await rpc.getTransactionByHash(TX_HASH);
    expect(tx?.blockNumber).toBeNull();
    expect(tx?.type).toBe(0);
    expect(tx?.gasPrice).toBe(2n);
    expect(tx?.to).toBe(ADDR);
  });
});

describe('rpc/eth.traceReplayTransaction', () => {
  it('rejects a malformed hash with INVALID_HASH before any request', async () => {
    const transport = vi.fn<RpcTransport>();
    const rpc = createEthRpc(transport);

    const err = await rejection(rpc.traceReplayTransaction('0x1234', ['trace']));
    expect(isProviderErrorOfType(err, 'INVALID_HASH')).toBe(true);
    expect(transport).not.toHaveBeenCalled();
  });

  it('sends the parsed hash and trace types', async () => {
    const transport = vi.fn<RpcTransport>().mockResolvedValue({
      output: '0x01',
      trace: [
        {
          type: 'call',
          action: { from: ADDR, to: ADDR, value: '0x0' },
          result: { gasUsed: '0x0', output: '0x01' },
          subtraces: 0,
          traceAddress: [],
        },
      ],
      stateDiff: null,
      vmTrace: null,
    });
    const rpc = createEthRpc(transport);

    const res = await rpc.traceReplayTransaction(TX_HASH, ['trace', 'stateDiff']);
    expect(transport).toHaveBeenCalledWith('trace_replayTransaction', [
      TX_HASH,
      ['trace', 'stateDiff'],
    ]);
    expect(res.output).toBe('0x01');
    expect(res.trace).toHaveLength(1);
    expect(res.trace[0]?.type).toBe('call');
    expect(res.stateDiff).toBeNull();
    expect(res.vmTrace).toBeNull();
  });

  it('treats a null trace list as empty', async () => {
    const rpc = createEthRpc(
      fakeTransport({
        trace_replayTransaction: { output: '0x', trace: null, stateDiff: { [ADDR]: {} } },
      }),
    );
    const res = await rpc.traceReplayTransaction(TX_HASH, ['stateDiff']);
    expect(res.trace).toEqual([]);
    expect(res.stateDiff).toEqual({ [ADDR]: {} });
  });
});

describe('rpc/eth.traceReplayBlockTransactions', () => {
  it('encodes the block number and pairs results with transaction hashes', async () => {
    const transport = vi.fn<RpcTransport>().mockResolvedValue([
      { output: '0x', trace: [], stateDiff: null, vmTrace: null, transactionHash: TX_HASH },
    ]);
    const rpc = createEthRpc(transport);

    const res = await rpc.traceReplayBlockTransactions(10n, ['trace']);
    expect(transport).toHaveBeenCalledWith('trace_replayBlockTransactions', ['0xa', ['trace']]);
    expect(res).toEqual([
      { output: '0x', trace: [], stateDiff: null, vmTrace: null, transactionHash: TX_HASH },
    ]);
  });

  it('accepts a plain number', async () => {
    const transport = vi.fn<RpcTransport>().mockResolvedValue([]);
    const rpc = createEthRpc(transport);

    expect(await rpc.traceReplayBlockTransactions(255, ['vmTrace'])).toEqual([]);
    expect(transport).toHaveBeenCalledWith('trace_replayBlockTransactions', ['0xff', ['vmTrace']]);
  });

  it.each([-1, 1.5, -1n, Number.NaN])(
    'rejects block number %s with INVALID_ARGUMENT before any request',
    async (blockNumber) => {
      const transport = vi.fn<RpcTransport>();
      const rpc = createEthRpc(transport);

      const err = await rejection(rpc.traceReplayBlockTransactions(blockNumber, ['trace']));
      if (!isProviderError(err)) throw err;
      expect(err.type).toBe('INVALID_ARGUMENT');
      expect(err.envelope.operation).toBe('trace.replayBlockTransactions');
      expect(err.envelope.context).toEqual({ blockNumber: String(blockNumber) });
      expect(transport).not.toHaveBeenCalled();
    },
  );
});

describe('rpc/eth.getLogs', () => {
  it('serializes the filter and normalizes logs', async () => {
    const topic = ('0x' + '01'.repeat(32)) as Hash;
    const transport = vi.fn<RpcTransport>().mockResolvedValue([
      {
        address: ADDR,
        topics: [topic],
        data: '0x',
        blockNumber: '0x1',
        blockHash: BLOCK_HASH,
        transactionHash: TX_HASH,
        transactionIndex: '0x0',
        logIndex: '0x3',
        removed: false,
      },
    ]);
    const rpc = createEthRpc(transport);

    const logs = await rpc.getLogs({
      address: ADDR,
      topics: [topic, null],
      fromBlock: 1n,
      toBlock: 'latest',
    });

    expect(transport).toHaveBeenCalledWith('eth_getLogs', [
      { address: ADDR, topics: [topic, null], fromBlock: '0x1', toBlock: 'latest' },
    ]);
    expect(logs).toEqual([
      {
        address: ADDR,
        topics: [topic],
        data: '0x',
        blockNumber: 1n,
        blockHash: BLOCK_HASH,
        transactionHash: TX_HASH,
        transactionIndex: 0,
        logIndex: 3,
        removed: false,
      },
    ]);
  });

  it('returns an empty list when nothing matches', async () => {
    const rpc = createEthRpc(fakeTransport({ eth_getLogs: [] }));
    expect(await rpc.getLogs({ blockHash: BLOCK_HASH })).toEqual([]);
  });
});

describe('rpc/eth upstream errors', () => {
  it('wraps transport failures as UPSTREAM and keeps the original cause', async () => {
    const upstream = Object.assign(new Error('method not found'), { code: -32601 });
    const rpc = createEthRpc(() => Promise.reject(upstream));

    const ops: Array<() => Promise<unknown>> = [
      () => rpc.getChainId(),
      () => rpc.getBlockNumber(),
      () => rpc.getCodeAt(ADDR),
      () => rpc.getTransactionByHash(TX_HASH),
      () => rpc.traceReplayTransaction(TX_HASH, ['trace']),
      () => rpc.traceReplayBlockTransactions(1n, ['trace']),
      () => rpc.getLogs({}),
    ];

    for (const op of ops) {
      const err = await rejection(op());
      expect(isProviderErrorOfType(err, 'UPSTREAM')).toBe(true);
      if (!isProviderError(err)) throw new Error('expected ProviderError');
      expect(err.cause).toBe(upstream);
      expect(err.envelope.cause).toBe(upstream);
    }
  });

  it('records the operation on the envelope', async () => {
    const rpc = createEthRpc(() => Promise.reject(new Error('boom')));
    const err = await rejection(rpc.getLogs({}));
    if (!isProviderError(err)) throw new Error('expected ProviderError');
    expect(err.envelope.operation).toBe('eth.getLogs');
    expect(err.envelope.resource).toBe('eth');
    expect(err.envelope.message).toBe('Failed to fetch logs.');
  });
});

describe('rpc/eth.parseTxHash', () => {
  it('accepts 32 bytes with or without the 0x prefix', () => {
    expect(parseTxHash(TX_HASH)).toBe(TX_HASH);
    expect(parseTxHash('ab'.repeat(32))).toBe(TX_HASH);
    expect(parseTxHash('0X' + 'ab'.repeat(32))).toBe(TX_HASH);
  });

  it('rejects short, long and non-hex input', () => {
    const bad = ['', '0x', '0x' + 'ab'.repeat(31), '0x' + 'ab'.repeat(33), '0x' + 'zz'.repeat(32)];
    for (const value of bad) {
      expect(() => parseTxHash(value)).toThrow(/Invalid transaction hash/);
    }
  });
});

describe('rpc/eth.encodeLogFilter', () => {
  it('rejects a negative block bound with INVALID_ARGUMENT', () => {
    let caught: unknown;
    try {
      encodeLogFilter({ fromBlock: -5n, toBlock: 'latest' });
    } catch (e) {
      caught = e;
    }
    if (!isProviderError(caught)) throw new Error('expected a ProviderError');
    expect(caught.type).toBe('INVALID_ARGUMENT');
    expect(caught.envelope.context).toEqual({ fromBlock: '-5' });
  });

  it('drops block bounds when a block hash is given', () => {
    expect(encodeLogFilter({ blockHash: BLOCK_HASH, address: [ADDR] })).toEqual({
      address: [ADDR],
      blockHash: BLOCK_HASH,
    });
  });

  it('omits unset fields', () => {
    expect(encodeLogFilter({})).toEqual({});
    expect(encodeLogFilter({ fromBlock: 'earliest' })).toEqual({ fromBlock: 'earliest' });
  });
});
