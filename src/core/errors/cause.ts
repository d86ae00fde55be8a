// src/core/errors/cause.ts

const isRecord = (x: unknown): x is Record<string, unknown> => x !== null && typeof x === 'object';

export type ShapedCause = {
  name?: string;
  message?: string;
  code?: unknown;
  data?: string;
};

/** Extracts the serializable parts of a thrown value (viem, ethers or plain JSON-RPC errors). */
export function shapeCause(err: unknown): ShapedCause {
  if (!isRecord(err)) {
    return err === undefined ? {} : { message: String(err) };
  }

  let data: unknown = undefined;
  const d = err.data;
  if (isRecord(d) && 'data' in d) {
    data = d.data;
  } else if ('error' in err && isRecord(err.error) && 'data' in err.error) {
    data = err.error.data;
  } else if ('data' in err) {
    data = d;
  }

  const name = typeof err.name === 'string' ? err.name : undefined;
  const message =
    typeof err.shortMessage === 'string'
      ? err.shortMessage
      : typeof err.message === 'string'
        ? err.message
        : undefined;
  const code = 'code' in err ? err.code : undefined;

  return {
    name,
    message,
    code,
    data: typeof data === 'string' && data.startsWith('0x') ? `${data.slice(0, 10)}…` : undefined,
  };
}
