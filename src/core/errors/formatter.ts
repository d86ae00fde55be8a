// src/core/errors/formatter.ts

/* -------------------- Formatting helpers -------------------- */
import type { ErrorEnvelope } from '../types/errors';
import { isBigint, isNumber } from '../utils/number';

function elideMiddle(s: string, max = 96): string {
  if (s.length <= max) return s;
  const keep = Math.max(10, Math.floor((max - 1) / 2));
  return `${s.slice(0, keep)}…${s.slice(-keep)}`;
}

function shortJSON(v: unknown, max = 240): string {
  try {
    const s = JSON.stringify(v, (_k: string, val: unknown): unknown =>
      isBigint(val) ? `${val.toString()}n` : val,
    );
    return s.length > max ? elideMiddle(s, max) : s;
  } catch {
    return String(v);
  }
}

function scalar(v: unknown, max: number): string {
  return typeof v === 'string' || isNumber(v) || isBigint(v) || typeof v === 'boolean'
    ? String(v)
    : shortJSON(v, max);
}

function kv(label: string, value: string): string {
  const width = 10;
  const pad = label.length >= width ? ' ' : ' '.repeat(width - label.length);
  return `${label + pad}: ${value}`;
}

// Only the keys worth a glance; the full context stays on the envelope.
const CONTEXT_KEYS = ['transport', 'endpoint', 'txHash', 'address', 'blockNumber'] as const;

function formatContextLine(ctx?: Record<string, unknown>): string | undefined {
  if (!ctx) return;
  const parts: string[] = [];
  for (const key of CONTEXT_KEYS) {
    const value = ctx[key];
    if (value !== undefined) parts.push(`${key}=${scalar(value, 96)}`);
  }
  return parts.length ? `  ${kv('Context', parts.join('  •  '))}` : undefined;
}

function formatCause(c?: unknown): string[] {
  if (c === undefined || c === null) return [];
  const out: string[] = [];

  if (typeof c === 'object') {
    const obj = c as Record<string, unknown>;
    const head: string[] = [];
    if (obj.name !== undefined) head.push(`name=${scalar(obj.name, 120)}`);
    if (obj.code !== undefined) head.push(`code=${scalar(obj.code, 120)}`);
    if (head.length) out.push(`  ${kv('Cause', head.join('  '))}`);

    const message = obj.shortMessage ?? obj.message;
    if (message) {
      out.push(`              message=${elideMiddle(scalar(message, 600), 600)}`);
    }
  } else {
    out.push(`  ${kv('Cause', shortJSON(c, 200))}`);
  }

  return out;
}

export function formatEnvelopePretty(e: ErrorEnvelope): string {
  const lines: string[] = [];

  // Header
  lines.push(`✖ ProviderError [${e.type}]`);
  lines.push(`  ${kv('Message', e.message)}`);
  lines.push('');

  lines.push(`  ${kv('Operation', e.operation)}`);
  lines.push(`  ${kv('Resource', e.resource)}`);

  const ctxLine = formatContextLine(e.context);
  if (ctxLine) lines.push(ctxLine);

  const causeLines = formatCause(e.cause);
  if (causeLines.length) lines.push(...causeLines);

  return lines.join('\n');
}
