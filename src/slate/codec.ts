/**
 * @file src/slate/codec.ts
 *
 * JSON wire form of slates and transactions. Slates arrive from a
 * counterparty over an untrusted transport, so parsing validates shape,
 * encodings and ranges before anything else looks at them. Amounts travel
 * as decimal strings to survive JSON.
 */

import { z } from 'zod';
import { InvalidSlateError } from '../wallet/types.js';
import type { Slate, Transaction } from './types.js';

const U64_MAX = 2n ** 64n - 1n;

export const MAX_MESSAGE_LEN = 1024;

const u64 = z
  .string()
  .regex(/^\d{1,20}$/, 'must be a non-negative integer string')
  .transform((s) => BigInt(s))
  .refine((n) => n <= U64_MAX, 'exceeds 64 bits');

const hex32 = z.string().regex(/^[0-9a-f]{64}$/, 'must be 32 bytes of lowercase hex');

const height = z.number().int().nonnegative();

const features = z.enum(['plain', 'coinbase']);

const entry = z.object({ features, commitment: hex32 });

const signature = z.object({ nonce: hex32, s: hex32 });

const participant = z.object({
  id: z.number().int().min(0).max(1),
  publicBlindExcess: hex32,
  publicNonce: hex32,
  partialSig: hex32.nullable(),
  message: z.string().max(MAX_MESSAGE_LEN).nullable(),
  messageSig: signature.nullable(),
});

const slateSchema = z.object({
  version: z.literal(1),
  id: z.string().uuid(),
  phase: z.enum(['created', 'received', 'finalized']),
  amount: u64,
  fee: u64,
  height,
  lockHeight: height,
  offset: hex32,
  tx: z.object({
    inputs: z.array(entry).max(512),
    outputs: z.array(entry).max(512),
  }),
  participants: z.array(participant).max(2),
});

const transactionSchema = z.object({
  offset: hex32,
  inputs: z.array(entry),
  outputs: z.array(entry),
  kernel: z.object({
    features: z.literal('plain'),
    fee: u64,
    lockHeight: height,
    excess: hex32,
    excessSig: signature,
  }),
});

// ── Slates ────────────────────────────────────────────────────────────────────

export function slateToJson(slate: Slate): Record<string, unknown> {
  return {
    ...slate,
    amount: slate.amount.toString(),
    fee: slate.fee.toString(),
  };
}

export function serializeSlate(slate: Slate): string {
  return JSON.stringify(slateToJson(slate), null, 2);
}

/** Throws InvalidSlateError listing every problem found. */
export function parseSlate(input: unknown): Slate {
  const raw = typeof input === 'string' ? parseJson(input, 'Slate') : input;
  const result = slateSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidSlateError(`Malformed slate: ${describeIssues(result.error)}`, result.error);
  }
  return result.data;
}

// ── Transactions ──────────────────────────────────────────────────────────────

export function transactionToJson(tx: Transaction): Record<string, unknown> {
  return {
    ...tx,
    kernel: { ...tx.kernel, fee: tx.kernel.fee.toString() },
  };
}

export function serializeTransaction(tx: Transaction): string {
  return JSON.stringify(transactionToJson(tx));
}

export function parseTransaction(input: unknown): Transaction {
  const raw = typeof input === 'string' ? parseJson(input, 'Transaction') : input;
  const result = transactionSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidSlateError(`Malformed transaction: ${describeIssues(result.error)}`, result.error);
  }
  return result.data;
}

// ── Internals ─────────────────────────────────────────────────────────────────

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new InvalidSlateError(`${what} is not valid JSON.`, err);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
