/**
 * @file src/node/client.ts
 * HTTP client for the node's v1 REST API. Read-only apart from pushing a
 * finalized transaction to the pool. No wallet access, no secrets.
 */

import { z } from 'zod';
import { serializeTransaction } from '../slate/codec.js';
import type { Transaction } from '../slate/types.js';
import { NetworkError } from '../wallet/types.js';
import type { ChainOutput, NodeClient } from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;

/** Commitments per byids request, to keep URLs short. */
const OUTPUT_BATCH = 100;

const chainTipSchema = z.object({
  height: z.number().int().nonnegative(),
  last_block_pushed: z.string().optional(),
});

const outputsSchema = z.array(
  z.object({
    commit: z.string().regex(/^[0-9a-f]{64}$/),
    height: z.number().int().nonnegative(),
    output_type: z.enum(['Coinbase', 'Transaction']),
  }),
);

export class HttpNodeClient implements NodeClient {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async getChainHeight(): Promise<number> {
    const tip = await this.getJson('/v1/chain', chainTipSchema);
    return tip.height;
  }

  async getOutputs(commitments: readonly string[]): Promise<Map<string, ChainOutput>> {
    const found = new Map<string, ChainOutput>();

    for (let i = 0; i < commitments.length; i += OUTPUT_BATCH) {
      const batch = commitments.slice(i, i + OUTPUT_BATCH);
      const query = batch.map((c) => `id=${encodeURIComponent(c)}`).join('&');
      const outputs = await this.getJson(`/v1/chain/outputs/byids?${query}`, outputsSchema);
      for (const o of outputs) {
        found.set(o.commit, {
          commitment: o.commit,
          height: o.height,
          features: o.output_type === 'Coinbase' ? 'coinbase' : 'plain',
        });
      }
    }

    return found;
  }

  async postTransaction(tx: Transaction): Promise<void> {
    const resp = await this.request('/v1/pool/push', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: serializeTransaction(tx),
    });
    if (!resp.ok) {
      throw new NetworkError(`Node rejected transaction: HTTP ${resp.status}`);
    }
  }

  toString(): string {
    return `HttpNodeClient(${this.baseUrl})`;
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private async getJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const resp = await this.request(path, { method: 'GET' });
    if (!resp.ok) {
      throw new NetworkError(`GET ${path.split('?')[0] ?? path} failed: HTTP ${resp.status}`);
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch (err) {
      throw new NetworkError(`GET ${path.split('?')[0] ?? path} returned invalid JSON`, err);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new NetworkError(`GET ${path.split('?')[0] ?? path} returned an unexpected shape`, parsed.error);
    }
    return parsed.data;
  }

  private async request(path: string, init: RequestInit): Promise<Response> {
    const ctrl = new AbortController();
    const t = setTimeout(() => ctrl.abort(), this.timeoutMs);
    try {
      return await fetch(`${this.baseUrl}${path}`, { ...init, signal: ctrl.signal });
    } catch (err) {
      throw new NetworkError(`Node request ${init.method ?? 'GET'} ${path.split('?')[0] ?? path} failed`, err);
    } finally {
      clearTimeout(t);
    }
  }
}
