/**
 * @file src/node/types.ts
 * The wallet's view of a chain node. Read-only except for posting a
 * finalized transaction.
 */

import type { Transaction } from '../slate/types.js';
import type { OutputFeatures } from '../wallet/types.js';

export interface ChainOutput {
  commitment: string;
  height: number;
  features: OutputFeatures;
}

export interface NodeClient {
  getChainHeight(): Promise<number>;
  /** Looks up unspent outputs by commitment. Missing commitments are absent from the map. */
  getOutputs(commitments: readonly string[]): Promise<Map<string, ChainOutput>>;
  postTransaction(tx: Transaction): Promise<void>;
}
