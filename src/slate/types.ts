/**
 * @file src/slate/types.ts
 * The slate is the only thing the two parties exchange. Every field in it
 * is public; blinding factors and nonces never leave their owner's wallet.
 */

import type { OutputFeatures } from '../wallet/types.js';

export type SlatePhase = 'created' | 'received' | 'finalized';

export interface TxInput {
  features: OutputFeatures;
  commitment: string;
}

export interface TxOutput {
  features: OutputFeatures;
  commitment: string;
}

/** Hex-encoded Schnorr signature: public nonce point and scalar. */
export interface SignatureData {
  nonce: string;
  s: string;
}

/** Participant 0 is the sender, participant 1 the receiver. */
export interface ParticipantData {
  id: number;
  publicBlindExcess: string;
  publicNonce: string;
  /** Hex scalar. Null until the participant signs. */
  partialSig: string | null;
  message: string | null;
  /** Signature over the message under publicBlindExcess. */
  messageSig: SignatureData | null;
}

export interface Slate {
  version: 1;
  /** Transaction-unique id. Keys both parties' slate logs. */
  id: string;
  phase: SlatePhase;
  amount: bigint;
  fee: bigint;
  /** Chain height when the sender built the slate. */
  height: number;
  lockHeight: number;
  /** Kernel offset chosen by the sender, hex scalar. */
  offset: string;
  tx: {
    inputs: TxInput[];
    outputs: TxOutput[];
  };
  participants: ParticipantData[];
}

export interface TxKernel {
  features: 'plain';
  fee: bigint;
  lockHeight: number;
  /** Aggregate public excess. */
  excess: string;
  excessSig: SignatureData;
}

/** Fully signed and balanced. Immutable once produced. */
export interface Transaction {
  offset: string;
  inputs: TxInput[];
  outputs: TxOutput[];
  kernel: TxKernel;
}
