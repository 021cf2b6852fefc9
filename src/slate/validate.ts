/**
 * @file src/slate/validate.ts
 *
 * Structural checks on a slate received from a counterparty. These throw:
 * a slate that fails them is malformed, not merely unacceptable. Whether a
 * well-formed slate is acceptable (phase, replay, balance) is decided by
 * the builder.
 */

import { decodePoint, scalarFromHex, type Point } from '../crypto/primitives.js';
import type { Signature } from '../crypto/schnorr.js';
import { WalletError, InvalidSlateError } from '../wallet/types.js';
import type { ParticipantData, Slate } from './types.js';

export const SENDER = 0;
export const RECEIVER = 1;

export interface DecodedParticipant {
  excess: Point;
  nonce: Point;
  partialSig: bigint | null;
  message: string | null;
  messageSig: Signature | null;
}

/** The slate's group elements and scalars, decoded once. */
export interface DecodedSlate {
  inputs: Point[];
  outputs: Point[];
  offset: bigint;
  participants: DecodedParticipant[];
}

export function validateSlate(slate: Slate): DecodedSlate {
  if (slate.amount <= 0n) {
    throw new InvalidSlateError('Slate amount must be greater than 0.');
  }
  if (slate.fee < 0n) {
    throw new InvalidSlateError('Slate fee must not be negative.');
  }
  if (slate.tx.inputs.length === 0) {
    throw new InvalidSlateError('Slate has no inputs.');
  }

  const expected = slate.phase === 'created' ? 1 : 2;
  if (slate.participants.length !== expected) {
    throw new InvalidSlateError(
      `A ${slate.phase} slate must have ${expected} participant(s), found ${slate.participants.length}.`,
    );
  }
  slate.participants.forEach((p, i) => {
    if (p.id !== i) {
      throw new InvalidSlateError(`Participant at position ${i} has id ${p.id}.`);
    }
  });
  if (slate.phase !== 'created' && slate.participants[RECEIVER]?.partialSig === null) {
    throw new InvalidSlateError('Receiver has not signed.');
  }

  const commitments = [...slate.tx.inputs, ...slate.tx.outputs].map((e) => e.commitment);
  if (new Set(commitments).size !== commitments.length) {
    throw new InvalidSlateError('Slate repeats a commitment.');
  }

  return guard(() => ({
    inputs: slate.tx.inputs.map((i) => decodePoint(i.commitment)),
    outputs: slate.tx.outputs.map((o) => decodePoint(o.commitment)),
    offset: scalarFromHex(slate.offset),
    participants: slate.participants.map(decodeParticipant),
  }));
}

function decodeParticipant(p: ParticipantData): DecodedParticipant {
  if ((p.message === null) !== (p.messageSig === null)) {
    throw new InvalidSlateError(`Participant ${p.id} has a message without a signature, or the reverse.`);
  }
  return {
    excess: decodePoint(p.publicBlindExcess),
    nonce: decodePoint(p.publicNonce),
    partialSig: p.partialSig === null ? null : scalarFromHex(p.partialSig),
    message: p.message,
    messageSig:
      p.messageSig === null
        ? null
        : { nonce: decodePoint(p.messageSig.nonce), s: scalarFromHex(p.messageSig.s) },
  };
}

/** Re-throws encoding failures as InvalidSlateError. */
function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof InvalidSlateError) throw err;
    if (err instanceof WalletError && err.code === 'CRYPTO_ERROR') {
      throw new InvalidSlateError(`Slate carries an invalid encoding: ${err.message}`, err);
    }
    throw err;
  }
}
