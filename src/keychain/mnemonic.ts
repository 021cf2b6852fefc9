/**
 * @file src/keychain/mnemonic.ts
 * BIP-39 backup phrase for the wallet seed.
 * 32 bytes of entropy encode to 24 English words.
 */

import { entropyToMnemonic, mnemonicToEntropy, validateMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english';
import { SEED_LEN } from '../crypto/keychain.js';
import { WalletError } from '../wallet/types.js';

export interface MnemonicCodec {
  createMnemonic(seed: Uint8Array): string;
  mnemonicToSeed(words: string): Buffer;
}

export const bip39Codec: MnemonicCodec = {
  createMnemonic(seed: Uint8Array): string {
    if (seed.length !== SEED_LEN) {
      throw new WalletError('INVALID_ARGUMENT', `Expected ${SEED_LEN} bytes of entropy, got ${seed.length}.`);
    }
    return entropyToMnemonic(seed, wordlist);
  },

  mnemonicToSeed(words: string): Buffer {
    const normalised = words.trim().toLowerCase().split(/\s+/).join(' ');
    if (normalised.split(' ').length !== 24 || !validateMnemonic(normalised, wordlist)) {
      throw new WalletError('INVALID_ARGUMENT', 'Recovery phrase is not a valid 24-word mnemonic.');
    }
    return Buffer.from(mnemonicToEntropy(normalised, wordlist));
  },
};
