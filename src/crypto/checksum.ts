import { sha256 } from '@noble/hashes/sha256';
import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import type { ChecksumAlgorithm } from '../types.js';

export interface IncrementalHash {
  update(chunk: Uint8Array): void;
  digestHex(): string;
}

export function createHasher(algorithm: ChecksumAlgorithm): IncrementalHash {
  const hash = algorithm === 'sha256' ? sha256.create() : blake3.create({});
  return {
    update(chunk) {
      hash.update(chunk);
    },
    digestHex() {
      return bytesToHex(hash.digest());
    },
  };
}

export function checksumMatches(actualHex: string, expectedHex: string): boolean {
  if (!/^[0-9a-f]*$/i.test(expectedHex) || expectedHex.length % 2 !== 0) {
    return false;
  }
  return timingSafeEqual(hexToBytes(actualHex), hexToBytes(expectedHex.toLowerCase()));
}

export function timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}
