import { createHash } from 'crypto';

export interface BloomParameters {
  bits: number;
  hashes: number;
}

/**
 * Size a Bloom filter for `capacity` items at false-positive rate `fpRate`:
 * m = -n ln p / (ln 2)^2, k = (m / n) ln 2.
 */
export function bloomParameters(capacity: number, fpRate: number): BloomParameters {
  const bits = Math.ceil((-capacity * Math.log(fpRate)) / Math.LN2 ** 2);
  const hashes = Math.max(1, Math.round((bits / capacity) * Math.LN2));
  return { bits, hashes };
}

/** Bit offsets for `id` using double hashing over a SHA-256 digest. */
export function bloomPositions(id: string, params: BloomParameters): number[] {
  const digest = createHash('sha256').update(id).digest();
  const h1 = digest.readUInt32BE(0);
  const h2 = (digest.readUInt32BE(4) | 1) >>> 0;

  const positions: number[] = [];
  for (let i = 0; i < params.hashes; i++) {
    positions.push((h1 + i * h2) % params.bits);
  }
  return positions;
}
