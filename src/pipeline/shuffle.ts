import { createHash } from 'crypto';

export interface TieredShuffleConfig {
  /** Leading positions kept in score order. */
  fixedHead: number;
  /** Positions after the head that are only permuted locally. */
  middleBand: number;
  /** Size of each local permutation window inside the middle band. */
  middleWindow: number;
}

export type Random = () => number;

/** Derive a 32-bit seed from a session id and its plan generation epoch. */
export function planSeed(sessionId: string, epoch: number): number {
  return createHash('sha256').update(`${sessionId}:${epoch}`).digest().readUInt32BE(0);
}

export function mulberry32(seed: number): Random {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function fisherYates<T>(items: T[], random: Random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Reorder an already ranked list. `head` must be the ranked top of the list;
 * `rest` follows in bucket order. The middle band is shuffled window by
 * window, the tail fully, all from the same seeded sequence.
 */
export function tieredShuffle<T>(
  head: readonly T[],
  rest: readonly T[],
  config: TieredShuffleConfig,
  random: Random,
): T[] {
  const middle = rest.slice(0, config.middleBand);
  const tail = rest.slice(config.middleBand);

  const permutedMiddle: T[] = [];
  for (let start = 0; start < middle.length; start += config.middleWindow) {
    permutedMiddle.push(...fisherYates(middle.slice(start, start + config.middleWindow), random));
  }

  return [...head, ...permutedMiddle, ...fisherYates(tail, random)];
}
