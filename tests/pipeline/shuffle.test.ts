import { describe, it, expect } from 'vitest';
import { mulberry32, planSeed, tieredShuffle } from '../../src/pipeline/shuffle.js';

const config = { fixedHead: 3, middleBand: 4, middleWindow: 2 };
const head = ['h1', 'h2', 'h3'];
const rest = Array.from({ length: 10 }, (_, i) => `r${i + 1}`);

describe('mulberry32', () => {
  it('should replay the same sequence for the same seed', () => {
    const a = mulberry32(1234);
    const b = mulberry32(1234);

    const first = Array.from({ length: 5 }, () => a());
    const second = Array.from({ length: 5 }, () => b());

    expect(first).toEqual(second);
  });

  it('should stay within [0, 1)', () => {
    const random = mulberry32(99);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('planSeed', () => {
  it('should be stable for a session and epoch', () => {
    expect(planSeed('session_1', 1)).toBe(planSeed('session_1', 1));
  });

  it('should change with the epoch', () => {
    expect(planSeed('session_1', 1)).not.toBe(planSeed('session_1', 2));
  });

  it('should be an unsigned 32-bit integer', () => {
    const seed = planSeed('session_1', 1);
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });
});

describe('tieredShuffle', () => {
  it('should swap inside each middle window and permute the tail', () => {
    const result = tieredShuffle(head, rest, config, () => 0);

    expect(result).toEqual([
      'h1', 'h2', 'h3',
      'r2', 'r1', 'r4', 'r3',
      'r6', 'r7', 'r8', 'r9', 'r10', 'r5',
    ]);
  });

  it('should leave the order alone when every draw keeps its slot', () => {
    const result = tieredShuffle(head, rest, config, () => 0.999);

    expect(result).toEqual([...head, ...rest]);
  });

  it('should keep the head and window membership for any seed', () => {
    const result = tieredShuffle(head, rest, config, mulberry32(planSeed('session_x', 3)));

    expect(result.slice(0, 3)).toEqual(head);
    expect(new Set(result.slice(3, 5))).toEqual(new Set(['r1', 'r2']));
    expect(new Set(result.slice(5, 7))).toEqual(new Set(['r3', 'r4']));
    expect([...result.slice(7)].sort()).toEqual(['r10', 'r5', 'r6', 'r7', 'r8', 'r9']);
  });

  it('should be reproducible from the plan seed', () => {
    const seed = planSeed('session_x', 3);

    expect(tieredShuffle(head, rest, config, mulberry32(seed))).toEqual(
      tieredShuffle(head, rest, config, mulberry32(seed)),
    );
  });

  it('should handle a remainder shorter than the middle band', () => {
    expect(tieredShuffle(head, ['r1', 'r2', 'r3'], config, () => 0)).toEqual([
      'h1', 'h2', 'h3', 'r2', 'r1', 'r3',
    ]);
  });

  it('should not mutate its inputs', () => {
    const input = [...rest];
    tieredShuffle(head, input, config, () => 0);
    expect(input).toEqual(rest);
  });
});
