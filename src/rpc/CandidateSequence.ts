/**
 * Candidate sequences
 *
 * Decide in which order a pool's members are tried for one logical call.
 *
 * @module rpc/CandidateSequence
 */

import type { FailoverPolicy } from './types.js';

/**
 * Produces, for one logical call, the pool indices to try in order.
 * Every sequence yields each index exactly once.
 */
export interface CandidatePolicy {
  readonly name: FailoverPolicy;
  candidates(size: number): Iterable<number>;
  /** Called once for every candidate whose attempt failed */
  recordFailure(size: number): void;
}

/**
 * Starts at a shared cursor that moves one step for every failed attempt
 * and stays put on success. With [A(down), B(up)] the first call tries A
 * then B and every later call starts at B; a call that exhausts the pool
 * leaves the cursor where it found it.
 *
 * Updates are relative. For a fixed pool the cursor equals the total
 * failure count modulo its size, however concurrent calls interleave.
 */
export class RotatingPolicy implements CandidatePolicy {
  readonly name = 'rotating' as const;
  private cursor = 0;

  get position(): number {
    return this.cursor;
  }

  *candidates(size: number): Generator<number> {
    if (size <= 0) return;
    const start = this.cursor % size;
    for (let step = 0; step < size; step++) {
      yield (start + step) % size;
    }
  }

  recordFailure(size: number): void {
    if (size <= 0) return;
    this.cursor = (this.cursor + 1) % size;
  }
}

/**
 * Always starts from the first member, in configured order. Stateless.
 */
export class FallbackPolicy implements CandidatePolicy {
  readonly name = 'fallback' as const;

  *candidates(size: number): Generator<number> {
    for (let index = 0; index < size; index++) {
      yield index;
    }
  }

  recordFailure(): void {}
}

export function createPolicy(policy: FailoverPolicy): CandidatePolicy {
  return policy === 'rotating' ? new RotatingPolicy() : new FallbackPolicy();
}
