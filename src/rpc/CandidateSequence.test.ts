import { describe, it, expect } from 'vitest';
import { FallbackPolicy, RotatingPolicy, createPolicy } from './CandidateSequence';

describe('CandidateSequence', () => {
  describe('RotatingPolicy', () => {
    it('should yield every index once starting at the cursor', () => {
      const policy = new RotatingPolicy();

      expect([...policy.candidates(3)]).toEqual([0, 1, 2]);
      expect(policy.position).toBe(0);
    });

    it('should advance one step per recorded failure', () => {
      const policy = new RotatingPolicy();

      policy.recordFailure(4);
      policy.recordFailure(4);

      expect(policy.position).toBe(2);
      expect([...policy.candidates(4)]).toEqual([2, 3, 0, 1]);
    });

    it('should return to its start after a failure per member', () => {
      const policy = new RotatingPolicy();
      policy.recordFailure(3);

      for (let i = 0; i < 3; i++) policy.recordFailure(3);

      expect(policy.position).toBe(1);
    });

    it('should not move while candidates are drawn', () => {
      const policy = new RotatingPolicy();
      policy.recordFailure(3);
      const sequence = policy.candidates(3)[Symbol.iterator]();

      sequence.next();
      sequence.next();

      expect(policy.position).toBe(1);
    });

    it('should wrap the cursor when the pool shrinks', () => {
      const policy = new RotatingPolicy();
      for (let i = 0; i < 4; i++) policy.recordFailure(5);

      expect([...policy.candidates(3)]).toEqual([1, 2, 0]);
    });

    it('should yield nothing for an empty pool', () => {
      expect([...new RotatingPolicy().candidates(0)]).toEqual([]);
    });
  });

  describe('FallbackPolicy', () => {
    it('should always start from the first index', () => {
      const policy = new FallbackPolicy();

      expect([...policy.candidates(3)]).toEqual([0, 1, 2]);
      policy.recordFailure();
      expect([...policy.candidates(3)]).toEqual([0, 1, 2]);
    });
  });

  it('should create policies by name', () => {
    expect(createPolicy('rotating')).toBeInstanceOf(RotatingPolicy);
    expect(createPolicy('fallback')).toBeInstanceOf(FallbackPolicy);
  });
});
