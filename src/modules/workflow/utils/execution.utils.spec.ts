import { DeadlineExceededError } from '../errors/workflow.errors';
import { Deadline, mergeParameters, sizeOf } from './execution.utils';

const delay = <T>(ms: number, value: T): Promise<T> =>
  new Promise((resolve) => setTimeout(() => resolve(value), ms));

describe('execution utils', () => {
  describe('mergeParameters', () => {
    it('should let override keys win and keep the rest', () => {
      expect(mergeParameters({ sla_days: 30, as_of_date: '2025-01-30' }, { sla_days: 45 })).toEqual(
        { sla_days: 45, as_of_date: '2025-01-30' },
      );
    });

    it('should handle missing sides', () => {
      expect(mergeParameters(undefined, undefined)).toEqual({});
      expect(mergeParameters(undefined, { group_by: 'status' })).toEqual({ group_by: 'status' });
    });
  });

  describe('sizeOf', () => {
    it('should measure lists, envelopes and scalars', () => {
      expect(sizeOf([1, 2, 3])).toBe(3);
      expect(sizeOf({ records: [{}, {}] })).toBe(2);
      expect(sizeOf({ summary: {} })).toBe(1);
      expect(sizeOf('text')).toBe(1);
      expect(sizeOf(null)).toBe(0);
      expect(sizeOf(undefined)).toBe(0);
    });
  });

  describe('Deadline', () => {
    it('should never expire with a zero timeout', async () => {
      const deadline = new Deadline(0);

      expect(deadline.isExpired()).toBe(false);
      await expect(deadline.race(delay(5, 'done'))).resolves.toBe('done');
    });

    it('should report expiry once the start is far enough in the past', () => {
      const deadline = new Deadline(100, Date.now() - 200);

      expect(deadline.isExpired()).toBe(true);
      expect(() => deadline.assertNotExpired()).toThrow(DeadlineExceededError);
    });

    it('should resolve with work that finishes in time', async () => {
      await expect(new Deadline(1000).race(delay(5, 42))).resolves.toBe(42);
    });

    it('should reject when the deadline passes first', async () => {
      await expect(new Deadline(10).race(delay(200, 'late'))).rejects.toThrow(
        'Deadline of 10ms exceeded',
      );
    });

    it('should pass through work failures', async () => {
      await expect(new Deadline(1000).race(Promise.reject(new Error('boom')))).rejects.toThrow(
        'boom',
      );
    });
  });
});
