import { describe, it, expect } from 'vitest';
import mongoose from 'mongoose';
import Department from '../models/Department';
import { ConstraintViolationError } from '../persistence/constraints';
import { compact } from '../persistence/keys';
import { isTransientConflict, retryTransient, toConstraintViolation } from '../persistence/MongoAcademicStore';

/**
 * Driver error classification used by the MongoDB store. No server is needed:
 * the errors are built the way the driver builds them.
 */
describe('MongoAcademicStore error mapping', () => {
  describe('isTransientConflict', () => {
    it('should retry errors labelled as transient', () => {
      const error = new mongoose.mongo.MongoServerError({
        message: 'transaction aborted',
        errorLabels: ['TransientTransactionError']
      });

      expect(isTransientConflict(error)).toBe(true);
    });

    it('should retry write conflicts', () => {
      const error = new mongoose.mongo.MongoServerError({ message: 'WriteConflict', code: 112 });

      expect(isTransientConflict(error)).toBe(true);
    });

    it('should not retry other failures', () => {
      expect(isTransientConflict(new mongoose.mongo.MongoServerError({ message: 'dup', code: 11000 }))).toBe(false);
      expect(isTransientConflict(new Error('WriteConflict'))).toBe(false);
      expect(isTransientConflict('conflict')).toBe(false);
    });
  });

  describe('toConstraintViolation', () => {
    it('should map duplicate keys to a unique violation on the table', () => {
      const mapped = toConstraintViolation(
        new mongoose.mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 }),
        'student'
      );

      expect(mapped).toBeInstanceOf(ConstraintViolationError);
      expect(mapped).toMatchObject({ kind: 'unique', table: 'student', constraint: 'student_unique_index' });
    });

    it('should map schema validation failures to a check violation naming the path', () => {
      const validation = new Department({ name: 'Physics', budget: -5 }).validateSync();

      expect(toConstraintViolation(validation, 'department')).toMatchObject({
        kind: 'check',
        table: 'department',
        constraint: 'department_budget_valid'
      });
    });

    it('should pass other errors through unchanged', () => {
      const original = new Error('socket closed');

      expect(toConstraintViolation(original, 'takes')).toBe(original);
    });
  });

  describe('compact', () => {
    it('should drop undefined members and keep nulls', () => {
      expect(compact({ room: undefined, capacity: 20, timeSlot: null })).toEqual({ capacity: 20, timeSlot: null });
      expect(Object.keys(compact({ room: undefined, capacity: 20 }))).toEqual(['capacity']);
    });
  });

  describe('retryTransient', () => {
    const conflict = () =>
      new mongoose.mongo.MongoServerError({ message: 'transaction aborted', errorLabels: ['TransientTransactionError'] });

    it('should rerun a conflicting attempt once when one retry is allowed', async () => {
      let attempts = 0;

      const result = await retryTransient(1, 0, async () => {
        attempts++;
        if (attempts === 1) throw conflict();
        return 'committed';
      });

      expect(result).toBe('committed');
      expect(attempts).toBe(2);
    });

    it('should give up after the configured number of retries', async () => {
      let attempts = 0;
      const error = conflict();

      await expect(
        retryTransient(2, 0, async () => {
          attempts++;
          throw error;
        })
      ).rejects.toBe(error);
      expect(attempts).toBe(3);
    });

    it('should run once without retries', async () => {
      let attempts = 0;

      await expect(
        retryTransient(0, 0, async () => {
          attempts++;
          throw conflict();
        })
      ).rejects.toBeInstanceOf(mongoose.mongo.MongoServerError);
      expect(attempts).toBe(1);
    });

    it('should not rerun other failures', async () => {
      let attempts = 0;

      await expect(
        retryTransient(3, 0, async () => {
          attempts++;
          throw new Error('validation failed');
        })
      ).rejects.toThrow('validation failed');
      expect(attempts).toBe(1);
    });
  });
});
