import { describe, it, expect, beforeEach } from 'vitest';
import AcademicRecordErrorHandler, {
  AcademicErrorType,
  AcademicRecordError,
  AcademicRecordErrors,
  toAcademicRecordError
} from '../utils/AcademicRecordError';
import OperationMonitor, { OperationType } from '../utils/OperationMonitor';
import { ConstraintViolationError } from '../persistence/constraints';
import type { AcademicStore } from '../persistence/AcademicStore';
import { DepartmentService } from '../services/DepartmentService';

/**
 * Unit Tests for Error Handling and Monitoring Utilities
 */
describe('Records Error Handling and Monitoring', () => {
  let errorHandler: AcademicRecordErrorHandler;
  let monitor: OperationMonitor;

  beforeEach(() => {
    errorHandler = AcademicRecordErrorHandler.getInstance();
    monitor = OperationMonitor.getInstance();

    errorHandler.clearErrorLog();
    monitor.clearAll();
  });

  describe('AcademicRecordError', () => {
    it('should create error with proper structure', () => {
      const error = new AcademicRecordError(AcademicErrorType.RECORD_NOT_FOUND, 'Test error message', 404, {
        resourceType: 'Course',
        resourceId: 'CS999'
      });

      expect(error.type).toBe(AcademicErrorType.RECORD_NOT_FOUND);
      expect(error.message).toBe('Test error message');
      expect(error.statusCode).toBe(404);
      expect(error.resourceType).toBe('Course');
      expect(error.resourceId).toBe('CS999');
      expect(error.userFriendlyMessage).toBe('The requested record does not exist.');
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should default the status code from the error type', () => {
      expect(AcademicRecordErrors.duplicateEnrollment(1, 'CS101-A-Fall-2024').statusCode).toBe(409);
      expect(AcademicRecordErrors.capacityExceeded('CS101-A-Fall-2024', 30).statusCode).toBe(409);
      expect(AcademicRecordErrors.prerequisiteNotMet('CS201', ['CS101']).statusCode).toBe(422);
      expect(AcademicRecordErrors.invalidEmail('nope').statusCode).toBe(400);
      expect(AcademicRecordErrors.databaseError('boom').statusCode).toBe(500);
    });

    it('should convert to JSON properly', () => {
      const error = AcademicRecordErrors.recordNotFound('Student', 12);

      const json = error.toJSON();

      expect(json.error.type).toBe('RECORD_NOT_FOUND');
      expect(json.error.message).toBe("Student with identifier '12' not found");
      expect(json.error.userFriendlyMessage).toBe('The requested record does not exist.');
      expect(json.error.timestamp).toBe(error.timestamp.toISOString());
      expect(json.context).toEqual({ resourceType: 'Student', resourceId: '12' });
    });

    it('should list every missing prerequisite in the message', () => {
      expect(AcademicRecordErrors.prerequisiteNotMet('CS301', ['CS101', 'MATH101']).message).toBe(
        'Course CS301 requires a passing grade in: CS101, MATH101'
      );
    });
  });

  describe('toAcademicRecordError', () => {
    it('should pass taxonomy errors through', () => {
      const error = AcademicRecordErrors.incorrectTimeslot('MM 09:00-10:00');

      expect(toAcademicRecordError(error)).toBe(error);
    });

    it('should name the violated constraint', () => {
      const surfaced = toAcademicRecordError(new ConstraintViolationError('foreignKey', 'takes', 'takes_section_fkey'));

      expect(surfaced.type).toBe(AcademicErrorType.DATABASE_ERROR);
      expect(surfaced.statusCode).toBe(409);
      expect(surfaced.message).toBe("foreignKey constraint 'takes_section_fkey' violated on takes");
    });

    it('should hide driver messages', () => {
      const surfaced = toAcademicRecordError(new Error('connect ECONNREFUSED 127.0.0.1:27017'));

      expect(surfaced.type).toBe(AcademicErrorType.DATABASE_ERROR);
      expect(surfaced.statusCode).toBe(500);
      expect(surfaced.message).toBe('The records store failed to complete the operation');
    });
  });

  describe('AcademicRecordErrorHandler', () => {
    it('should return the same instance', () => {
      expect(AcademicRecordErrorHandler.getInstance()).toBe(errorHandler);
    });

    it('should track error statistics', () => {
      errorHandler.logError(AcademicRecordErrors.recordNotFound('Course', 'CS404'));
      errorHandler.logError(AcademicRecordErrors.recordNotFound('Student', 9));
      errorHandler.logError(AcademicRecordErrors.capacityExceeded('CS101-A-Fall-2024', 30));

      const stats = errorHandler.getErrorStatistics();

      expect(stats.total).toBe(3);
      expect(stats.byType).toEqual({ RECORD_NOT_FOUND: 2, CAPACITY_EXCEEDED: 1 });
      expect(stats.byStatusCode).toEqual({ '404': 2, '409': 1 });
    });

    it('should forget logged errors when cleared', () => {
      errorHandler.logError(AcademicRecordErrors.invalidEmail('x'));
      errorHandler.clearErrorLog();

      expect(errorHandler.getErrorStatistics().total).toBe(0);
    });
  });

  describe('OperationMonitor', () => {
    it('should log operations with proper structure', () => {
      const event = monitor.logOperation(OperationType.ENROLLMENT, 'enroll', 'success', { studentId: 1 });

      expect(event.id).toBeDefined();
      expect(event.type).toBe(OperationType.ENROLLMENT);
      expect(event.action).toBe('enroll');
      expect(event.result).toBe('success');
      expect(event.metadata).toEqual({ studentId: 1 });
      expect(monitor.getRecentEvents(1)).toEqual([event]);
    });

    it('should track operation timing', () => {
      const timer = monitor.startTimer();

      const event = monitor.endTimer(timer, OperationType.REPORT, 'calculateGPA', 'success');

      expect(event.duration).toBeGreaterThanOrEqual(0);
    });

    it('should leave duration unset for an unknown timer', () => {
      const event = monitor.endTimer('missing', OperationType.QUERY, 'getCourse', 'success');

      expect(event.duration).toBeUndefined();
    });

    it('should provide statistics by type and result', () => {
      monitor.logOperation(OperationType.ENROLLMENT, 'enroll', 'success', undefined, 10);
      monitor.logOperation(OperationType.ENROLLMENT, 'enroll', 'failure', undefined, 30);
      monitor.logOperation(OperationType.GRADING, 'assignGrade', 'success', undefined, 5);

      const stats = monitor.getStatistics();

      expect(stats.totalEvents).toBe(3);
      expect(stats.byType).toEqual({ ENROLLMENT: 2, GRADING: 1 });
      expect(stats.byResult).toEqual({ success: 2, failure: 1, warning: 0 });
      expect(stats.averageDurationByAction).toEqual({ enroll: 20, assignGrade: 5 });
    });
  });

  describe('Integration between services and Monitor', () => {
    it('should record a failed operation with the driver cause kept out of the error', async () => {
      const brokenStore: AcademicStore = {
        withTransaction: async () => {
          throw new Error('socket hang up');
        },
        close: async () => undefined
      };
      const departments = new DepartmentService(brokenStore);

      await expect(departments.listDepartments()).rejects.toMatchObject({
        type: AcademicErrorType.DATABASE_ERROR,
        message: 'The records store failed to complete the operation'
      });

      const [event] = monitor.getRecentEvents(1);
      expect(event.type).toBe(OperationType.QUERY);
      expect(event.action).toBe('listDepartments');
      expect(event.result).toBe('failure');
      expect(event.metadata).toMatchObject({ errorType: 'DATABASE_ERROR', cause: 'Error: socket hang up' });
    });
  });
});
