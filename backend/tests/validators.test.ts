import { describe, it, expect } from 'vitest';
import { AcademicErrorType, AcademicRecordError } from '../utils/AcademicRecordError';
import {
  normalizeTimeSlot,
  toAcademicYear,
  toCourseCode,
  toCredits,
  toDepartmentChanges,
  toEmail,
  toFields,
  toIsoDate,
  toLetterGrade,
  toOptionalGrade,
  toRecordId,
  toSectionKey,
  toSemester,
  toStudentInput,
  toTakesKey,
  toText,
  toTimeSlot,
  todayIsoDate
} from '../utils/validators';

const captureError = (action: () => unknown): AcademicRecordError => {
  try {
    action();
  } catch (error) {
    if (error instanceof AcademicRecordError) return error;
    throw error;
  }
  throw new Error('Expected an AcademicRecordError');
};

/**
 * Unit Tests for the typed value constructors
 */
describe('Field validators', () => {
  describe('toEmail', () => {
    it('should accept and trim a well-formed address', () => {
      expect(toEmail('  ada@example.edu ')).toBe('ada@example.edu');
    });

    it.each(['ada.example.edu', 'ada@localhost', 'a b@example.edu', '@example.edu', 'ada@@example.edu', 42])(
      'should reject %s as INVALID_EMAIL',
      value => {
        expect(captureError(() => toEmail(value)).type).toBe(AcademicErrorType.INVALID_EMAIL);
      }
    );

    it('should name the rejected value in the message', () => {
      const error = captureError(() => toEmail('ada.example.edu'));
      expect(error.message).toBe("'ada.example.edu' is not a valid email address");
      expect(error.statusCode).toBe(400);
    });
  });

  describe('toIsoDate', () => {
    it('should accept real calendar dates including leap days', () => {
      expect(toIsoDate('2024-02-29')).toBe('2024-02-29');
      expect(toIsoDate('2025-12-31')).toBe('2025-12-31');
    });

    it.each(['2023-02-29', '2024-13-01', '2024-04-31', '2024/02/01', '24-02-01', '2024-2-1', ''])(
      'should reject %s as UNSUPPORTED_DATE_FORMAT',
      value => {
        expect(captureError(() => toIsoDate(value)).type).toBe(AcademicErrorType.UNSUPPORTED_DATE_FORMAT);
      }
    );
  });

  describe('toTimeSlot', () => {
    it('should normalize single-digit hours', () => {
      expect(toTimeSlot('MWF 9:00-9:50')).toBe('MWF 09:00-09:50');
    });

    it('should keep a canonical slot unchanged', () => {
      expect(toTimeSlot('TTh 14:00-15:15')).toBe('TTh 14:00-15:15');
    });

    it.each(['MM 09:00-10:00', 'TTh 15:00-14:00', 'TTh 14:00-14:00', 'X 09:00-10:00', 'MWF 24:00-25:00', 'MWF 09:60-10:00', 'MWF 09:00 - 09:50', 'MWF  09:00-09:50', 'MWF'])(
      'should reject %s as INCORRECT_TIMESLOT',
      value => {
        expect(captureError(() => toTimeSlot(value)).type).toBe(AcademicErrorType.INCORRECT_TIMESLOT);
      }
    );

    it('should report malformed slots as null from the normalizer', () => {
      expect(normalizeTimeSlot('ThTh 10:00-11:00')).toBeNull();
      expect(normalizeTimeSlot('SaSu 10:00-12:00')).toBe('SaSu 10:00-12:00');
    });
  });

  describe('grades and terms', () => {
    it('should accept each letter on the scale', () => {
      expect(toLetterGrade('B-')).toBe('B-');
      expect(toLetterGrade('A+')).toBe('A+');
      expect(toLetterGrade('F')).toBe('F');
    });

    it('should reject an unknown grade as INCORRECT_VALUE', () => {
      const error = captureError(() => toLetterGrade('E'));
      expect(error.type).toBe(AcademicErrorType.INCORRECT_VALUE);
      expect(error.message).toBe("The value 'E' for field 'grade' is not valid");
      expect(error.resourceType).toBe('grade');
    });

    it('should treat a missing grade as not graded', () => {
      expect(toOptionalGrade('')).toBeNull();
      expect(toOptionalGrade(null)).toBeNull();
      expect(toOptionalGrade(undefined)).toBeNull();
      expect(toOptionalGrade('A')).toBe('A');
    });

    it('should accept the four semesters only', () => {
      expect(toSemester('Winter')).toBe('Winter');
      expect(captureError(() => toSemester('Autumn')).type).toBe(AcademicErrorType.INCORRECT_VALUE);
    });

    it('should bound academic years strictly between 1701 and 2100', () => {
      expect(toAcademicYear('2024')).toBe(2024);
      expect(toAcademicYear(2099)).toBe(2099);
      expect(toAcademicYear(1702)).toBe(1702);
      for (const value of [1701, 2100, 2024.5, 'abc']) {
        expect(captureError(() => toAcademicYear(value)).type).toBe(AcademicErrorType.INCORRECT_VALUE);
      }
    });
  });

  describe('numbers and identifiers', () => {
    it('should restrict credits to 1 through 4', () => {
      expect(toCredits(4)).toBe(4);
      expect(captureError(() => toCredits(0)).type).toBe(AcademicErrorType.INCORRECT_VALUE);
      expect(captureError(() => toCredits(5)).type).toBe(AcademicErrorType.INCORRECT_VALUE);
    });

    it('should upper-case course codes', () => {
      expect(toCourseCode(' cs101 ')).toBe('CS101');
      expect(captureError(() => toCourseCode('CS 101')).message).toBe(
        "The value 'CS 101' for field 'courseId' is not valid"
      );
    });

    it('should accept positive integer ids from path strings', () => {
      expect(toRecordId('7')).toBe(7);
      expect(captureError(() => toRecordId('0', 'studentId')).resourceType).toBe('studentId');
      expect(captureError(() => toRecordId('-1')).type).toBe(AcademicErrorType.INCORRECT_VALUE);
    });

    it('should reject blank text', () => {
      expect(toText('  Data Structures ', 'title')).toBe('Data Structures');
      expect(captureError(() => toText('   ', 'title')).resourceType).toBe('title');
    });

    it('should format a clock reading as its UTC calendar date', () => {
      expect(todayIsoDate(new Date('2025-03-04T23:30:00Z'))).toBe('2025-03-04');
    });
  });

  describe('composite inputs', () => {
    it('should build a section key from route parameters', () => {
      expect(toSectionKey({ courseId: 'cs101', sectionId: 'A', semester: 'Fall', year: '2024' })).toEqual({
        courseId: 'CS101',
        sectionId: 'A',
        semester: 'Fall',
        year: 2024
      });
    });

    it('should build an enrollment key with a numeric student id', () => {
      expect(toTakesKey({ studentId: '3', courseId: 'CS101', sectionId: 'B', semester: 'Spring', year: 2025 })).toEqual({
        studentId: 3,
        courseId: 'CS101',
        sectionId: 'B',
        semester: 'Spring',
        year: 2025
      });
    });

    it('should default student credits, status and major', () => {
      const input = toStudentInput({
        firstName: 'Ada',
        lastName: 'Lovelace',
        departmentName: 'Math',
        email: 'ada@example.edu',
        enrollmentDate: '2024-09-01'
      });
      expect(input.totalCredits).toBe(0);
      expect(input.status).toBe('Active');
      expect(input.major).toBeNull();
    });

    it('should keep only the fields present in a change set', () => {
      expect(toDepartmentChanges({ budget: 5000, dean: null })).toEqual({ budget: 5000, dean: null });
    });

    it('should reject a body that is not an object', () => {
      const error = captureError(() => toFields('not an object'));
      expect(error.type).toBe(AcademicErrorType.INCORRECT_VALUE);
      expect(error.resourceType).toBe('body');
    });
  });
});
