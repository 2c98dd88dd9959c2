import type { AcademicStore } from '../persistence/AcademicStore';
import { ConstraintViolationError } from '../persistence/constraints';
import { describeSection, describeTakes, sectionKeyOf, takesKeyOf } from '../persistence/keys';
import type { LetterGrade, TakesRecord, TeachesRecord } from '../types';
import { AcademicRecordErrors } from '../utils/AcademicRecordError';
import { OperationType } from '../utils/OperationMonitor';
import {
  todayIsoDate,
  type CourseCode,
  type RecordId,
  type ValidSectionKey,
  type ValidTakesKey
} from '../utils/validators';
import { AcademicService } from './AcademicService';
import { PrerequisiteResolver } from './PrerequisiteResolver';

export interface EligibilityResult {
  studentId: number;
  courseId: string;
  eligible: boolean;
  missing: string[];
}

/**
 * EnrollmentService - atomic enroll, cancel and grade operations against
 * sections, keeping `enrolled` equal to the number of active Takes rows.
 *
 * When several rules are broken at once the first in this order is reported:
 * duplicate enrollment, full section, unmet prerequisite.
 */
export class EnrollmentService extends AcademicService {
  constructor(
    store: AcademicStore,
    private readonly resolver: PrerequisiteResolver = new PrerequisiteResolver(),
    private readonly clock: () => Date = () => new Date()
  ) {
    super(store);
  }

  /**
   * Enroll a student in a section, reactivating a cancelled enrollment for the same key
   */
  public async enroll(key: ValidTakesKey): Promise<TakesRecord> {
    const section = describeSection(key);

    return this.transact(
      OperationType.ENROLLMENT,
      'enroll',
      async tx => {
        this.found(await tx.findStudent(key.studentId), 'Student', key.studentId);
        const current = this.found(await tx.findSection(key), 'Section', section);

        const existing = await tx.findTakes(key);
        if (existing && !existing.cancelled) {
          throw AcademicRecordErrors.duplicateEnrollment(key.studentId, section);
        }

        if (current.enrolled >= current.capacity) {
          throw AcademicRecordErrors.capacityExceeded(section, current.capacity);
        }

        const missing = await this.resolver.unmetPrerequisites(tx, key.studentId, key.courseId);
        if (missing.length > 0) {
          throw AcademicRecordErrors.prerequisiteNotMet(key.courseId, missing);
        }

        // The guarded increment is the authority on the last seat
        const seated = await tx.adjustEnrolled(key, 1);
        if (!seated) {
          throw AcademicRecordErrors.capacityExceeded(section, current.capacity);
        }

        const enrollmentDate = todayIsoDate(this.clock());
        if (existing) {
          const reactivated = await tx.updateTakes(key, { cancelled: false, grade: null, enrollmentDate });
          return this.found(reactivated, 'Enrollment', describeTakes(key));
        }

        return tx.insertTakes({ ...takesKeyOf(key), cancelled: false, grade: null, enrollmentDate });
      },
      { studentId: key.studentId, section }
    );
  }

  /**
   * Cancel an active enrollment and release its seat. The row is kept as history.
   */
  public async cancelEnrollment(key: ValidTakesKey): Promise<TakesRecord> {
    return this.transact(
      OperationType.ENROLLMENT,
      'cancelEnrollment',
      async tx => {
        const existing = await tx.findTakes(key);
        if (!existing || existing.cancelled) {
          throw AcademicRecordErrors.recordNotFound('Enrollment', describeTakes(key));
        }

        const released = await tx.adjustEnrolled(key, -1);
        if (!released) {
          throw new ConstraintViolationError('check', 'section', 'enrolled_non_negative');
        }

        const cancelled = await tx.updateTakes(key, { cancelled: true });
        return this.found(cancelled, 'Enrollment', describeTakes(key));
      },
      { studentId: key.studentId, section: describeSection(key) }
    );
  }

  /**
   * Overwrite the grade of an active enrollment; null clears it
   */
  public async assignGrade(key: ValidTakesKey, grade: LetterGrade | null): Promise<TakesRecord> {
    return this.transact(
      OperationType.GRADING,
      'assignGrade',
      async tx => {
        const existing = await tx.findTakes(key);
        if (!existing || existing.cancelled) {
          throw AcademicRecordErrors.recordNotFound('Enrollment', describeTakes(key));
        }

        const graded = await tx.updateTakes(key, { grade });
        return this.found(graded, 'Enrollment', describeTakes(key));
      },
      { studentId: key.studentId, section: describeSection(key), grade }
    );
  }

  public async assignInstructor(instructorId: RecordId, key: ValidSectionKey): Promise<TeachesRecord> {
    const section = describeSection(key);

    return this.transact(
      OperationType.ENROLLMENT,
      'assignInstructor',
      async tx => {
        this.found(await tx.findSection(key), 'Section', section);
        this.found(await tx.findInstructor(instructorId), 'Instructor', instructorId);
        return tx.upsertTeaches({ instructorId, ...sectionKeyOf(key) });
      },
      { instructorId, section }
    );
  }

  public async unassignInstructor(instructorId: RecordId, key: ValidSectionKey): Promise<void> {
    const section = describeSection(key);

    await this.transact(
      OperationType.ENROLLMENT,
      'unassignInstructor',
      async tx => {
        const removed = await tx.deleteTeaches({ instructorId, ...sectionKeyOf(key) });
        if (!removed) {
          throw AcademicRecordErrors.recordNotFound('Teaches', `${instructorId}-${section}`);
        }
      },
      { instructorId, section }
    );
  }

  /**
   * Enrollment row for the key, cancelled rows included
   */
  public async getEnrollment(key: ValidTakesKey): Promise<TakesRecord> {
    return this.transact(OperationType.QUERY, 'getEnrollment', async tx =>
      this.found(await tx.findTakes(key), 'Enrollment', describeTakes(key))
    );
  }

  /**
   * Active enrollments of a section, ordered by student id
   */
  public async listRoster(key: ValidSectionKey): Promise<TakesRecord[]> {
    return this.transact(OperationType.QUERY, 'listRoster', async tx => {
      this.found(await tx.findSection(key), 'Section', describeSection(key));
      const rows = await tx.listTakes({ ...sectionKeyOf(key), cancelled: false });
      return rows.sort((a, b) => a.studentId - b.studentId);
    });
  }

  public async listStudentEnrollments(studentId: RecordId): Promise<TakesRecord[]> {
    return this.transact(OperationType.QUERY, 'listStudentEnrollments', async tx => {
      this.found(await tx.findStudent(studentId), 'Student', studentId);
      const rows = await tx.listTakes({ studentId });
      return rows.sort(
        (a, b) => a.year - b.year || a.courseId.localeCompare(b.courseId) || a.sectionId.localeCompare(b.sectionId)
      );
    });
  }

  public async checkEligibility(studentId: RecordId, courseId: CourseCode): Promise<EligibilityResult> {
    return this.transact(OperationType.QUERY, 'checkEligibility', async tx => {
      this.found(await tx.findStudent(studentId), 'Student', studentId);
      this.found(await tx.findCourse(courseId), 'Course', courseId);
      const missing = await this.resolver.unmetPrerequisites(tx, studentId, courseId);
      return { studentId, courseId, eligible: missing.length === 0, missing };
    });
  }
}
