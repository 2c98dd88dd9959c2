import type { AdvisorRecord } from '../types';
import { AcademicRecordErrors } from '../utils/AcademicRecordError';
import { OperationType } from '../utils/OperationMonitor';
import type { IsoDate, RecordId } from '../utils/validators';
import { AcademicService } from './AcademicService';

const currentOf = (history: AdvisorRecord[]): AdvisorRecord | null =>
  history.find(row => row.endDate === null) ?? null;

/**
 * Advisor assignments kept as a history of intervals per student.
 * The open interval (no end date) is the current advisor.
 */
export class AdvisingService extends AcademicService {
  /**
   * Make `instructorId` the student's advisor from `startDate`. The interval
   * covering that date is cut short on it, intervals starting later are
   * dropped, and one starting the same day is replaced. Earlier history is kept.
   */
  public async assignAdvisor(
    studentId: RecordId,
    instructorId: RecordId,
    startDate: IsoDate
  ): Promise<AdvisorRecord> {
    return this.transact(
      OperationType.ADVISING,
      'assignAdvisor',
      async tx => {
        this.found(await tx.findStudent(studentId), 'Student', studentId);
        this.found(await tx.findInstructor(instructorId), 'Instructor', instructorId);

        const history = await tx.listAdvisors(studentId);
        await tx.deleteAdvisorsAfter(studentId, startDate);

        if (history.some(row => row.startDate === startDate)) {
          const replaced = await tx.updateAdvisor(studentId, startDate, { instructorId, endDate: null });
          return this.found(replaced, 'Advisor', `${studentId}-${startDate}`);
        }

        const covering = history.find(
          row => row.startDate < startDate && (row.endDate === null || row.endDate > startDate)
        );
        if (covering) {
          await tx.updateAdvisor(studentId, covering.startDate, { endDate: startDate });
        }

        return tx.insertAdvisor({ studentId, instructorId, startDate, endDate: null });
      },
      { studentId, instructorId, startDate }
    );
  }

  /**
   * Close the current advising interval without naming a successor
   */
  public async endAdvising(studentId: RecordId, endDate: IsoDate): Promise<AdvisorRecord> {
    return this.transact(
      OperationType.ADVISING,
      'endAdvising',
      async tx => {
        this.found(await tx.findStudent(studentId), 'Student', studentId);
        const current = this.found(currentOf(await tx.listAdvisors(studentId)), 'Advisor', studentId);

        if (endDate < current.startDate) {
          throw AcademicRecordErrors.incorrectValue('endDate', endDate);
        }

        const closed = await tx.updateAdvisor(studentId, current.startDate, { endDate });
        return this.found(closed, 'Advisor', `${studentId}-${current.startDate}`);
      },
      { studentId, endDate }
    );
  }

  public async getCurrentAdvisor(studentId: RecordId): Promise<AdvisorRecord | null> {
    return this.transact(OperationType.QUERY, 'getCurrentAdvisor', async tx => {
      this.found(await tx.findStudent(studentId), 'Student', studentId);
      return currentOf(await tx.listAdvisors(studentId));
    });
  }

  /**
   * All intervals, oldest first
   */
  public async getAdvisorHistory(studentId: RecordId): Promise<AdvisorRecord[]> {
    return this.transact(OperationType.QUERY, 'getAdvisorHistory', async tx => {
      this.found(await tx.findStudent(studentId), 'Student', studentId);
      return tx.listAdvisors(studentId);
    });
  }
}
