import type { InstructorRecord, Semester, WorkloadEntry } from '../types';
import { AcademicRecordErrors } from '../utils/AcademicRecordError';
import { OperationType } from '../utils/OperationMonitor';
import type { AcademicYear, InstructorChangesInput, InstructorInput, RecordId, Text } from '../utils/validators';
import { AcademicService } from './AcademicService';

export class InstructorService extends AcademicService {
  public async createInstructor(input: InstructorInput): Promise<InstructorRecord> {
    return this.transact(
      OperationType.PEOPLE_CHANGE,
      'createInstructor',
      async tx => {
        this.found(await tx.findDepartment(input.departmentName), 'Department', input.departmentName);
        return tx.insertInstructor(input);
      },
      { departmentName: input.departmentName }
    );
  }

  public async updateInstructor(id: RecordId, changes: InstructorChangesInput): Promise<InstructorRecord> {
    return this.transact(
      OperationType.PEOPLE_CHANGE,
      'updateInstructor',
      async tx => {
        this.found(await tx.findInstructor(id), 'Instructor', id);
        if (changes.departmentName !== undefined) {
          this.found(await tx.findDepartment(changes.departmentName), 'Department', changes.departmentName);
        }
        return this.found(await tx.updateInstructor(id, changes), 'Instructor', id);
      },
      { instructorId: id }
    );
  }

  /**
   * Removes teaching assignments; advising intervals keep their dates with no instructor
   */
  public async deleteInstructor(id: RecordId): Promise<void> {
    await this.transact(
      OperationType.PEOPLE_CHANGE,
      'deleteInstructor',
      async tx => {
        if (!(await tx.deleteInstructor(id))) {
          throw AcademicRecordErrors.recordNotFound('Instructor', id);
        }
      },
      { instructorId: id }
    );
  }

  public async getInstructor(id: RecordId): Promise<InstructorRecord> {
    return this.transact(OperationType.QUERY, 'getInstructor', async tx =>
      this.found(await tx.findInstructor(id), 'Instructor', id)
    );
  }

  public async listInstructors(departmentName?: Text): Promise<InstructorRecord[]> {
    return this.transact(OperationType.QUERY, 'listInstructors', tx => tx.listInstructors({ departmentName }));
  }

  /**
   * Sections taught by the instructor, optionally narrowed to one term
   */
  public async getWorkload(id: RecordId, semester?: Semester, year?: AcademicYear): Promise<WorkloadEntry[]> {
    return this.transact(
      OperationType.REPORT,
      'getWorkload',
      async tx => {
        this.found(await tx.findInstructor(id), 'Instructor', id);
        const assignments = await tx.listTeaches({ instructorId: id, semester, year });

        const workload: WorkloadEntry[] = [];
        for (const assignment of assignments) {
          const section = await tx.findSection(assignment);
          if (!section) continue;
          workload.push({
            courseId: section.courseId,
            sectionId: section.sectionId,
            semester: section.semester,
            year: section.year,
            timeSlot: section.timeSlot,
            room: section.room
          });
        }

        return workload.sort(
          (a, b) =>
            a.year - b.year || a.courseId.localeCompare(b.courseId) || a.sectionId.localeCompare(b.sectionId)
        );
      },
      { instructorId: id }
    );
  }
}
