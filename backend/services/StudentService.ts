import type { StudentRecord } from '../types';
import { AcademicRecordErrors } from '../utils/AcademicRecordError';
import { OperationType } from '../utils/OperationMonitor';
import type { RecordId, StudentChangesInput, StudentInput, Text } from '../utils/validators';
import { AcademicService } from './AcademicService';

/**
 * Student records. Deleting a student removes its enrollments and advising
 * history and releases any seats it held.
 */
export class StudentService extends AcademicService {
  public async createStudent(input: StudentInput): Promise<StudentRecord> {
    return this.transact(
      OperationType.PEOPLE_CHANGE,
      'createStudent',
      async tx => {
        this.found(await tx.findDepartment(input.departmentName), 'Department', input.departmentName);
        return tx.insertStudent(input);
      },
      { departmentName: input.departmentName }
    );
  }

  public async updateStudent(id: RecordId, changes: StudentChangesInput): Promise<StudentRecord> {
    return this.transact(
      OperationType.PEOPLE_CHANGE,
      'updateStudent',
      async tx => {
        this.found(await tx.findStudent(id), 'Student', id);
        if (changes.departmentName !== undefined) {
          this.found(await tx.findDepartment(changes.departmentName), 'Department', changes.departmentName);
        }
        return this.found(await tx.updateStudent(id, changes), 'Student', id);
      },
      { studentId: id }
    );
  }

  public async deleteStudent(id: RecordId): Promise<void> {
    await this.transact(
      OperationType.PEOPLE_CHANGE,
      'deleteStudent',
      async tx => {
        if (!(await tx.deleteStudent(id))) {
          throw AcademicRecordErrors.recordNotFound('Student', id);
        }
      },
      { studentId: id }
    );
  }

  public async getStudent(id: RecordId): Promise<StudentRecord> {
    return this.transact(OperationType.QUERY, 'getStudent', async tx =>
      this.found(await tx.findStudent(id), 'Student', id)
    );
  }

  public async listStudents(departmentName?: Text): Promise<StudentRecord[]> {
    return this.transact(OperationType.QUERY, 'listStudents', tx => tx.listStudents({ departmentName }));
  }
}
