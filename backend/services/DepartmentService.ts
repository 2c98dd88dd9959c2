import type { DepartmentRecord } from '../types';
import { AcademicRecordErrors } from '../utils/AcademicRecordError';
import { OperationType } from '../utils/OperationMonitor';
import type { DepartmentChangesInput, DepartmentInput, Text } from '../utils/validators';
import { AcademicService } from './AcademicService';

export class DepartmentService extends AcademicService {
  public async createDepartment(input: DepartmentInput): Promise<DepartmentRecord> {
    return this.transact(
      OperationType.CATALOG_CHANGE,
      'createDepartment',
      tx => tx.insertDepartment(input),
      { name: input.name }
    );
  }

  public async updateDepartment(name: Text, changes: DepartmentChangesInput): Promise<DepartmentRecord> {
    return this.transact(
      OperationType.CATALOG_CHANGE,
      'updateDepartment',
      async tx => this.found(await tx.updateDepartment(name, changes), 'Department', name),
      { name }
    );
  }

  /**
   * Rejected while students, instructors or courses still belong to the department
   */
  public async deleteDepartment(name: Text): Promise<void> {
    await this.transact(
      OperationType.CATALOG_CHANGE,
      'deleteDepartment',
      async tx => {
        if (!(await tx.deleteDepartment(name))) {
          throw AcademicRecordErrors.recordNotFound('Department', name);
        }
      },
      { name }
    );
  }

  public async getDepartment(name: Text): Promise<DepartmentRecord> {
    return this.transact(OperationType.QUERY, 'getDepartment', async tx =>
      this.found(await tx.findDepartment(name), 'Department', name)
    );
  }

  public async listDepartments(): Promise<DepartmentRecord[]> {
    return this.transact(OperationType.QUERY, 'listDepartments', tx => tx.listDepartments());
  }
}
