import type { CourseRecord, PrerequisiteRecord } from '../types';
import { AcademicRecordErrors } from '../utils/AcademicRecordError';
import { OperationType } from '../utils/OperationMonitor';
import type { CourseChangesInput, CourseCode, CourseInput, Text } from '../utils/validators';
import type { AcademicStore } from '../persistence/AcademicStore';
import { AcademicService } from './AcademicService';
import { PrerequisiteResolver } from './PrerequisiteResolver';

/**
 * CourseService - course catalog and the prerequisite graph
 *
 * Deleting a course removes its sections and the edges it depends on; edges
 * where it was the prerequisite stay behind with no prerequisite.
 */
export class CourseService extends AcademicService {
  constructor(
    store: AcademicStore,
    private readonly resolver: PrerequisiteResolver = new PrerequisiteResolver()
  ) {
    super(store);
  }

  public async createCourse(input: CourseInput): Promise<CourseRecord> {
    return this.transact(
      OperationType.CATALOG_CHANGE,
      'createCourse',
      async tx => {
        this.found(await tx.findDepartment(input.departmentName), 'Department', input.departmentName);
        return tx.insertCourse(input);
      },
      { courseId: input.courseId }
    );
  }

  public async updateCourse(courseId: CourseCode, changes: CourseChangesInput): Promise<CourseRecord> {
    return this.transact(
      OperationType.CATALOG_CHANGE,
      'updateCourse',
      async tx => {
        this.found(await tx.findCourse(courseId), 'Course', courseId);
        if (changes.departmentName !== undefined) {
          this.found(await tx.findDepartment(changes.departmentName), 'Department', changes.departmentName);
        }
        return this.found(await tx.updateCourse(courseId, changes), 'Course', courseId);
      },
      { courseId }
    );
  }

  public async deleteCourse(courseId: CourseCode): Promise<void> {
    await this.transact(
      OperationType.CATALOG_CHANGE,
      'deleteCourse',
      async tx => {
        if (!(await tx.deleteCourse(courseId))) {
          throw AcademicRecordErrors.recordNotFound('Course', courseId);
        }
      },
      { courseId }
    );
  }

  public async getCourse(courseId: CourseCode): Promise<CourseRecord> {
    return this.transact(OperationType.QUERY, 'getCourse', async tx =>
      this.found(await tx.findCourse(courseId), 'Course', courseId)
    );
  }

  public async listCourses(departmentName?: Text): Promise<CourseRecord[]> {
    return this.transact(OperationType.QUERY, 'listCourses', tx => tx.listCourses({ departmentName }));
  }

  /**
   * Record that `courseId` requires `prereqId`. Self-references and edges
   * that would close a cycle are rejected.
   */
  public async addPrerequisite(courseId: CourseCode, prereqId: CourseCode): Promise<PrerequisiteRecord> {
    return this.transact(
      OperationType.CATALOG_CHANGE,
      'addPrerequisite',
      async tx => {
        this.found(await tx.findCourse(courseId), 'Course', courseId);
        this.found(await tx.findCourse(prereqId), 'Course', prereqId);

        if (courseId === prereqId || (await this.resolver.wouldCreateCycle(tx, courseId, prereqId))) {
          throw AcademicRecordErrors.incorrectValue('prereqId', prereqId);
        }

        return tx.insertPrerequisite({ courseId, prereqId });
      },
      { courseId, prereqId }
    );
  }

  public async removePrerequisite(courseId: CourseCode, prereqId: CourseCode): Promise<void> {
    await this.transact(
      OperationType.CATALOG_CHANGE,
      'removePrerequisite',
      async tx => {
        if (!(await tx.deletePrerequisite(courseId, prereqId))) {
          throw AcademicRecordErrors.recordNotFound('Prerequisite', `${courseId}-${prereqId}`);
        }
      },
      { courseId, prereqId }
    );
  }

  public async listPrerequisites(courseId: CourseCode): Promise<PrerequisiteRecord[]> {
    return this.transact(OperationType.QUERY, 'listPrerequisites', async tx => {
      this.found(await tx.findCourse(courseId), 'Course', courseId);
      return tx.listPrerequisites(courseId);
    });
  }
}
