import type { SectionFilter } from '../persistence/AcademicStore';
import { describeSection, sectionKeyOf } from '../persistence/keys';
import type { SectionDetails, SectionRecord } from '../types';
import { AcademicRecordErrors } from '../utils/AcademicRecordError';
import { OperationType } from '../utils/OperationMonitor';
import type { SectionChangesInput, SectionInput, ValidSectionKey } from '../utils/validators';
import { AcademicService } from './AcademicService';

export class SectionService extends AcademicService {
  /**
   * Schedule a section of an existing course with no students enrolled
   */
  public async createSection(input: SectionInput): Promise<SectionRecord> {
    return this.transact(
      OperationType.CATALOG_CHANGE,
      'createSection',
      async tx => {
        this.found(await tx.findCourse(input.courseId), 'Course', input.courseId);
        return tx.insertSection({ ...input, enrolled: 0 });
      },
      { section: describeSection(input) }
    );
  }

  /**
   * Capacity may shrink only down to the current enrollment
   */
  public async updateSection(key: ValidSectionKey, changes: SectionChangesInput): Promise<SectionRecord> {
    const section = describeSection(key);

    return this.transact(
      OperationType.CATALOG_CHANGE,
      'updateSection',
      async tx => {
        const current = this.found(await tx.findSection(key), 'Section', section);
        if (changes.capacity !== undefined && changes.capacity < current.enrolled) {
          throw AcademicRecordErrors.incorrectValue('capacity', changes.capacity);
        }
        return this.found(await tx.updateSection(key, changes), 'Section', section);
      },
      { section }
    );
  }

  public async deleteSection(key: ValidSectionKey): Promise<void> {
    await this.transact(
      OperationType.CATALOG_CHANGE,
      'deleteSection',
      async tx => {
        if (!(await tx.deleteSection(key))) {
          throw AcademicRecordErrors.recordNotFound('Section', describeSection(key));
        }
      },
      { section: describeSection(key) }
    );
  }

  public async getSection(key: ValidSectionKey): Promise<SectionDetails> {
    return this.transact(OperationType.QUERY, 'getSection', async tx => {
      const section = this.found(await tx.findSection(key), 'Section', describeSection(key));
      const teaches = await tx.listTeaches(sectionKeyOf(key));
      return {
        ...section,
        instructorIds: teaches.map(row => row.instructorId).sort((a, b) => a - b)
      };
    });
  }

  public async listSections(filter: SectionFilter = {}): Promise<SectionRecord[]> {
    return this.transact(OperationType.QUERY, 'listSections', tx => tx.listSections(filter));
  }
}
