import type { StoreTransaction } from '../persistence/AcademicStore';
import type { LetterGrade } from '../types';

/** Any recorded grade other than F passes; an ungraded course does not. */
export const isPassingGrade = (grade: LetterGrade | null): boolean => grade !== null && grade !== 'F';

/**
 * Decides course eligibility from a student's completed coursework.
 * Only direct prerequisites are consulted; edges left dangling by a deleted
 * prerequisite course impose nothing.
 */
export class PrerequisiteResolver {
  /**
   * Direct prerequisites of `courseId` the student has not passed, sorted
   */
  public async unmetPrerequisites(
    tx: StoreTransaction,
    studentId: number,
    courseId: string
  ): Promise<string[]> {
    const edges = await tx.listPrerequisites(courseId);
    const required = new Set(
      edges.map(edge => edge.prereqId).filter((prereqId): prereqId is string => prereqId !== null)
    );
    if (required.size === 0) {
      return [];
    }

    const history = await tx.listTakes({ studentId, cancelled: false });
    const passed = new Set(history.filter(row => isPassingGrade(row.grade)).map(row => row.courseId));

    return [...required].filter(prereqId => !passed.has(prereqId)).sort();
  }

  public async isEligible(tx: StoreTransaction, studentId: number, courseId: string): Promise<boolean> {
    const missing = await this.unmetPrerequisites(tx, studentId, courseId);
    return missing.length === 0;
  }

  /**
   * True when adding the edge `courseId -> prereqId` would make a course
   * (transitively) require itself.
   */
  public async wouldCreateCycle(tx: StoreTransaction, courseId: string, prereqId: string): Promise<boolean> {
    const visited = new Set<string>();
    const pending = [prereqId];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || visited.has(current)) continue;
      if (current === courseId) return true;
      visited.add(current);

      for (const edge of await tx.listPrerequisites(current)) {
        if (edge.prereqId !== null) {
          pending.push(edge.prereqId);
        }
      }
    }

    return false;
  }
}
