import type { GpaReport, LetterGrade, Semester, TranscriptEntry } from '../types';
import { OperationType } from '../utils/OperationMonitor';
import type { RecordId } from '../utils/validators';
import { AcademicService } from './AcademicService';

export const GRADE_POINTS: Record<LetterGrade, number> = {
  'A+': 4.0,
  A: 4.0,
  'A-': 3.7,
  'B+': 3.3,
  B: 3.0,
  'B-': 2.7,
  'C+': 2.3,
  C: 2.0,
  'C-': 1.7,
  'D+': 1.3,
  D: 1.0,
  F: 0.0
};

// Calendar order of terms within one academic year
const SEMESTER_ORDER: Record<Semester, number> = {
  Winter: 0,
  Spring: 1,
  Summer: 2,
  Fall: 3
};

/**
 * GPA and transcripts over graded, non-cancelled enrollments across all terms
 */
export class GradeService extends AcademicService {
  public async calculateGPA(studentId: RecordId): Promise<GpaReport> {
    const transcript = await this.transcriptOf(studentId, 'calculateGPA');

    let gradedCredits = 0;
    let qualityPoints = 0;
    for (const entry of transcript) {
      gradedCredits += entry.credits;
      qualityPoints += GRADE_POINTS[entry.grade] * entry.credits;
    }

    return {
      studentId,
      gpa: gradedCredits === 0 ? null : qualityPoints / gradedCredits,
      gradedCredits,
      qualityPoints
    };
  }

  /**
   * Graded courses ordered by year, term and course id
   */
  public async getTranscript(studentId: RecordId): Promise<TranscriptEntry[]> {
    return this.transcriptOf(studentId, 'getTranscript');
  }

  private async transcriptOf(studentId: RecordId, action: string): Promise<TranscriptEntry[]> {
    return this.transact(
      OperationType.REPORT,
      action,
      async tx => {
        this.found(await tx.findStudent(studentId), 'Student', studentId);
        const rows = await tx.listTakes({ studentId, cancelled: false });

        const entries: TranscriptEntry[] = [];
        for (const row of rows) {
          if (row.grade === null) continue;
          const course = await tx.findCourse(row.courseId);
          if (!course) continue;
          entries.push({
            courseId: row.courseId,
            title: course.title,
            credits: course.credits,
            sectionId: row.sectionId,
            semester: row.semester,
            year: row.year,
            grade: row.grade,
            enrollmentDate: row.enrollmentDate
          });
        }

        return entries.sort(
          (a, b) =>
            a.year - b.year ||
            SEMESTER_ORDER[a.semester] - SEMESTER_ORDER[b.semester] ||
            a.courseId.localeCompare(b.courseId)
        );
      },
      { studentId }
    );
  }
}
