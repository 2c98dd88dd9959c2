import {
  ACADEMIC_RANKS,
  LETTER_GRADES,
  SEMESTERS,
  STUDENT_STATUSES,
  type AdvisorRecord,
  type CourseRecord,
  type DepartmentRecord,
  type InstructorRecord,
  type SectionRecord,
  type StudentRecord,
  type TakesRecord,
  type TeachesRecord
} from '../types';

export type ConstraintKind = 'unique' | 'foreignKey' | 'check' | 'restrict';

/**
 * Raised by a store when a write would break a declared constraint.
 * Services translate it into a DATABASE_ERROR.
 */
export class ConstraintViolationError extends Error {
  constructor(
    public readonly kind: ConstraintKind,
    public readonly table: string,
    public readonly constraint: string
  ) {
    super(`${kind} constraint '${constraint}' violated on ${table}`);
    this.name = 'ConstraintViolationError';
  }
}

const ensure = (condition: boolean, table: string, constraint: string): void => {
  if (!condition) {
    throw new ConstraintViolationError('check', table, constraint);
  }
};

const isOneOf = <T extends string>(values: readonly T[], value: string): boolean =>
  values.some(candidate => candidate === value);

const isValidYear = (year: number): boolean => Number.isInteger(year) && year > 1701 && year < 2100;

// Row-level CHECK constraints, applied by both stores before every insert and update

export const checkDepartment = (row: DepartmentRecord): void => {
  ensure(row.name.length > 0, 'department', 'name_not_empty');
  ensure(Number.isFinite(row.budget) && row.budget >= 0, 'department', 'budget_non_negative');
};

export const checkStudent = (row: StudentRecord): void => {
  ensure(Number.isInteger(row.totalCredits) && row.totalCredits >= 0, 'student', 'total_credits_non_negative');
  ensure(isOneOf(STUDENT_STATUSES, row.status), 'student', 'status_allowed');
  ensure(row.email.length > 0, 'student', 'email_not_empty');
};

export const checkInstructor = (row: InstructorRecord): void => {
  ensure(Number.isFinite(row.salary) && row.salary >= 0, 'instructor', 'salary_non_negative');
  ensure(isOneOf(ACADEMIC_RANKS, row.rank), 'instructor', 'rank_allowed');
  ensure(row.email.length > 0, 'instructor', 'email_not_empty');
};

export const checkCourse = (row: CourseRecord): void => {
  ensure(Number.isInteger(row.credits) && row.credits > 0 && row.credits <= 4, 'course', 'credits_range');
};

export const checkSection = (row: SectionRecord): void => {
  ensure(isOneOf(SEMESTERS, row.semester), 'section', 'semester_allowed');
  ensure(isValidYear(row.year), 'section', 'year_range');
  ensure(Number.isInteger(row.capacity) && row.capacity > 0, 'section', 'capacity_positive');
  ensure(Number.isInteger(row.enrolled) && row.enrolled >= 0, 'section', 'enrolled_non_negative');
  ensure(row.enrolled <= row.capacity, 'section', 'enrolled_within_capacity');
};

export const checkTakes = (row: TakesRecord): void => {
  ensure(isOneOf(SEMESTERS, row.semester), 'takes', 'semester_allowed');
  ensure(isValidYear(row.year), 'takes', 'year_range');
  ensure(row.grade === null || isOneOf(LETTER_GRADES, row.grade), 'takes', 'grade_allowed');
};

export const checkTeaches = (row: TeachesRecord): void => {
  ensure(isOneOf(SEMESTERS, row.semester), 'teaches', 'semester_allowed');
  ensure(isValidYear(row.year), 'teaches', 'year_range');
};

export const checkAdvisor = (row: AdvisorRecord): void => {
  ensure(row.endDate === null || row.endDate >= row.startDate, 'advisor', 'end_not_before_start');
};
