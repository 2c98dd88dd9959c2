// Domain records shared by the services and both store implementations

export const SEMESTERS = ['Fall', 'Winter', 'Spring', 'Summer'] as const;
export type Semester = (typeof SEMESTERS)[number];

export const LETTER_GRADES = [
  'A+', 'A', 'A-',
  'B+', 'B', 'B-',
  'C+', 'C', 'C-',
  'D+', 'D', 'F'
] as const;
export type LetterGrade = (typeof LETTER_GRADES)[number];

export const ACADEMIC_RANKS = [
  'Assistant Professor',
  'Associate Professor',
  'Professor',
  'Lecturer',
  'Adjunct'
] as const;
export type AcademicRank = (typeof ACADEMIC_RANKS)[number];

export const STUDENT_STATUSES = ['Active', 'Inactive', 'Graduated', 'Suspended'] as const;
export type StudentStatus = (typeof STUDENT_STATUSES)[number];

export interface DepartmentRecord {
  name: string;
  phone: string | null;
  budget: number;
  building: string | null;
  dean: string | null;
}

export interface StudentRecord {
  id: number;
  firstName: string;
  lastName: string;
  departmentName: string;
  major: string | null;
  totalCredits: number;
  email: string;
  enrollmentDate: string;
  status: StudentStatus;
}

export interface InstructorRecord {
  id: number;
  firstName: string;
  lastName: string;
  departmentName: string;
  rank: AcademicRank;
  salary: number;
  email: string;
  hireDate: string;
  office: string | null;
}

export interface CourseRecord {
  courseId: string;
  title: string;
  credits: number;
  departmentName: string;
  description: string | null;
}

/**
 * Directed edge: `courseId` requires `prereqId`.
 * `prereqId` becomes null once the prerequisite course is deleted.
 */
export interface PrerequisiteRecord {
  courseId: string;
  prereqId: string | null;
}

export interface SectionKey {
  courseId: string;
  sectionId: string;
  semester: Semester;
  year: number;
}

export interface SectionRecord extends SectionKey {
  timeSlot: string;
  room: string | null;
  capacity: number;
  enrolled: number;
}

export interface TakesKey extends SectionKey {
  studentId: number;
}

export interface TakesRecord extends TakesKey {
  cancelled: boolean;
  grade: LetterGrade | null;
  enrollmentDate: string;
}

export interface TeachesRecord extends SectionKey {
  instructorId: number;
}

/**
 * One advisorship interval. The row with a null `endDate` is the student's
 * current advisor; `instructorId` is nulled when the instructor is deleted.
 */
export interface AdvisorRecord {
  studentId: number;
  instructorId: number | null;
  startDate: string;
  endDate: string | null;
}

export type NewStudentRecord = Omit<StudentRecord, 'id'>;
export type NewInstructorRecord = Omit<InstructorRecord, 'id'>;

export type DepartmentChanges = Partial<Omit<DepartmentRecord, 'name'>>;
export type StudentChanges = Partial<Omit<StudentRecord, 'id'>>;
export type InstructorChanges = Partial<Omit<InstructorRecord, 'id'>>;
export type CourseChanges = Partial<Omit<CourseRecord, 'courseId'>>;
export type SectionChanges = Partial<Pick<SectionRecord, 'timeSlot' | 'room' | 'capacity'>>;
export type TakesChanges = Partial<Pick<TakesRecord, 'cancelled' | 'grade' | 'enrollmentDate'>>;
export type AdvisorChanges = Partial<Pick<AdvisorRecord, 'instructorId' | 'endDate'>>;

export interface GpaReport {
  studentId: number;
  /** null when the student has no graded credits */
  gpa: number | null;
  gradedCredits: number;
  qualityPoints: number;
}

export interface TranscriptEntry {
  courseId: string;
  title: string;
  credits: number;
  sectionId: string;
  semester: Semester;
  year: number;
  grade: LetterGrade;
  enrollmentDate: string;
}

export interface WorkloadEntry {
  courseId: string;
  sectionId: string;
  semester: Semester;
  year: number;
  timeSlot: string;
  room: string | null;
}

export interface SectionDetails extends SectionRecord {
  instructorIds: number[];
}
