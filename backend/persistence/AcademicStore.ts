import type {
  AdvisorChanges,
  AdvisorRecord,
  CourseChanges,
  CourseRecord,
  DepartmentChanges,
  DepartmentRecord,
  InstructorChanges,
  InstructorRecord,
  NewInstructorRecord,
  NewStudentRecord,
  PrerequisiteRecord,
  SectionChanges,
  SectionKey,
  SectionRecord,
  Semester,
  StudentChanges,
  StudentRecord,
  TakesChanges,
  TakesKey,
  TakesRecord,
  TeachesRecord
} from '../types';

export interface SectionFilter {
  courseId?: string;
  semester?: Semester;
  year?: number;
}

export interface TakesFilter extends Partial<TakesKey> {
  cancelled?: boolean;
}

export type TeachesFilter = Partial<TeachesRecord>;

/**
 * Handle for one unit of work. Every method reads and writes inside the
 * transaction it was created for; constraint violations surface as
 * ConstraintViolationError.
 *
 * `update*` methods ignore undefined members of `changes` and return null
 * when the keyed row does not exist; `delete*` methods return false.
 */
export interface StoreTransaction {
  insertDepartment(row: DepartmentRecord): Promise<DepartmentRecord>;
  findDepartment(name: string): Promise<DepartmentRecord | null>;
  listDepartments(): Promise<DepartmentRecord[]>;
  updateDepartment(name: string, changes: DepartmentChanges): Promise<DepartmentRecord | null>;
  /** Restricted while any student, instructor or course references the department. */
  deleteDepartment(name: string): Promise<boolean>;

  /** Assigns the next numeric id. */
  insertStudent(row: NewStudentRecord): Promise<StudentRecord>;
  findStudent(id: number): Promise<StudentRecord | null>;
  listStudents(filter?: { departmentName?: string }): Promise<StudentRecord[]>;
  updateStudent(id: number, changes: StudentChanges): Promise<StudentRecord | null>;
  /** Cascades to the student's Takes and Advisor rows; active Takes release their seats. */
  deleteStudent(id: number): Promise<boolean>;

  insertInstructor(row: NewInstructorRecord): Promise<InstructorRecord>;
  findInstructor(id: number): Promise<InstructorRecord | null>;
  listInstructors(filter?: { departmentName?: string }): Promise<InstructorRecord[]>;
  updateInstructor(id: number, changes: InstructorChanges): Promise<InstructorRecord | null>;
  /** Cascades to Teaches rows and nulls the instructor on Advisor rows. */
  deleteInstructor(id: number): Promise<boolean>;

  insertCourse(row: CourseRecord): Promise<CourseRecord>;
  findCourse(courseId: string): Promise<CourseRecord | null>;
  listCourses(filter?: { departmentName?: string }): Promise<CourseRecord[]>;
  updateCourse(courseId: string, changes: CourseChanges): Promise<CourseRecord | null>;
  /**
   * Cascades to the course's sections (and their Takes/Teaches) and to edges
   * where it is the dependent course; edges where it is the prerequisite keep
   * the dependent course with a null prerequisite.
   */
  deleteCourse(courseId: string): Promise<boolean>;

  insertPrerequisite(edge: { courseId: string; prereqId: string }): Promise<PrerequisiteRecord>;
  listPrerequisites(courseId: string): Promise<PrerequisiteRecord[]>;
  deletePrerequisite(courseId: string, prereqId: string): Promise<boolean>;

  insertSection(row: SectionRecord): Promise<SectionRecord>;
  findSection(key: SectionKey): Promise<SectionRecord | null>;
  listSections(filter?: SectionFilter): Promise<SectionRecord[]>;
  updateSection(key: SectionKey, changes: SectionChanges): Promise<SectionRecord | null>;
  deleteSection(key: SectionKey): Promise<boolean>;
  /**
   * Atomically moves `enrolled` by one seat. Returns null, leaving the row
   * untouched, when the section is missing, already full (+1) or empty (-1).
   */
  adjustEnrolled(key: SectionKey, delta: 1 | -1): Promise<SectionRecord | null>;

  insertTakes(row: TakesRecord): Promise<TakesRecord>;
  findTakes(key: TakesKey): Promise<TakesRecord | null>;
  listTakes(filter: TakesFilter): Promise<TakesRecord[]>;
  updateTakes(key: TakesKey, changes: TakesChanges): Promise<TakesRecord | null>;

  /** Inserts the row, or leaves an identical existing row in place. */
  upsertTeaches(row: TeachesRecord): Promise<TeachesRecord>;
  listTeaches(filter: TeachesFilter): Promise<TeachesRecord[]>;
  deleteTeaches(row: TeachesRecord): Promise<boolean>;

  insertAdvisor(row: AdvisorRecord): Promise<AdvisorRecord>;
  /** Ordered by start date, oldest first. */
  listAdvisors(studentId: number): Promise<AdvisorRecord[]>;
  updateAdvisor(studentId: number, startDate: string, changes: AdvisorChanges): Promise<AdvisorRecord | null>;
  /** Removes the student's intervals starting strictly after `startDate`; returns how many went. */
  deleteAdvisorsAfter(studentId: number, startDate: string): Promise<number>;
}

/**
 * Transactional store the services are constructed with. `withTransaction`
 * commits when `work` resolves and rolls back on every other exit path.
 */
export interface AcademicStore {
  withTransaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
