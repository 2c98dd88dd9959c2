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
  StudentChanges,
  StudentRecord,
  TakesChanges,
  TakesKey,
  TakesRecord,
  TeachesRecord
} from '../types';
import type {
  AcademicStore,
  SectionFilter,
  StoreTransaction,
  TakesFilter,
  TeachesFilter
} from './AcademicStore';
import {
  ConstraintViolationError,
  checkAdvisor,
  checkCourse,
  checkDepartment,
  checkInstructor,
  checkSection,
  checkStudent,
  checkTakes,
  checkTeaches
} from './constraints';
import { compact, sameSection, sectionKeyOf, takesKeyOf, teachesKeyOf } from './keys';

interface MemoryState {
  departments: Map<string, DepartmentRecord>;
  students: Map<number, StudentRecord>;
  instructors: Map<number, InstructorRecord>;
  courses: Map<string, CourseRecord>;
  prerequisites: PrerequisiteRecord[];
  sections: Map<string, SectionRecord>;
  takes: Map<string, TakesRecord>;
  teaches: Map<string, TeachesRecord>;
  advisors: AdvisorRecord[];
  sequences: { student: number; instructor: number };
}

const emptyState = (): MemoryState => ({
  departments: new Map(),
  students: new Map(),
  instructors: new Map(),
  courses: new Map(),
  prerequisites: [],
  sections: new Map(),
  takes: new Map(),
  teaches: new Map(),
  advisors: [],
  sequences: { student: 0, instructor: 0 }
});

const sectionId = (key: SectionKey): string =>
  [key.courseId, key.sectionId, key.semester, key.year].join('|');

const takesId = (key: TakesKey): string => `${key.studentId}|${sectionId(key)}`;

const teachesId = (row: TeachesRecord): string => `${row.instructorId}|${sectionId(row)}`;

const matchesSectionFilter = (row: SectionRecord, filter: SectionFilter): boolean =>
  (filter.courseId === undefined || row.courseId === filter.courseId) &&
  (filter.semester === undefined || row.semester === filter.semester) &&
  (filter.year === undefined || row.year === filter.year);

const matchesTakesFilter = (row: TakesRecord, filter: TakesFilter): boolean =>
  (filter.studentId === undefined || row.studentId === filter.studentId) &&
  (filter.courseId === undefined || row.courseId === filter.courseId) &&
  (filter.sectionId === undefined || row.sectionId === filter.sectionId) &&
  (filter.semester === undefined || row.semester === filter.semester) &&
  (filter.year === undefined || row.year === filter.year) &&
  (filter.cancelled === undefined || row.cancelled === filter.cancelled);

const matchesTeachesFilter = (row: TeachesRecord, filter: TeachesFilter): boolean =>
  (filter.instructorId === undefined || row.instructorId === filter.instructorId) &&
  (filter.courseId === undefined || row.courseId === filter.courseId) &&
  (filter.sectionId === undefined || row.sectionId === filter.sectionId) &&
  (filter.semester === undefined || row.semester === filter.semester) &&
  (filter.year === undefined || row.year === filter.year);

/**
 * Transaction over a private draft of the store state. The draft replaces the
 * committed state only when the unit of work resolves.
 */
class MemoryTransaction implements StoreTransaction {
  constructor(private readonly state: MemoryState) {}

  // ---------------- departments ----------------

  async insertDepartment(row: DepartmentRecord): Promise<DepartmentRecord> {
    checkDepartment(row);
    if (this.state.departments.has(row.name)) {
      throw new ConstraintViolationError('unique', 'department', 'department_pkey');
    }
    this.state.departments.set(row.name, { ...row });
    return { ...row };
  }

  async findDepartment(name: string): Promise<DepartmentRecord | null> {
    const row = this.state.departments.get(name);
    return row ? { ...row } : null;
  }

  async listDepartments(): Promise<DepartmentRecord[]> {
    return [...this.state.departments.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(row => ({ ...row }));
  }

  async updateDepartment(name: string, changes: DepartmentChanges): Promise<DepartmentRecord | null> {
    const current = this.state.departments.get(name);
    if (!current) return null;
    const next = { ...current, ...compact(changes), name };
    checkDepartment(next);
    this.state.departments.set(name, next);
    return { ...next };
  }

  async deleteDepartment(name: string): Promise<boolean> {
    if (!this.state.departments.has(name)) return false;
    const referenced =
      [...this.state.students.values()].some(row => row.departmentName === name) ||
      [...this.state.instructors.values()].some(row => row.departmentName === name) ||
      [...this.state.courses.values()].some(row => row.departmentName === name);
    if (referenced) {
      throw new ConstraintViolationError('restrict', 'department', 'department_referenced');
    }
    this.state.departments.delete(name);
    return true;
  }

  // ---------------- students ----------------

  async insertStudent(row: NewStudentRecord): Promise<StudentRecord> {
    const id = this.state.sequences.student + 1;
    const student: StudentRecord = { ...row, id };
    checkStudent(student);
    this.requireDepartment('student', student.departmentName);
    this.requireUniqueEmail('student', student.email, id);
    this.state.sequences.student = id;
    this.state.students.set(id, student);
    return { ...student };
  }

  async findStudent(id: number): Promise<StudentRecord | null> {
    const row = this.state.students.get(id);
    return row ? { ...row } : null;
  }

  async listStudents(filter: { departmentName?: string } = {}): Promise<StudentRecord[]> {
    return [...this.state.students.values()]
      .filter(row => filter.departmentName === undefined || row.departmentName === filter.departmentName)
      .sort((a, b) => a.id - b.id)
      .map(row => ({ ...row }));
  }

  async updateStudent(id: number, changes: StudentChanges): Promise<StudentRecord | null> {
    const current = this.state.students.get(id);
    if (!current) return null;
    const next = { ...current, ...compact(changes), id };
    checkStudent(next);
    this.requireDepartment('student', next.departmentName);
    this.requireUniqueEmail('student', next.email, id);
    this.state.students.set(id, next);
    return { ...next };
  }

  async deleteStudent(id: number): Promise<boolean> {
    if (!this.state.students.has(id)) return false;
    for (const [key, row] of this.state.takes) {
      if (row.studentId !== id) continue;
      if (!row.cancelled) {
        this.releaseSeat(row);
      }
      this.state.takes.delete(key);
    }
    this.state.advisors = this.state.advisors.filter(row => row.studentId !== id);
    this.state.students.delete(id);
    return true;
  }

  // ---------------- instructors ----------------

  async insertInstructor(row: NewInstructorRecord): Promise<InstructorRecord> {
    const id = this.state.sequences.instructor + 1;
    const instructor: InstructorRecord = { ...row, id };
    checkInstructor(instructor);
    this.requireDepartment('instructor', instructor.departmentName);
    this.requireUniqueEmail('instructor', instructor.email, id);
    this.state.sequences.instructor = id;
    this.state.instructors.set(id, instructor);
    return { ...instructor };
  }

  async findInstructor(id: number): Promise<InstructorRecord | null> {
    const row = this.state.instructors.get(id);
    return row ? { ...row } : null;
  }

  async listInstructors(filter: { departmentName?: string } = {}): Promise<InstructorRecord[]> {
    return [...this.state.instructors.values()]
      .filter(row => filter.departmentName === undefined || row.departmentName === filter.departmentName)
      .sort((a, b) => a.id - b.id)
      .map(row => ({ ...row }));
  }

  async updateInstructor(id: number, changes: InstructorChanges): Promise<InstructorRecord | null> {
    const current = this.state.instructors.get(id);
    if (!current) return null;
    const next = { ...current, ...compact(changes), id };
    checkInstructor(next);
    this.requireDepartment('instructor', next.departmentName);
    this.requireUniqueEmail('instructor', next.email, id);
    this.state.instructors.set(id, next);
    return { ...next };
  }

  async deleteInstructor(id: number): Promise<boolean> {
    if (!this.state.instructors.has(id)) return false;
    for (const [key, row] of this.state.teaches) {
      if (row.instructorId === id) this.state.teaches.delete(key);
    }
    this.state.advisors = this.state.advisors.map(row =>
      row.instructorId === id ? { ...row, instructorId: null } : row
    );
    this.state.instructors.delete(id);
    return true;
  }

  // ---------------- courses & prerequisites ----------------

  async insertCourse(row: CourseRecord): Promise<CourseRecord> {
    checkCourse(row);
    if (this.state.courses.has(row.courseId)) {
      throw new ConstraintViolationError('unique', 'course', 'course_pkey');
    }
    this.requireDepartment('course', row.departmentName);
    this.state.courses.set(row.courseId, { ...row });
    return { ...row };
  }

  async findCourse(courseId: string): Promise<CourseRecord | null> {
    const row = this.state.courses.get(courseId);
    return row ? { ...row } : null;
  }

  async listCourses(filter: { departmentName?: string } = {}): Promise<CourseRecord[]> {
    return [...this.state.courses.values()]
      .filter(row => filter.departmentName === undefined || row.departmentName === filter.departmentName)
      .sort((a, b) => a.courseId.localeCompare(b.courseId))
      .map(row => ({ ...row }));
  }

  async updateCourse(courseId: string, changes: CourseChanges): Promise<CourseRecord | null> {
    const current = this.state.courses.get(courseId);
    if (!current) return null;
    const next = { ...current, ...compact(changes), courseId };
    checkCourse(next);
    this.requireDepartment('course', next.departmentName);
    this.state.courses.set(courseId, next);
    return { ...next };
  }

  async deleteCourse(courseId: string): Promise<boolean> {
    if (!this.state.courses.has(courseId)) return false;
    for (const section of [...this.state.sections.values()]) {
      if (section.courseId === courseId) this.removeSection(section);
    }
    this.state.prerequisites = this.state.prerequisites
      .filter(edge => edge.courseId !== courseId)
      .map(edge => (edge.prereqId === courseId ? { ...edge, prereqId: null } : edge));
    this.state.courses.delete(courseId);
    return true;
  }

  async insertPrerequisite(edge: { courseId: string; prereqId: string }): Promise<PrerequisiteRecord> {
    if (!this.state.courses.has(edge.courseId) || !this.state.courses.has(edge.prereqId)) {
      throw new ConstraintViolationError('foreignKey', 'prereq', 'prereq_course_fkey');
    }
    const exists = this.state.prerequisites.some(
      row => row.courseId === edge.courseId && row.prereqId === edge.prereqId
    );
    if (exists) {
      throw new ConstraintViolationError('unique', 'prereq', 'prereq_pkey');
    }
    const row: PrerequisiteRecord = { courseId: edge.courseId, prereqId: edge.prereqId };
    this.state.prerequisites.push(row);
    return { ...row };
  }

  async listPrerequisites(courseId: string): Promise<PrerequisiteRecord[]> {
    return this.state.prerequisites
      .filter(row => row.courseId === courseId)
      .map(row => ({ ...row }));
  }

  async deletePrerequisite(courseId: string, prereqId: string): Promise<boolean> {
    const before = this.state.prerequisites.length;
    this.state.prerequisites = this.state.prerequisites.filter(
      row => !(row.courseId === courseId && row.prereqId === prereqId)
    );
    return this.state.prerequisites.length < before;
  }

  // ---------------- sections ----------------

  async insertSection(row: SectionRecord): Promise<SectionRecord> {
    checkSection(row);
    const id = sectionId(row);
    if (this.state.sections.has(id)) {
      throw new ConstraintViolationError('unique', 'section', 'section_pkey');
    }
    if (!this.state.courses.has(row.courseId)) {
      throw new ConstraintViolationError('foreignKey', 'section', 'section_course_fkey');
    }
    this.state.sections.set(id, { ...row });
    return { ...row };
  }

  async findSection(key: SectionKey): Promise<SectionRecord | null> {
    const row = this.state.sections.get(sectionId(key));
    return row ? { ...row } : null;
  }

  async listSections(filter: SectionFilter = {}): Promise<SectionRecord[]> {
    return [...this.state.sections.values()]
      .filter(row => matchesSectionFilter(row, filter))
      .sort(
        (a, b) =>
          a.year - b.year ||
          a.semester.localeCompare(b.semester) ||
          a.courseId.localeCompare(b.courseId) ||
          a.sectionId.localeCompare(b.sectionId)
      )
      .map(row => ({ ...row }));
  }

  async updateSection(key: SectionKey, changes: SectionChanges): Promise<SectionRecord | null> {
    const id = sectionId(key);
    const current = this.state.sections.get(id);
    if (!current) return null;
    const next = { ...current, ...compact(changes), ...sectionKeyOf(key) };
    checkSection(next);
    this.state.sections.set(id, next);
    return { ...next };
  }

  async deleteSection(key: SectionKey): Promise<boolean> {
    const current = this.state.sections.get(sectionId(key));
    if (!current) return false;
    this.removeSection(current);
    return true;
  }

  async adjustEnrolled(key: SectionKey, delta: 1 | -1): Promise<SectionRecord | null> {
    const id = sectionId(key);
    const current = this.state.sections.get(id);
    if (!current) return null;
    const enrolled = current.enrolled + delta;
    if (enrolled < 0 || enrolled > current.capacity) return null;
    const next = { ...current, enrolled };
    this.state.sections.set(id, next);
    return { ...next };
  }

  // ---------------- takes ----------------

  async insertTakes(row: TakesRecord): Promise<TakesRecord> {
    checkTakes(row);
    const id = takesId(row);
    if (this.state.takes.has(id)) {
      throw new ConstraintViolationError('unique', 'takes', 'takes_pkey');
    }
    if (!this.state.students.has(row.studentId)) {
      throw new ConstraintViolationError('foreignKey', 'takes', 'takes_student_fkey');
    }
    if (!this.state.sections.has(sectionId(row))) {
      throw new ConstraintViolationError('foreignKey', 'takes', 'takes_section_fkey');
    }
    this.state.takes.set(id, { ...row });
    return { ...row };
  }

  async findTakes(key: TakesKey): Promise<TakesRecord | null> {
    const row = this.state.takes.get(takesId(key));
    return row ? { ...row } : null;
  }

  async listTakes(filter: TakesFilter): Promise<TakesRecord[]> {
    return [...this.state.takes.values()]
      .filter(row => matchesTakesFilter(row, filter))
      .map(row => ({ ...row }));
  }

  async updateTakes(key: TakesKey, changes: TakesChanges): Promise<TakesRecord | null> {
    const id = takesId(key);
    const current = this.state.takes.get(id);
    if (!current) return null;
    const next = { ...current, ...compact(changes), ...takesKeyOf(key) };
    checkTakes(next);
    this.state.takes.set(id, next);
    return { ...next };
  }

  // ---------------- teaches ----------------

  async upsertTeaches(row: TeachesRecord): Promise<TeachesRecord> {
    const teaches = teachesKeyOf(row);
    checkTeaches(teaches);
    if (!this.state.instructors.has(teaches.instructorId)) {
      throw new ConstraintViolationError('foreignKey', 'teaches', 'teaches_instructor_fkey');
    }
    if (!this.state.sections.has(sectionId(teaches))) {
      throw new ConstraintViolationError('foreignKey', 'teaches', 'teaches_section_fkey');
    }
    this.state.teaches.set(teachesId(teaches), teaches);
    return { ...teaches };
  }

  async listTeaches(filter: TeachesFilter): Promise<TeachesRecord[]> {
    return [...this.state.teaches.values()]
      .filter(row => matchesTeachesFilter(row, filter))
      .map(row => ({ ...row }));
  }

  async deleteTeaches(row: TeachesRecord): Promise<boolean> {
    return this.state.teaches.delete(teachesId(row));
  }

  // ---------------- advisors ----------------

  async insertAdvisor(row: AdvisorRecord): Promise<AdvisorRecord> {
    checkAdvisor(row);
    const exists = this.state.advisors.some(
      current => current.studentId === row.studentId && current.startDate === row.startDate
    );
    if (exists) {
      throw new ConstraintViolationError('unique', 'advisor', 'advisor_pkey');
    }
    if (!this.state.students.has(row.studentId)) {
      throw new ConstraintViolationError('foreignKey', 'advisor', 'advisor_student_fkey');
    }
    if (row.instructorId !== null && !this.state.instructors.has(row.instructorId)) {
      throw new ConstraintViolationError('foreignKey', 'advisor', 'advisor_instructor_fkey');
    }
    this.state.advisors.push({ ...row });
    return { ...row };
  }

  async listAdvisors(studentId: number): Promise<AdvisorRecord[]> {
    return this.state.advisors
      .filter(row => row.studentId === studentId)
      .sort((a, b) => a.startDate.localeCompare(b.startDate))
      .map(row => ({ ...row }));
  }

  async updateAdvisor(
    studentId: number,
    startDate: string,
    changes: AdvisorChanges
  ): Promise<AdvisorRecord | null> {
    const index = this.state.advisors.findIndex(
      row => row.studentId === studentId && row.startDate === startDate
    );
    if (index < 0) return null;
    const next = { ...this.state.advisors[index], ...compact(changes), studentId, startDate };
    checkAdvisor(next);
    if (next.instructorId !== null && !this.state.instructors.has(next.instructorId)) {
      throw new ConstraintViolationError('foreignKey', 'advisor', 'advisor_instructor_fkey');
    }
    this.state.advisors[index] = next;
    return { ...next };
  }

  async deleteAdvisorsAfter(studentId: number, startDate: string): Promise<number> {
    const before = this.state.advisors.length;
    this.state.advisors = this.state.advisors.filter(
      row => row.studentId !== studentId || row.startDate <= startDate
    );
    return before - this.state.advisors.length;
  }

  // ---------------- integrity helpers ----------------

  private requireDepartment(table: string, name: string): void {
    if (!this.state.departments.has(name)) {
      throw new ConstraintViolationError('foreignKey', table, `${table}_department_fkey`);
    }
  }

  private requireUniqueEmail(table: 'student' | 'instructor', email: string, ownId: number): void {
    const rows: Iterable<{ id: number; email: string }> =
      table === 'student' ? this.state.students.values() : this.state.instructors.values();
    for (const row of rows) {
      if (row.id !== ownId && row.email === email) {
        throw new ConstraintViolationError('unique', table, `${table}_email_key`);
      }
    }
  }

  private releaseSeat(key: SectionKey): void {
    const id = sectionId(key);
    const section = this.state.sections.get(id);
    if (section && section.enrolled > 0) {
      this.state.sections.set(id, { ...section, enrolled: section.enrolled - 1 });
    }
  }

  private removeSection(section: SectionRecord): void {
    for (const [key, row] of this.state.takes) {
      if (sameSection(row, section)) this.state.takes.delete(key);
    }
    for (const [key, row] of this.state.teaches) {
      if (sameSection(row, section)) this.state.teaches.delete(key);
    }
    this.state.sections.delete(sectionId(section));
  }
}

/**
 * In-process store. Transactions run one at a time, each against a copy of
 * the committed state, so a failed unit of work leaves nothing behind.
 */
export class InMemoryAcademicStore implements AcademicStore {
  private state: MemoryState = emptyState();
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  async withTransaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new Error('Store is closed');
    }
    const run = this.queue.then(() => this.runIsolated(work));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.queue;
  }

  /** Drop all data; used between test cases. */
  async reset(): Promise<void> {
    await this.queue;
    this.state = emptyState();
  }

  private async runIsolated<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const draft = structuredClone(this.state);
    const result = await work(new MemoryTransaction(draft));
    this.state = draft;
    return result;
  }
}
