import mongoose, { type ClientSession } from 'mongoose';
import Advisor from '../models/Advisor';
import Counter from '../models/Counter';
import Course from '../models/Course';
import Department from '../models/Department';
import Instructor from '../models/Instructor';
import Prerequisite from '../models/Prerequisite';
import Section from '../models/Section';
import Student from '../models/Student';
import Takes from '../models/Takes';
import Teaches from '../models/Teaches';
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
import { compact, sectionKeyOf, takesKeyOf, teachesKeyOf } from './keys';

const HIDE_ID = '-_id';
const WRITE_CONFLICT = 112;
const DUPLICATE_KEY = 11000;

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Transient transaction failures and write conflicts are safe to retry from the top
 */
export const isTransientConflict = (error: unknown): boolean => {
  if (error instanceof mongoose.mongo.MongoError) {
    return error.hasErrorLabel('TransientTransactionError') || error.code === WRITE_CONFLICT;
  }
  return false;
};

/**
 * Run `attempt`, then rerun it up to `maxRetries` more times while it fails
 * with a transient conflict. The wait grows with each retry.
 */
export const retryTransient = async <T>(
  maxRetries: number,
  retryDelayMs: number,
  attempt: () => Promise<T>
): Promise<T> => {
  for (let retry = 0; ; retry++) {
    try {
      return await attempt();
    } catch (error) {
      if (retry >= maxRetries || !isTransientConflict(error)) {
        throw error;
      }
      await delay(retryDelayMs * (retry + 1));
    }
  }
};

/**
 * Translate driver-level constraint failures into store constraint violations
 */
export const toConstraintViolation = (error: unknown, table: string): unknown => {
  if (error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY) {
    return new ConstraintViolationError('unique', table, `${table}_unique_index`);
  }
  if (error instanceof mongoose.Error.ValidationError) {
    const path = Object.keys(error.errors)[0] ?? 'document';
    return new ConstraintViolationError('check', table, `${table}_${path}_valid`);
  }
  return error;
};

class MongoTransaction implements StoreTransaction {
  constructor(private readonly session: ClientSession) {}

  // ---------------- departments ----------------

  async insertDepartment(row: DepartmentRecord): Promise<DepartmentRecord> {
    checkDepartment(row);
    await this.write('department', () => Department.create([row], { session: this.session }));
    return { ...row };
  }

  async findDepartment(name: string): Promise<DepartmentRecord | null> {
    return Department.findOne({ name }).select(HIDE_ID).session(this.session).lean();
  }

  async listDepartments(): Promise<DepartmentRecord[]> {
    return Department.find().select(HIDE_ID).sort({ name: 1 }).session(this.session).lean();
  }

  async updateDepartment(name: string, changes: DepartmentChanges): Promise<DepartmentRecord | null> {
    const current = await this.findDepartment(name);
    if (!current) return null;
    const next = { ...current, ...compact(changes), name };
    checkDepartment(next);
    await this.write('department', () =>
      Department.updateOne({ name }, { $set: compact(changes) }, { session: this.session, runValidators: true })
    );
    return next;
  }

  async deleteDepartment(name: string): Promise<boolean> {
    const current = await this.findDepartment(name);
    if (!current) return false;
    const [students, instructors, courses] = await Promise.all([
      Student.countDocuments({ departmentName: name }).session(this.session),
      Instructor.countDocuments({ departmentName: name }).session(this.session),
      Course.countDocuments({ departmentName: name }).session(this.session)
    ]);
    if (students + instructors + courses > 0) {
      throw new ConstraintViolationError('restrict', 'department', 'department_referenced');
    }
    await Department.deleteOne({ name }, { session: this.session });
    return true;
  }

  // ---------------- students ----------------

  async insertStudent(row: NewStudentRecord): Promise<StudentRecord> {
    await this.requireDepartment('student', row.departmentName);
    const student: StudentRecord = { ...row, id: await this.nextId('student') };
    checkStudent(student);
    await this.write('student', () => Student.create([student], { session: this.session }));
    return student;
  }

  async findStudent(id: number): Promise<StudentRecord | null> {
    return Student.findOne({ id }).select(HIDE_ID).session(this.session).lean();
  }

  async listStudents(filter: { departmentName?: string } = {}): Promise<StudentRecord[]> {
    return Student.find(compact(filter)).select(HIDE_ID).sort({ id: 1 }).session(this.session).lean();
  }

  async updateStudent(id: number, changes: StudentChanges): Promise<StudentRecord | null> {
    const current = await this.findStudent(id);
    if (!current) return null;
    const next = { ...current, ...compact(changes), id };
    checkStudent(next);
    if (changes.departmentName !== undefined) {
      await this.requireDepartment('student', changes.departmentName);
    }
    await this.write('student', () =>
      Student.updateOne({ id }, { $set: compact(changes) }, { session: this.session, runValidators: true })
    );
    return next;
  }

  async deleteStudent(id: number): Promise<boolean> {
    const current = await this.findStudent(id);
    if (!current) return false;
    const active = await Takes.find({ studentId: id, cancelled: false })
      .select(HIDE_ID)
      .session(this.session)
      .lean();
    for (const row of active) {
      await Section.updateOne(
        { ...sectionKeyOf(row), enrolled: { $gt: 0 } },
        { $inc: { enrolled: -1 } },
        { session: this.session }
      );
    }
    await Takes.deleteMany({ studentId: id }, { session: this.session });
    await Advisor.deleteMany({ studentId: id }, { session: this.session });
    await Student.deleteOne({ id }, { session: this.session });
    return true;
  }

  // ---------------- instructors ----------------

  async insertInstructor(row: NewInstructorRecord): Promise<InstructorRecord> {
    await this.requireDepartment('instructor', row.departmentName);
    const instructor: InstructorRecord = { ...row, id: await this.nextId('instructor') };
    checkInstructor(instructor);
    await this.write('instructor', () => Instructor.create([instructor], { session: this.session }));
    return instructor;
  }

  async findInstructor(id: number): Promise<InstructorRecord | null> {
    return Instructor.findOne({ id }).select(HIDE_ID).session(this.session).lean();
  }

  async listInstructors(filter: { departmentName?: string } = {}): Promise<InstructorRecord[]> {
    return Instructor.find(compact(filter)).select(HIDE_ID).sort({ id: 1 }).session(this.session).lean();
  }

  async updateInstructor(id: number, changes: InstructorChanges): Promise<InstructorRecord | null> {
    const current = await this.findInstructor(id);
    if (!current) return null;
    const next = { ...current, ...compact(changes), id };
    checkInstructor(next);
    if (changes.departmentName !== undefined) {
      await this.requireDepartment('instructor', changes.departmentName);
    }
    await this.write('instructor', () =>
      Instructor.updateOne({ id }, { $set: compact(changes) }, { session: this.session, runValidators: true })
    );
    return next;
  }

  async deleteInstructor(id: number): Promise<boolean> {
    const current = await this.findInstructor(id);
    if (!current) return false;
    await Teaches.deleteMany({ instructorId: id }, { session: this.session });
    await Advisor.updateMany(
      { instructorId: id },
      { $set: { instructorId: null } },
      { session: this.session }
    );
    await Instructor.deleteOne({ id }, { session: this.session });
    return true;
  }

  // ---------------- courses & prerequisites ----------------

  async insertCourse(row: CourseRecord): Promise<CourseRecord> {
    checkCourse(row);
    await this.requireDepartment('course', row.departmentName);
    await this.write('course', () => Course.create([row], { session: this.session }));
    return { ...row };
  }

  async findCourse(courseId: string): Promise<CourseRecord | null> {
    return Course.findOne({ courseId }).select(HIDE_ID).session(this.session).lean();
  }

  async listCourses(filter: { departmentName?: string } = {}): Promise<CourseRecord[]> {
    return Course.find(compact(filter)).select(HIDE_ID).sort({ courseId: 1 }).session(this.session).lean();
  }

  async updateCourse(courseId: string, changes: CourseChanges): Promise<CourseRecord | null> {
    const current = await this.findCourse(courseId);
    if (!current) return null;
    const next = { ...current, ...compact(changes), courseId };
    checkCourse(next);
    if (changes.departmentName !== undefined) {
      await this.requireDepartment('course', changes.departmentName);
    }
    await this.write('course', () =>
      Course.updateOne({ courseId }, { $set: compact(changes) }, { session: this.session, runValidators: true })
    );
    return next;
  }

  async deleteCourse(courseId: string): Promise<boolean> {
    const current = await this.findCourse(courseId);
    if (!current) return false;
    const sections = await Section.find({ courseId }).select(HIDE_ID).session(this.session).lean();
    for (const section of sections) {
      await this.removeSection(section);
    }
    await Prerequisite.deleteMany({ courseId }, { session: this.session });
    await Prerequisite.updateMany(
      { prereqId: courseId },
      { $set: { prereqId: null } },
      { session: this.session }
    );
    await Course.deleteOne({ courseId }, { session: this.session });
    return true;
  }

  async insertPrerequisite(edge: { courseId: string; prereqId: string }): Promise<PrerequisiteRecord> {
    const [course, prereq] = await Promise.all([
      this.findCourse(edge.courseId),
      this.findCourse(edge.prereqId)
    ]);
    if (!course || !prereq) {
      throw new ConstraintViolationError('foreignKey', 'prereq', 'prereq_course_fkey');
    }
    const row: PrerequisiteRecord = { courseId: edge.courseId, prereqId: edge.prereqId };
    await this.write('prereq', () => Prerequisite.create([row], { session: this.session }));
    return row;
  }

  async listPrerequisites(courseId: string): Promise<PrerequisiteRecord[]> {
    return Prerequisite.find({ courseId }).select(HIDE_ID).session(this.session).lean();
  }

  async deletePrerequisite(courseId: string, prereqId: string): Promise<boolean> {
    const result = await Prerequisite.deleteOne({ courseId, prereqId }, { session: this.session });
    return result.deletedCount > 0;
  }

  // ---------------- sections ----------------

  async insertSection(row: SectionRecord): Promise<SectionRecord> {
    checkSection(row);
    if (!(await this.findCourse(row.courseId))) {
      throw new ConstraintViolationError('foreignKey', 'section', 'section_course_fkey');
    }
    await this.write('section', () => Section.create([row], { session: this.session }));
    return { ...row };
  }

  async findSection(key: SectionKey): Promise<SectionRecord | null> {
    return Section.findOne(sectionKeyOf(key)).select(HIDE_ID).session(this.session).lean();
  }

  async listSections(filter: SectionFilter = {}): Promise<SectionRecord[]> {
    return Section.find(compact(filter))
      .select(HIDE_ID)
      .sort({ year: 1, semester: 1, courseId: 1, sectionId: 1 })
      .session(this.session)
      .lean();
  }

  async updateSection(key: SectionKey, changes: SectionChanges): Promise<SectionRecord | null> {
    const current = await this.findSection(key);
    if (!current) return null;
    const next = { ...current, ...compact(changes), ...sectionKeyOf(key) };
    checkSection(next);
    // Guard on the enrolled count just read so a concurrent enrollment cannot slip past the capacity check
    const result = await this.write('section', () =>
      Section.updateOne(
        { ...sectionKeyOf(key), enrolled: current.enrolled },
        { $set: compact(changes) },
        { session: this.session, runValidators: true }
      )
    );
    if (result.matchedCount === 0) {
      throw new ConstraintViolationError('check', 'section', 'enrolled_within_capacity');
    }
    return next;
  }

  async deleteSection(key: SectionKey): Promise<boolean> {
    const current = await this.findSection(key);
    if (!current) return false;
    await this.removeSection(current);
    return true;
  }

  async adjustEnrolled(key: SectionKey, delta: 1 | -1): Promise<SectionRecord | null> {
    if (delta > 0) {
      return Section.findOneAndUpdate(
        { ...sectionKeyOf(key), $expr: { $lt: ['$enrolled', '$capacity'] } },
        { $inc: { enrolled: 1 } },
        { new: true, session: this.session }
      )
        .select(HIDE_ID)
        .lean();
    }
    return Section.findOneAndUpdate(
      { ...sectionKeyOf(key), enrolled: { $gt: 0 } },
      { $inc: { enrolled: -1 } },
      { new: true, session: this.session }
    )
      .select(HIDE_ID)
      .lean();
  }

  // ---------------- takes ----------------

  async insertTakes(row: TakesRecord): Promise<TakesRecord> {
    checkTakes(row);
    const [student, section] = await Promise.all([
      this.findStudent(row.studentId),
      this.findSection(row)
    ]);
    if (!student) {
      throw new ConstraintViolationError('foreignKey', 'takes', 'takes_student_fkey');
    }
    if (!section) {
      throw new ConstraintViolationError('foreignKey', 'takes', 'takes_section_fkey');
    }
    await this.write('takes', () => Takes.create([row], { session: this.session }));
    return { ...row };
  }

  async findTakes(key: TakesKey): Promise<TakesRecord | null> {
    return Takes.findOne(takesKeyOf(key)).select(HIDE_ID).session(this.session).lean();
  }

  async listTakes(filter: TakesFilter): Promise<TakesRecord[]> {
    return Takes.find(compact(filter)).select(HIDE_ID).session(this.session).lean();
  }

  async updateTakes(key: TakesKey, changes: TakesChanges): Promise<TakesRecord | null> {
    const current = await this.findTakes(key);
    if (!current) return null;
    const next = { ...current, ...compact(changes), ...takesKeyOf(key) };
    checkTakes(next);
    await this.write('takes', () =>
      Takes.updateOne(takesKeyOf(key), { $set: compact(changes) }, { session: this.session, runValidators: true })
    );
    return next;
  }

  // ---------------- teaches ----------------

  async upsertTeaches(row: TeachesRecord): Promise<TeachesRecord> {
    const teaches = teachesKeyOf(row);
    checkTeaches(teaches);
    const [instructor, section] = await Promise.all([
      this.findInstructor(teaches.instructorId),
      this.findSection(teaches)
    ]);
    if (!instructor) {
      throw new ConstraintViolationError('foreignKey', 'teaches', 'teaches_instructor_fkey');
    }
    if (!section) {
      throw new ConstraintViolationError('foreignKey', 'teaches', 'teaches_section_fkey');
    }
    await this.write('teaches', () =>
      Teaches.updateOne(teaches, { $setOnInsert: teaches }, { upsert: true, session: this.session })
    );
    return teaches;
  }

  async listTeaches(filter: TeachesFilter): Promise<TeachesRecord[]> {
    return Teaches.find(compact(filter)).select(HIDE_ID).session(this.session).lean();
  }

  async deleteTeaches(row: TeachesRecord): Promise<boolean> {
    const result = await Teaches.deleteOne(teachesKeyOf(row), { session: this.session });
    return result.deletedCount > 0;
  }

  // ---------------- advisors ----------------

  async insertAdvisor(row: AdvisorRecord): Promise<AdvisorRecord> {
    checkAdvisor(row);
    if (!(await this.findStudent(row.studentId))) {
      throw new ConstraintViolationError('foreignKey', 'advisor', 'advisor_student_fkey');
    }
    if (row.instructorId !== null && !(await this.findInstructor(row.instructorId))) {
      throw new ConstraintViolationError('foreignKey', 'advisor', 'advisor_instructor_fkey');
    }
    await this.write('advisor', () => Advisor.create([row], { session: this.session }));
    return { ...row };
  }

  async listAdvisors(studentId: number): Promise<AdvisorRecord[]> {
    return Advisor.find({ studentId }).select(HIDE_ID).sort({ startDate: 1 }).session(this.session).lean();
  }

  async updateAdvisor(
    studentId: number,
    startDate: string,
    changes: AdvisorChanges
  ): Promise<AdvisorRecord | null> {
    const current = await Advisor.findOne({ studentId, startDate })
      .select(HIDE_ID)
      .session(this.session)
      .lean();
    if (!current) return null;
    const next: AdvisorRecord = { ...current, ...compact(changes), studentId, startDate };
    checkAdvisor(next);
    if (next.instructorId !== null && !(await this.findInstructor(next.instructorId))) {
      throw new ConstraintViolationError('foreignKey', 'advisor', 'advisor_instructor_fkey');
    }
    await Advisor.updateOne({ studentId, startDate }, { $set: compact(changes) }, { session: this.session });
    return next;
  }

  async deleteAdvisorsAfter(studentId: number, startDate: string): Promise<number> {
    const result = await Advisor.deleteMany({ studentId, startDate: { $gt: startDate } }, { session: this.session });
    return result.deletedCount;
  }

  // ---------------- helpers ----------------

  private async write<T>(table: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toConstraintViolation(error, table);
    }
  }

  private async requireDepartment(table: string, name: string): Promise<void> {
    if (!(await this.findDepartment(name))) {
      throw new ConstraintViolationError('foreignKey', table, `${table}_department_fkey`);
    }
  }

  private async nextId(name: 'student' | 'instructor'): Promise<number> {
    const counter = await Counter.findOneAndUpdate(
      { name },
      { $inc: { seq: 1 } },
      { upsert: true, new: true, session: this.session }
    ).lean();
    if (!counter) {
      throw new Error(`Sequence ${name} could not be advanced`);
    }
    return counter.seq;
  }

  private async removeSection(section: SectionKey): Promise<void> {
    const key = sectionKeyOf(section);
    await Takes.deleteMany(key, { session: this.session });
    await Teaches.deleteMany(key, { session: this.session });
    await Section.deleteOne(key, { session: this.session });
  }
}

export interface MongoStoreOptions {
  /** Reruns after the first attempt when a transaction hits a transient conflict. */
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * Store backed by the Mongoose models. Requires a replica set or sharded
 * cluster, since every unit of work runs inside a multi-document transaction.
 */
export class MongoAcademicStore implements AcademicStore {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: MongoStoreOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 100;
  }

  async withTransaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return retryTransient(this.maxRetries, this.retryDelayMs, async () => {
      const session = await mongoose.startSession();
      session.startTransaction({
        readConcern: { level: 'snapshot' },
        writeConcern: { w: 'majority' }
      });
      let commitStarted = false;

      try {
        const result = await work(new MongoTransaction(session));
        commitStarted = true;
        await session.commitTransaction();
        return result;
      } catch (error) {
        if (!commitStarted && session.inTransaction()) {
          await session.abortTransaction();
        }
        throw error;
      } finally {
        await session.endSession();
      }
    });
  }

  async close(): Promise<void> {
    await mongoose.disconnect();
  }
}
