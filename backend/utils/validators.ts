import { z } from 'zod';
import {
  ACADEMIC_RANKS,
  LETTER_GRADES,
  SEMESTERS,
  STUDENT_STATUSES,
  type AcademicRank,
  type LetterGrade,
  type Semester,
  type StudentStatus
} from '../types';
import { AcademicRecordErrors, type AcademicRecordError } from './AcademicRecordError';

/**
 * Typed value constructors. Each takes a raw value from outside the service
 * boundary and returns a branded value, or throws the matching
 * AcademicRecordError. Service signatures accept only branded values.
 */

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_SLOT_PATTERN = /^([A-Za-z]+) (\d{1,2}):(\d{2})-(\d{1,2}):(\d{2})$/;
const DAY_CODES = /Th|Sa|Su|M|T|W|R|F|S/g;

const parse = <S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  fail: (value: unknown) => AcademicRecordError
): z.output<S> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw fail(value);
  }
  return result.data;
};

const isCalendarDate = (value: string): boolean => {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
};

const toMinutes = (hours: string, minutes: string): number | null => {
  const h = Number(hours);
  const m = Number(minutes);
  if (h > 23 || m > 59) return null;
  return h * 60 + m;
};

/**
 * Canonical form of a time slot, e.g. `MWF 9:00-9:50` becomes `MWF 09:00-09:50`.
 * Returns null when the slot is malformed.
 */
export const normalizeTimeSlot = (raw: string): string | null => {
  const match = TIME_SLOT_PATTERN.exec(raw.trim());
  if (!match) return null;
  const [, days, startHour, startMinute, endHour, endMinute] = match;

  const codes = days.match(DAY_CODES) ?? [];
  if (codes.join('') !== days || new Set(codes).size !== codes.length) return null;

  const start = toMinutes(startHour, startMinute);
  const end = toMinutes(endHour, endMinute);
  if (start === null || end === null || start >= end) return null;

  return `${days} ${startHour.padStart(2, '0')}:${startMinute}-${endHour.padStart(2, '0')}:${endMinute}`;
};

const integerLike = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+$/).transform(Number)
]);

const emailSchema = z.string().trim().max(60).regex(EMAIL_PATTERN).brand<'Email'>();
const isoDateSchema = z.string().trim().refine(isCalendarDate).brand<'IsoDate'>();
const timeSlotSchema = z
  .string()
  .transform((value, ctx) => {
    const normalized = normalizeTimeSlot(value);
    if (normalized === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'time slot is malformed' });
      return z.NEVER;
    }
    return normalized;
  })
  .brand<'TimeSlot'>();
const academicYearSchema = integerLike.pipe(z.number().int().gt(1701).lt(2100)).brand<'AcademicYear'>();
const recordIdSchema = integerLike.pipe(z.number().int().positive()).brand<'RecordId'>();
const creditsSchema = z.number().int().min(1).max(4).brand<'Credits'>();
const capacitySchema = z.number().int().positive().brand<'Capacity'>();
const amountSchema = z.number().finite().nonnegative().brand<'Amount'>();
const creditTotalSchema = z.number().int().nonnegative().brand<'CreditTotal'>();
const courseCodeSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9-]{1,10}$/)
  .transform(value => value.toUpperCase())
  .brand<'CourseCode'>();
const sectionLabelSchema = z.string().trim().regex(/^[A-Za-z0-9-]{1,8}$/).brand<'SectionLabel'>();
const textSchema = (maxLength: number) => z.string().trim().min(1).max(maxLength).brand<'Text'>();

const gradeSchema = z.enum(LETTER_GRADES);
const semesterSchema = z.enum(SEMESTERS);
const rankSchema = z.enum(ACADEMIC_RANKS);
const statusSchema = z.enum(STUDENT_STATUSES);
const fieldsSchema = z.record(z.unknown());

export type Email = z.infer<typeof emailSchema>;
export type IsoDate = z.infer<typeof isoDateSchema>;
export type TimeSlot = z.infer<typeof timeSlotSchema>;
export type AcademicYear = z.infer<typeof academicYearSchema>;
export type RecordId = z.infer<typeof recordIdSchema>;
export type Credits = z.infer<typeof creditsSchema>;
export type Capacity = z.infer<typeof capacitySchema>;
export type Amount = z.infer<typeof amountSchema>;
export type CreditTotal = z.infer<typeof creditTotalSchema>;
export type CourseCode = z.infer<typeof courseCodeSchema>;
export type SectionLabel = z.infer<typeof sectionLabelSchema>;
export type Text = z.infer<ReturnType<typeof textSchema>>;

const isBlank = (value: unknown): boolean => value === undefined || value === null || value === '';

export const toEmail = (value: unknown): Email =>
  parse(emailSchema, value, AcademicRecordErrors.invalidEmail);

export const toIsoDate = (value: unknown): IsoDate =>
  parse(isoDateSchema, value, AcademicRecordErrors.unsupportedDateFormat);

export const toTimeSlot = (value: unknown): TimeSlot =>
  parse(timeSlotSchema, value, AcademicRecordErrors.incorrectTimeslot);

export const toLetterGrade = (value: unknown): LetterGrade =>
  parse(gradeSchema, value, raw => AcademicRecordErrors.incorrectValue('grade', raw));

/** A missing or empty grade means "not graded yet". */
export const toOptionalGrade = (value: unknown): LetterGrade | null =>
  isBlank(value) ? null : toLetterGrade(value);

export const toSemester = (value: unknown): Semester =>
  parse(semesterSchema, value, raw => AcademicRecordErrors.incorrectValue('semester', raw));

export const toAcademicYear = (value: unknown): AcademicYear =>
  parse(academicYearSchema, value, raw => AcademicRecordErrors.incorrectValue('year', raw));

export const toAcademicRank = (value: unknown): AcademicRank =>
  parse(rankSchema, value, raw => AcademicRecordErrors.incorrectValue('rank', raw));

export const toStudentStatus = (value: unknown): StudentStatus =>
  parse(statusSchema, value, raw => AcademicRecordErrors.incorrectValue('status', raw));

export const toCredits = (value: unknown): Credits =>
  parse(creditsSchema, value, raw => AcademicRecordErrors.incorrectValue('credits', raw));

export const toCapacity = (value: unknown): Capacity =>
  parse(capacitySchema, value, raw => AcademicRecordErrors.incorrectValue('capacity', raw));

export const toAmount = (value: unknown, field: string): Amount =>
  parse(amountSchema, value, raw => AcademicRecordErrors.incorrectValue(field, raw));

export const toCreditTotal = (value: unknown): CreditTotal =>
  parse(creditTotalSchema, value, raw => AcademicRecordErrors.incorrectValue('totalCredits', raw));

export const toRecordId = (value: unknown, field: string = 'id'): RecordId =>
  parse(recordIdSchema, value, raw => AcademicRecordErrors.incorrectValue(field, raw));

export const toCourseCode = (value: unknown, field: string = 'courseId'): CourseCode =>
  parse(courseCodeSchema, value, raw => AcademicRecordErrors.incorrectValue(field, raw));

export const toSectionLabel = (value: unknown): SectionLabel =>
  parse(sectionLabelSchema, value, raw => AcademicRecordErrors.incorrectValue('sectionId', raw));

export const toText = (value: unknown, field: string, maxLength: number = 100): Text =>
  parse(textSchema(maxLength), value, raw => AcademicRecordErrors.incorrectValue(field, raw));

export const toOptionalText = (value: unknown, field: string, maxLength: number = 100): Text | null =>
  isBlank(value) ? null : toText(value, field, maxLength);

/** Calendar date of a clock reading, in UTC. */
export const todayIsoDate = (now: Date = new Date()): IsoDate => toIsoDate(now.toISOString().slice(0, 10));

// ---------------- composite inputs ----------------

export interface ValidSectionKey {
  courseId: CourseCode;
  sectionId: SectionLabel;
  semester: Semester;
  year: AcademicYear;
}

export interface ValidTakesKey extends ValidSectionKey {
  studentId: RecordId;
}

export interface DepartmentInput {
  name: Text;
  phone: Text | null;
  budget: Amount;
  building: Text | null;
  dean: Text | null;
}

export type DepartmentChangesInput = Partial<Omit<DepartmentInput, 'name'>>;

export interface StudentInput {
  firstName: Text;
  lastName: Text;
  departmentName: Text;
  major: Text | null;
  totalCredits: CreditTotal;
  email: Email;
  enrollmentDate: IsoDate;
  status: StudentStatus;
}

export type StudentChangesInput = Partial<StudentInput>;

export interface InstructorInput {
  firstName: Text;
  lastName: Text;
  departmentName: Text;
  rank: AcademicRank;
  salary: Amount;
  email: Email;
  hireDate: IsoDate;
  office: Text | null;
}

export type InstructorChangesInput = Partial<InstructorInput>;

export interface CourseInput {
  courseId: CourseCode;
  title: Text;
  credits: Credits;
  departmentName: Text;
  description: Text | null;
}

export type CourseChangesInput = Partial<Omit<CourseInput, 'courseId'>>;

export interface SectionInput extends ValidSectionKey {
  timeSlot: TimeSlot;
  room: Text | null;
  capacity: Capacity;
}

export interface SectionChangesInput {
  timeSlot?: TimeSlot;
  room?: Text | null;
  capacity?: Capacity;
}

/** Read a JSON object body or a route parameter map. */
export const toFields = (value: unknown): Record<string, unknown> =>
  parse(fieldsSchema, value, raw => AcademicRecordErrors.incorrectValue('body', raw));

const optional = <T>(
  fields: Record<string, unknown>,
  name: string,
  convert: (value: unknown) => T
): T | undefined => (fields[name] === undefined ? undefined : convert(fields[name]));

export const toSectionKey = (value: unknown): ValidSectionKey => {
  const fields = toFields(value);
  return {
    courseId: toCourseCode(fields.courseId),
    sectionId: toSectionLabel(fields.sectionId),
    semester: toSemester(fields.semester),
    year: toAcademicYear(fields.year)
  };
};

export const toTakesKey = (value: unknown): ValidTakesKey => {
  const fields = toFields(value);
  return { studentId: toRecordId(fields.studentId, 'studentId'), ...toSectionKey(fields) };
};

export const toDepartmentInput = (value: unknown): DepartmentInput => {
  const fields = toFields(value);
  return {
    name: toText(fields.name, 'name', 50),
    phone: toOptionalText(fields.phone, 'phone', 20),
    budget: toAmount(fields.budget ?? 0, 'budget'),
    building: toOptionalText(fields.building, 'building', 50),
    dean: toOptionalText(fields.dean, 'dean')
  };
};

export const toDepartmentChanges = (value: unknown): DepartmentChangesInput => {
  const fields = toFields(value);
  return {
    phone: optional(fields, 'phone', raw => toOptionalText(raw, 'phone', 20)),
    budget: optional(fields, 'budget', raw => toAmount(raw, 'budget')),
    building: optional(fields, 'building', raw => toOptionalText(raw, 'building', 50)),
    dean: optional(fields, 'dean', raw => toOptionalText(raw, 'dean'))
  };
};

export const toStudentInput = (value: unknown): StudentInput => {
  const fields = toFields(value);
  return {
    firstName: toText(fields.firstName, 'firstName', 25),
    lastName: toText(fields.lastName, 'lastName', 25),
    departmentName: toText(fields.departmentName, 'departmentName', 50),
    major: toOptionalText(fields.major, 'major'),
    totalCredits: toCreditTotal(fields.totalCredits ?? 0),
    email: toEmail(fields.email),
    enrollmentDate: toIsoDate(fields.enrollmentDate),
    status: toStudentStatus(fields.status ?? 'Active')
  };
};

export const toStudentChanges = (value: unknown): StudentChangesInput => {
  const fields = toFields(value);
  return {
    firstName: optional(fields, 'firstName', raw => toText(raw, 'firstName', 25)),
    lastName: optional(fields, 'lastName', raw => toText(raw, 'lastName', 25)),
    departmentName: optional(fields, 'departmentName', raw => toText(raw, 'departmentName', 50)),
    major: optional(fields, 'major', raw => toOptionalText(raw, 'major')),
    totalCredits: optional(fields, 'totalCredits', toCreditTotal),
    email: optional(fields, 'email', toEmail),
    enrollmentDate: optional(fields, 'enrollmentDate', toIsoDate),
    status: optional(fields, 'status', toStudentStatus)
  };
};

export const toInstructorInput = (value: unknown): InstructorInput => {
  const fields = toFields(value);
  return {
    firstName: toText(fields.firstName, 'firstName', 25),
    lastName: toText(fields.lastName, 'lastName', 25),
    departmentName: toText(fields.departmentName, 'departmentName', 50),
    rank: toAcademicRank(fields.rank),
    salary: toAmount(fields.salary, 'salary'),
    email: toEmail(fields.email),
    hireDate: toIsoDate(fields.hireDate),
    office: toOptionalText(fields.office, 'office', 20)
  };
};

export const toInstructorChanges = (value: unknown): InstructorChangesInput => {
  const fields = toFields(value);
  return {
    firstName: optional(fields, 'firstName', raw => toText(raw, 'firstName', 25)),
    lastName: optional(fields, 'lastName', raw => toText(raw, 'lastName', 25)),
    departmentName: optional(fields, 'departmentName', raw => toText(raw, 'departmentName', 50)),
    rank: optional(fields, 'rank', toAcademicRank),
    salary: optional(fields, 'salary', raw => toAmount(raw, 'salary')),
    email: optional(fields, 'email', toEmail),
    hireDate: optional(fields, 'hireDate', toIsoDate),
    office: optional(fields, 'office', raw => toOptionalText(raw, 'office', 20))
  };
};

export const toCourseInput = (value: unknown): CourseInput => {
  const fields = toFields(value);
  return {
    courseId: toCourseCode(fields.courseId),
    title: toText(fields.title, 'title'),
    credits: toCredits(fields.credits),
    departmentName: toText(fields.departmentName, 'departmentName', 50),
    description: toOptionalText(fields.description, 'description', 2000)
  };
};

export const toCourseChanges = (value: unknown): CourseChangesInput => {
  const fields = toFields(value);
  return {
    title: optional(fields, 'title', raw => toText(raw, 'title')),
    credits: optional(fields, 'credits', toCredits),
    departmentName: optional(fields, 'departmentName', raw => toText(raw, 'departmentName', 50)),
    description: optional(fields, 'description', raw => toOptionalText(raw, 'description', 2000))
  };
};

export const toSectionInput = (value: unknown): SectionInput => {
  const fields = toFields(value);
  return {
    ...toSectionKey(fields),
    timeSlot: toTimeSlot(fields.timeSlot),
    room: toOptionalText(fields.room, 'room', 15),
    capacity: toCapacity(fields.capacity)
  };
};

export const toSectionChanges = (value: unknown): SectionChangesInput => {
  const fields = toFields(value);
  return {
    timeSlot: optional(fields, 'timeSlot', toTimeSlot),
    room: optional(fields, 'room', raw => toOptionalText(raw, 'room', 15)),
    capacity: optional(fields, 'capacity', toCapacity)
  };
};
