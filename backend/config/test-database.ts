import { InMemoryAcademicStore } from '../persistence/InMemoryAcademicStore';
import { createServices, type AcademicServices } from '../services';
import {
  toCourseCode,
  toCourseInput,
  toDepartmentInput,
  toInstructorInput,
  toRecordId,
  toSectionInput,
  toSectionKey,
  toStudentInput,
  type RecordId,
  type ValidSectionKey,
  type ValidTakesKey
} from '../utils/validators';

/** Fixed clock so enrollment dates are predictable in tests. */
export const TEST_TODAY = '2025-08-25';
export const testClock = (): Date => new Date(`${TEST_TODAY}T12:00:00Z`);

export interface TestDatabase {
  store: InMemoryAcademicStore;
  services: AcademicServices;
}

export const connectTestDatabase = (): TestDatabase => {
  const store = new InMemoryAcademicStore();
  return { store, services: createServices(store, { clock: testClock }) };
};

export const clearTestDatabase = async (database: TestDatabase): Promise<void> => {
  await database.store.reset();
};

export const disconnectTestDatabase = async (database: TestDatabase): Promise<void> => {
  await database.store.close();
};

export interface AcademicFixtures {
  alice: RecordId;
  bob: RecordId;
  grace: RecordId;
  cs101Fall2024: ValidSectionKey;
  math101Fall2024: ValidSectionKey;
  cs201Fall2025: ValidSectionKey;
}

export const enrollmentKey = (studentId: RecordId, section: ValidSectionKey): ValidTakesKey => ({
  studentId,
  ...section
});

/**
 * Two departments, two students, one instructor and three courses where
 * CS201 requires CS101. CS201's Fall 2025 section holds two students.
 */
export const seedAcademicFixtures = async ({
  departments,
  students,
  instructors,
  courses,
  sections
}: AcademicServices): Promise<AcademicFixtures> => {
  await departments.createDepartment(toDepartmentInput({
    name: 'Comp. Sci.',
    phone: '555-0100',
    budget: 120000,
    building: 'Taylor',
    dean: 'Dean Rivera'
  }));
  await departments.createDepartment(toDepartmentInput({ name: 'Math', budget: 80000 }));

  const alice = await students.createStudent(toStudentInput({
    firstName: 'Alice',
    lastName: 'Nguyen',
    departmentName: 'Comp. Sci.',
    major: 'Computer Science',
    email: 'alice@university.edu',
    enrollmentDate: '2023-09-01'
  }));
  const bob = await students.createStudent(toStudentInput({
    firstName: 'Bob',
    lastName: 'Okafor',
    departmentName: 'Comp. Sci.',
    email: 'bob@university.edu',
    enrollmentDate: '2023-09-01'
  }));
  const grace = await instructors.createInstructor(toInstructorInput({
    firstName: 'Grace',
    lastName: 'Hopper',
    departmentName: 'Comp. Sci.',
    rank: 'Professor',
    salary: 95000,
    email: 'grace@university.edu',
    hireDate: '2010-07-01',
    office: 'T-210'
  }));

  await courses.createCourse(toCourseInput({
    courseId: 'CS101',
    title: 'Intro to Programming',
    credits: 3,
    departmentName: 'Comp. Sci.'
  }));
  await courses.createCourse(toCourseInput({
    courseId: 'CS201',
    title: 'Data Structures',
    credits: 4,
    departmentName: 'Comp. Sci.'
  }));
  await courses.createCourse(toCourseInput({
    courseId: 'MATH101',
    title: 'Calculus I',
    credits: 4,
    departmentName: 'Math'
  }));
  await courses.addPrerequisite(toCourseCode('CS201'), toCourseCode('CS101'));

  const cs101Fall2024 = toSectionKey({ courseId: 'CS101', sectionId: 'A', semester: 'Fall', year: 2024 });
  const math101Fall2024 = toSectionKey({ courseId: 'MATH101', sectionId: 'A', semester: 'Fall', year: 2024 });
  const cs201Fall2025 = toSectionKey({ courseId: 'CS201', sectionId: 'A', semester: 'Fall', year: 2025 });

  await sections.createSection(toSectionInput({ ...cs101Fall2024, timeSlot: 'MWF 09:00-09:50', room: 'T-101', capacity: 30 }));
  await sections.createSection(toSectionInput({ ...math101Fall2024, timeSlot: 'TTh 10:00-11:15', capacity: 30 }));
  await sections.createSection(toSectionInput({ ...cs201Fall2025, timeSlot: 'TTh 14:00-15:15', room: 'T-105', capacity: 2 }));

  return {
    alice: toRecordId(alice.id),
    bob: toRecordId(bob.id),
    grace: toRecordId(grace.id),
    cs101Fall2024,
    math101Fall2024,
    cs201Fall2025
  };
};
