import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import {
  clearTestDatabase,
  connectTestDatabase,
  disconnectTestDatabase,
  enrollmentKey,
  seedAcademicFixtures,
  type AcademicFixtures,
  type TestDatabase
} from '../config/test-database';
import { PrerequisiteResolver, isPassingGrade } from '../services/PrerequisiteResolver';
import { toCourseCode } from '../utils/validators';

describe('PrerequisiteResolver', () => {
  const resolver = new PrerequisiteResolver();
  let db: TestDatabase;
  let fixtures: AcademicFixtures;

  beforeAll(() => {
    db = connectTestDatabase();
  });

  beforeEach(async () => {
    await clearTestDatabase(db);
    fixtures = await seedAcademicFixtures(db.services);
    await db.services.courses.addPrerequisite(toCourseCode('CS201'), toCourseCode('MATH101'));
  });

  afterAll(async () => {
    await disconnectTestDatabase(db);
  });

  it('should treat every recorded grade except F as passing', () => {
    expect(isPassingGrade('D')).toBe(true);
    expect(isPassingGrade('A+')).toBe(true);
    expect(isPassingGrade('F')).toBe(false);
    expect(isPassingGrade(null)).toBe(false);
  });

  it('should list all missing prerequisites in sorted order', async () => {
    const { alice } = fixtures;

    const missing = await db.store.withTransaction(tx => resolver.unmetPrerequisites(tx, alice, 'CS201'));

    expect(missing).toEqual(['CS101', 'MATH101']);
  });

  it('should drop a prerequisite once it is passed', async () => {
    const { alice, math101Fall2024 } = fixtures;
    const key = enrollmentKey(alice, math101Fall2024);
    await db.services.enrollments.enroll(key);
    await db.services.enrollments.assignGrade(key, 'D');

    const missing = await db.store.withTransaction(tx => resolver.unmetPrerequisites(tx, alice, 'CS201'));

    expect(missing).toEqual(['CS101']);
  });

  it('should only consult direct prerequisites', async () => {
    const { alice, math101Fall2024 } = fixtures;
    const key = enrollmentKey(alice, math101Fall2024);
    await db.services.enrollments.enroll(key);
    await db.services.enrollments.assignGrade(key, 'B');
    await db.services.courses.removePrerequisite(toCourseCode('CS201'), toCourseCode('CS101'));
    await db.services.courses.addPrerequisite(toCourseCode('MATH101'), toCourseCode('CS101'));

    // CS201 -> MATH101 -> CS101: only MATH101 is checked for CS201
    const eligible = await db.store.withTransaction(tx => resolver.isEligible(tx, alice, 'CS201'));
    const missing = await db.store.withTransaction(tx => resolver.unmetPrerequisites(tx, alice, 'MATH101'));

    expect(eligible).toBe(true);
    expect(missing).toEqual(['CS101']);
  });

  it('should detect an edge that would close a cycle', async () => {
    const cycle = await db.store.withTransaction(tx => resolver.wouldCreateCycle(tx, 'MATH101', 'CS201'));
    const acyclic = await db.store.withTransaction(tx => resolver.wouldCreateCycle(tx, 'CS101', 'MATH101'));

    expect(cycle).toBe(true);
    expect(acyclic).toBe(false);
  });

  it('should require nothing of a course without prerequisites', async () => {
    const { bob } = fixtures;

    expect(await db.store.withTransaction(tx => resolver.isEligible(tx, bob, 'CS101'))).toBe(true);
  });
});
