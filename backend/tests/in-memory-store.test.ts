import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryAcademicStore } from '../persistence/InMemoryAcademicStore';
import { ConstraintViolationError } from '../persistence/constraints';
import type { StoreTransaction } from '../persistence/AcademicStore';
import type { SectionRecord } from '../types';

const physics = { name: 'Physics', phone: null, budget: 1000, building: 'Hall', dean: null };

const section = (overrides: Partial<SectionRecord>): SectionRecord => ({
  courseId: 'PHY100',
  sectionId: 'A',
  semester: 'Fall',
  year: 2024,
  timeSlot: 'MWF 10:00-10:50',
  room: null,
  capacity: 1,
  enrolled: 0,
  ...overrides
});

const seedCourse = async (tx: StoreTransaction): Promise<void> => {
  await tx.insertDepartment(physics);
  await tx.insertCourse({
    courseId: 'PHY100',
    title: 'Mechanics',
    credits: 4,
    departmentName: 'Physics',
    description: null
  });
};

describe('InMemoryAcademicStore', () => {
  let store: InMemoryAcademicStore;

  beforeEach(() => {
    store = new InMemoryAcademicStore();
  });

  it('should discard every write of a failed transaction', async () => {
    await expect(
      store.withTransaction(async tx => {
        await tx.insertDepartment(physics);
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await store.withTransaction(tx => tx.findDepartment('Physics'))).toBeNull();
  });

  it('should keep the writes of a committed transaction', async () => {
    await store.withTransaction(tx => tx.insertDepartment(physics));

    expect(await store.withTransaction(tx => tx.findDepartment('Physics'))).toEqual(physics);
  });

  it('should hand out copies of stored rows', async () => {
    await store.withTransaction(tx => tx.insertDepartment(physics));

    const row = await store.withTransaction(tx => tx.findDepartment('Physics'));
    if (row) row.budget = 5;

    expect((await store.withTransaction(tx => tx.findDepartment('Physics')))?.budget).toBe(1000);
  });

  it('should leave fields untouched when a change is undefined', async () => {
    await store.withTransaction(tx => tx.insertDepartment(physics));

    const updated = await store.withTransaction(tx =>
      tx.updateDepartment('Physics', { budget: undefined, dean: 'Dr. Noether' })
    );

    expect(updated).toEqual({ ...physics, dean: 'Dr. Noether' });
  });

  it('should raise named constraint violations', async () => {
    await store.withTransaction(tx => tx.insertDepartment(physics));

    const duplicate = store.withTransaction(tx => tx.insertDepartment(physics));
    await expect(duplicate).rejects.toBeInstanceOf(ConstraintViolationError);
    await expect(duplicate).rejects.toMatchObject({ kind: 'unique', table: 'department', constraint: 'department_pkey' });

    await expect(
      store.withTransaction(tx => tx.insertDepartment({ ...physics, name: 'Chemistry', budget: -1 }))
    ).rejects.toMatchObject({ kind: 'check', constraint: 'budget_non_negative' });

    await expect(
      store.withTransaction(tx =>
        tx.insertCourse({ courseId: 'BIO1', title: 'Cells', credits: 3, departmentName: 'Biology', description: null })
      )
    ).rejects.toMatchObject({ kind: 'foreignKey', constraint: 'course_department_fkey' });
  });

  it('should refuse to move enrolled past capacity or below zero', async () => {
    await store.withTransaction(async tx => {
      await seedCourse(tx);
      await tx.insertSection(section({}));
    });
    const key = section({});

    expect(await store.withTransaction(tx => tx.adjustEnrolled(key, -1))).toBeNull();
    expect((await store.withTransaction(tx => tx.adjustEnrolled(key, 1)))?.enrolled).toBe(1);
    expect(await store.withTransaction(tx => tx.adjustEnrolled(key, 1))).toBeNull();
    expect((await store.withTransaction(tx => tx.findSection(key)))?.enrolled).toBe(1);
  });

  it('should list sections by year, semester, course and section', async () => {
    await store.withTransaction(async tx => {
      await seedCourse(tx);
      await tx.insertSection(section({ sectionId: 'X', semester: 'Winter' }));
      await tx.insertSection(section({ sectionId: 'B' }));
      await tx.insertSection(section({ sectionId: 'A' }));
      await tx.insertSection(section({ sectionId: 'A', semester: 'Spring', year: 2023 }));
    });

    const rows = await store.withTransaction(tx => tx.listSections());

    expect(rows.map(row => `${row.year} ${row.semester} ${row.sectionId}`)).toEqual([
      '2023 Spring A',
      '2024 Fall A',
      '2024 Fall B',
      '2024 Winter X'
    ]);
  });

  it('should run transactions one at a time', async () => {
    const order: string[] = [];

    await Promise.all([
      store.withTransaction(async tx => {
        order.push('first:start');
        await tx.insertDepartment(physics);
        await new Promise(resolve => setTimeout(resolve, 10));
        order.push('first:end');
      }),
      store.withTransaction(async tx => {
        order.push('second:start');
        expect(await tx.findDepartment('Physics')).toEqual(physics);
        order.push('second:end');
      })
    ]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should reject work after close and clear data on reset', async () => {
    await store.withTransaction(tx => tx.insertDepartment(physics));
    await store.reset();
    expect(await store.withTransaction(tx => tx.listDepartments())).toEqual([]);

    await store.close();
    await expect(store.withTransaction(tx => tx.listDepartments())).rejects.toThrow('Store is closed');
  });
});
