import type { SectionKey, TakesKey, TeachesRecord } from '../types';

export const sectionKeyOf = (key: SectionKey): SectionKey => ({
  courseId: key.courseId,
  sectionId: key.sectionId,
  semester: key.semester,
  year: key.year
});

export const takesKeyOf = (key: TakesKey): TakesKey => ({
  studentId: key.studentId,
  ...sectionKeyOf(key)
});

export const teachesKeyOf = (row: TeachesRecord): TeachesRecord => ({
  instructorId: row.instructorId,
  ...sectionKeyOf(row)
});

/** Human-readable label, e.g. `CS101-A-Fall-2025`. */
export const describeSection = (key: SectionKey): string =>
  `${key.courseId}-${key.sectionId}-${key.semester}-${key.year}`;

export const describeTakes = (key: TakesKey): string =>
  `${key.studentId}-${describeSection(key)}`;

export const sameSection = (a: SectionKey, b: SectionKey): boolean =>
  a.courseId === b.courseId &&
  a.sectionId === b.sectionId &&
  a.semester === b.semester &&
  a.year === b.year;

/** Drop undefined members so a partial change never overwrites a stored field. */
export const compact = <T extends object>(value: T): Partial<T> => {
  const result: Partial<T> = {};
  for (const key in value) {
    const member = value[key];
    if (member !== undefined) {
      result[key] = member;
    }
  }
  return result;
};
