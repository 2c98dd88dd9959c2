import type { AcademicStore } from '../persistence/AcademicStore';
import { AdvisingService } from './AdvisingService';
import { CourseService } from './CourseService';
import { DepartmentService } from './DepartmentService';
import { EnrollmentService } from './EnrollmentService';
import { GradeService } from './GradeService';
import { InstructorService } from './InstructorService';
import { PrerequisiteResolver } from './PrerequisiteResolver';
import { SectionService } from './SectionService';
import { StudentService } from './StudentService';

export interface AcademicServices {
  departments: DepartmentService;
  students: StudentService;
  instructors: InstructorService;
  courses: CourseService;
  sections: SectionService;
  enrollments: EnrollmentService;
  grades: GradeService;
  advising: AdvisingService;
}

export interface ServiceOptions {
  clock?: () => Date;
}

/**
 * Wire every service to one store
 */
export const createServices = (store: AcademicStore, options: ServiceOptions = {}): AcademicServices => {
  const resolver = new PrerequisiteResolver();
  return {
    departments: new DepartmentService(store),
    students: new StudentService(store),
    instructors: new InstructorService(store),
    courses: new CourseService(store, resolver),
    sections: new SectionService(store),
    enrollments: new EnrollmentService(store, resolver, options.clock),
    grades: new GradeService(store),
    advising: new AdvisingService(store)
  };
};
