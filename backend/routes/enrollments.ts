import express, { type Router } from 'express';
import { createEnrollmentController } from '../controllers/enrollmentController';
import type { AcademicServices } from '../services';

const ENROLLMENT = '/:studentId/:courseId/:sectionId/:semester/:year';

export default function enrollmentRoutes(services: AcademicServices): Router {
  const router = express.Router();
  const controller = createEnrollmentController(services.enrollments);

  router.post('/', controller.enroll);
  router.get(ENROLLMENT, controller.getEnrollment);
  router.post(`${ENROLLMENT}/cancel`, controller.cancelEnrollment);
  router.put(`${ENROLLMENT}/grade`, controller.assignGrade);

  return router;
}
