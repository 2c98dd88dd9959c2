import express, { type Router } from 'express';
import { createStudentController } from '../controllers/studentController';
import type { AcademicServices } from '../services';

export default function studentRoutes(services: AcademicServices): Router {
  const router = express.Router();
  const controller = createStudentController(services);

  router.get('/', controller.listStudents);
  router.post('/', controller.createStudent);
  router.get('/:id', controller.getStudent);
  router.patch('/:id', controller.updateStudent);
  router.delete('/:id', controller.deleteStudent);

  // Academic record
  router.get('/:id/gpa', controller.getGpa);
  router.get('/:id/transcript', controller.getTranscript);
  router.get('/:id/enrollments', controller.listEnrollments);
  router.get('/:id/eligibility/:courseId', controller.checkEligibility);

  return router;
}
