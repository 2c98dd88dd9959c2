import express, { type Router } from 'express';
import { createInstructorController } from '../controllers/instructorController';
import type { AcademicServices } from '../services';

export default function instructorRoutes(services: AcademicServices): Router {
  const router = express.Router();
  const controller = createInstructorController(services.instructors);

  router.get('/', controller.listInstructors);
  router.post('/', controller.createInstructor);
  router.get('/:id', controller.getInstructor);
  router.patch('/:id', controller.updateInstructor);
  router.delete('/:id', controller.deleteInstructor);
  router.get('/:id/workload', controller.getWorkload);

  return router;
}
