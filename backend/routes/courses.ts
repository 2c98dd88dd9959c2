import express, { type Router } from 'express';
import { createCourseController } from '../controllers/courseController';
import type { AcademicServices } from '../services';

export default function courseRoutes(services: AcademicServices): Router {
  const router = express.Router();
  const controller = createCourseController(services.courses);

  router.get('/', controller.listCourses);
  router.post('/', controller.createCourse);
  router.get('/:courseId', controller.getCourse);
  router.patch('/:courseId', controller.updateCourse);
  router.delete('/:courseId', controller.deleteCourse);

  // Prerequisite graph
  router.get('/:courseId/prerequisites', controller.listPrerequisites);
  router.post('/:courseId/prerequisites', controller.addPrerequisite);
  router.delete('/:courseId/prerequisites/:prereqId', controller.removePrerequisite);

  return router;
}
