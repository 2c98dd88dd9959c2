import express, { type Router } from 'express';
import { createSectionController } from '../controllers/sectionController';
import type { AcademicServices } from '../services';

const SECTION = '/:courseId/:sectionId/:semester/:year';

export default function sectionRoutes(services: AcademicServices): Router {
  const router = express.Router();
  const controller = createSectionController(services);

  router.get('/', controller.listSections);
  router.post('/', controller.createSection);
  router.get(SECTION, controller.getSection);
  router.patch(SECTION, controller.updateSection);
  router.delete(SECTION, controller.deleteSection);

  router.get(`${SECTION}/roster`, controller.listRoster);
  router.post(`${SECTION}/instructors`, controller.assignInstructor);
  router.delete(`${SECTION}/instructors/:instructorId`, controller.unassignInstructor);

  return router;
}
