import express, { type Router } from 'express';
import { createAdvisorController } from '../controllers/advisorController';
import type { AcademicServices } from '../services';

export default function advisorRoutes(services: AcademicServices): Router {
  const router = express.Router();
  const controller = createAdvisorController(services.advising);

  router.get('/:studentId', controller.getCurrentAdvisor);
  router.put('/:studentId', controller.assignAdvisor);
  router.post('/:studentId/end', controller.endAdvising);
  router.get('/:studentId/history', controller.getAdvisorHistory);

  return router;
}
