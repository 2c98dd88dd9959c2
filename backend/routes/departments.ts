import express, { type Router } from 'express';
import { createDepartmentController } from '../controllers/departmentController';
import type { AcademicServices } from '../services';

export default function departmentRoutes(services: AcademicServices): Router {
  const router = express.Router();
  const controller = createDepartmentController(services.departments);

  router.get('/', controller.listDepartments);
  router.post('/', controller.createDepartment);
  router.get('/:name', controller.getDepartment);
  router.patch('/:name', controller.updateDepartment);
  router.delete('/:name', controller.deleteDepartment);

  return router;
}
