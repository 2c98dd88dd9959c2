import type { DepartmentService } from '../services/DepartmentService';
import { asyncHandler } from '../middleware/errorHandling';
import { toDepartmentChanges, toDepartmentInput, toText } from '../utils/validators';

export const createDepartmentController = (departments: DepartmentService) => ({
  listDepartments: asyncHandler(async (_req, res) => {
    res.json(await departments.listDepartments());
  }),

  getDepartment: asyncHandler(async (req, res) => {
    res.json(await departments.getDepartment(toText(req.params.name, 'name', 50)));
  }),

  createDepartment: asyncHandler(async (req, res) => {
    const department = await departments.createDepartment(toDepartmentInput(req.body));
    res.status(201).json(department);
  }),

  updateDepartment: asyncHandler(async (req, res) => {
    const name = toText(req.params.name, 'name', 50);
    res.json(await departments.updateDepartment(name, toDepartmentChanges(req.body)));
  }),

  deleteDepartment: asyncHandler(async (req, res) => {
    await departments.deleteDepartment(toText(req.params.name, 'name', 50));
    res.status(204).end();
  })
});
