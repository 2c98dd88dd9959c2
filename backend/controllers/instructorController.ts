import type { InstructorService } from '../services/InstructorService';
import { asyncHandler } from '../middleware/errorHandling';
import {
  toAcademicYear,
  toFields,
  toInstructorChanges,
  toInstructorInput,
  toOptionalText,
  toRecordId,
  toSemester
} from '../utils/validators';

export const createInstructorController = (instructors: InstructorService) => ({
  listInstructors: asyncHandler(async (req, res) => {
    const query = toFields(req.query);
    const departmentName = toOptionalText(query.departmentName, 'departmentName', 50) ?? undefined;
    res.json(await instructors.listInstructors(departmentName));
  }),

  getInstructor: asyncHandler(async (req, res) => {
    res.json(await instructors.getInstructor(toRecordId(req.params.id)));
  }),

  createInstructor: asyncHandler(async (req, res) => {
    const instructor = await instructors.createInstructor(toInstructorInput(req.body));
    res.status(201).json(instructor);
  }),

  updateInstructor: asyncHandler(async (req, res) => {
    res.json(await instructors.updateInstructor(toRecordId(req.params.id), toInstructorChanges(req.body)));
  }),

  deleteInstructor: asyncHandler(async (req, res) => {
    await instructors.deleteInstructor(toRecordId(req.params.id));
    res.status(204).end();
  }),

  getWorkload: asyncHandler(async (req, res) => {
    const query = toFields(req.query);
    const semester = query.semester === undefined ? undefined : toSemester(query.semester);
    const year = query.year === undefined ? undefined : toAcademicYear(query.year);
    res.json(await instructors.getWorkload(toRecordId(req.params.id), semester, year));
  })
});
