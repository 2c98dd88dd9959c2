import type { AcademicServices } from '../services';
import { asyncHandler } from '../middleware/errorHandling';
import {
  toCourseCode,
  toFields,
  toOptionalText,
  toRecordId,
  toStudentChanges,
  toStudentInput
} from '../utils/validators';

export const createStudentController = ({ students, grades, enrollments }: AcademicServices) => ({
  listStudents: asyncHandler(async (req, res) => {
    const query = toFields(req.query);
    const departmentName = toOptionalText(query.departmentName, 'departmentName', 50) ?? undefined;
    res.json(await students.listStudents(departmentName));
  }),

  getStudent: asyncHandler(async (req, res) => {
    res.json(await students.getStudent(toRecordId(req.params.id)));
  }),

  createStudent: asyncHandler(async (req, res) => {
    const student = await students.createStudent(toStudentInput(req.body));
    res.status(201).json(student);
  }),

  updateStudent: asyncHandler(async (req, res) => {
    res.json(await students.updateStudent(toRecordId(req.params.id), toStudentChanges(req.body)));
  }),

  deleteStudent: asyncHandler(async (req, res) => {
    await students.deleteStudent(toRecordId(req.params.id));
    res.status(204).end();
  }),

  getGpa: asyncHandler(async (req, res) => {
    res.json(await grades.calculateGPA(toRecordId(req.params.id)));
  }),

  getTranscript: asyncHandler(async (req, res) => {
    res.json(await grades.getTranscript(toRecordId(req.params.id)));
  }),

  listEnrollments: asyncHandler(async (req, res) => {
    res.json(await enrollments.listStudentEnrollments(toRecordId(req.params.id)));
  }),

  checkEligibility: asyncHandler(async (req, res) => {
    const studentId = toRecordId(req.params.id);
    res.json(await enrollments.checkEligibility(studentId, toCourseCode(req.params.courseId)));
  })
});
