import type { CourseService } from '../services/CourseService';
import { asyncHandler } from '../middleware/errorHandling';
import {
  toCourseChanges,
  toCourseCode,
  toCourseInput,
  toFields,
  toOptionalText
} from '../utils/validators';

export const createCourseController = (courses: CourseService) => ({
  listCourses: asyncHandler(async (req, res) => {
    const query = toFields(req.query);
    const departmentName = toOptionalText(query.departmentName, 'departmentName', 50) ?? undefined;
    res.json(await courses.listCourses(departmentName));
  }),

  getCourse: asyncHandler(async (req, res) => {
    res.json(await courses.getCourse(toCourseCode(req.params.courseId)));
  }),

  createCourse: asyncHandler(async (req, res) => {
    const course = await courses.createCourse(toCourseInput(req.body));
    res.status(201).json(course);
  }),

  updateCourse: asyncHandler(async (req, res) => {
    res.json(await courses.updateCourse(toCourseCode(req.params.courseId), toCourseChanges(req.body)));
  }),

  deleteCourse: asyncHandler(async (req, res) => {
    await courses.deleteCourse(toCourseCode(req.params.courseId));
    res.status(204).end();
  }),

  listPrerequisites: asyncHandler(async (req, res) => {
    res.json(await courses.listPrerequisites(toCourseCode(req.params.courseId)));
  }),

  addPrerequisite: asyncHandler(async (req, res) => {
    const body = toFields(req.body);
    const edge = await courses.addPrerequisite(
      toCourseCode(req.params.courseId),
      toCourseCode(body.prereqId, 'prereqId')
    );
    res.status(201).json(edge);
  }),

  removePrerequisite: asyncHandler(async (req, res) => {
    await courses.removePrerequisite(
      toCourseCode(req.params.courseId),
      toCourseCode(req.params.prereqId, 'prereqId')
    );
    res.status(204).end();
  })
});
