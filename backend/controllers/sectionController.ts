import type { AcademicServices } from '../services';
import type { SectionFilter } from '../persistence/AcademicStore';
import { asyncHandler } from '../middleware/errorHandling';
import {
  toAcademicYear,
  toCourseCode,
  toFields,
  toRecordId,
  toSectionChanges,
  toSectionInput,
  toSectionKey,
  toSemester
} from '../utils/validators';

export const createSectionController = ({ sections, enrollments }: AcademicServices) => ({
  listSections: asyncHandler(async (req, res) => {
    const query = toFields(req.query);
    const filter: SectionFilter = {
      courseId: query.courseId === undefined ? undefined : toCourseCode(query.courseId),
      semester: query.semester === undefined ? undefined : toSemester(query.semester),
      year: query.year === undefined ? undefined : toAcademicYear(query.year)
    };
    res.json(await sections.listSections(filter));
  }),

  getSection: asyncHandler(async (req, res) => {
    res.json(await sections.getSection(toSectionKey(req.params)));
  }),

  createSection: asyncHandler(async (req, res) => {
    const section = await sections.createSection(toSectionInput(req.body));
    res.status(201).json(section);
  }),

  updateSection: asyncHandler(async (req, res) => {
    res.json(await sections.updateSection(toSectionKey(req.params), toSectionChanges(req.body)));
  }),

  deleteSection: asyncHandler(async (req, res) => {
    await sections.deleteSection(toSectionKey(req.params));
    res.status(204).end();
  }),

  listRoster: asyncHandler(async (req, res) => {
    res.json(await enrollments.listRoster(toSectionKey(req.params)));
  }),

  assignInstructor: asyncHandler(async (req, res) => {
    const body = toFields(req.body);
    const teaches = await enrollments.assignInstructor(
      toRecordId(body.instructorId, 'instructorId'),
      toSectionKey(req.params)
    );
    res.status(201).json(teaches);
  }),

  unassignInstructor: asyncHandler(async (req, res) => {
    await enrollments.unassignInstructor(
      toRecordId(req.params.instructorId, 'instructorId'),
      toSectionKey(req.params)
    );
    res.status(204).end();
  })
});
