import type { EnrollmentService } from '../services/EnrollmentService';
import { asyncHandler } from '../middleware/errorHandling';
import { toFields, toOptionalGrade, toTakesKey } from '../utils/validators';

export const createEnrollmentController = (enrollments: EnrollmentService) => ({
  enroll: asyncHandler(async (req, res) => {
    const enrollment = await enrollments.enroll(toTakesKey(req.body));
    res.status(201).json(enrollment);
  }),

  getEnrollment: asyncHandler(async (req, res) => {
    res.json(await enrollments.getEnrollment(toTakesKey(req.params)));
  }),

  cancelEnrollment: asyncHandler(async (req, res) => {
    res.json(await enrollments.cancelEnrollment(toTakesKey(req.params)));
  }),

  /** `{ "grade": null }` clears a grade */
  assignGrade: asyncHandler(async (req, res) => {
    const key = toTakesKey(req.params);
    const grade = toOptionalGrade(toFields(req.body).grade);
    res.json(await enrollments.assignGrade(key, grade));
  })
});
