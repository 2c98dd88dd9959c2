import type { AdvisingService } from '../services/AdvisingService';
import { asyncHandler } from '../middleware/errorHandling';
import { toFields, toIsoDate, toRecordId } from '../utils/validators';

export const createAdvisorController = (advising: AdvisingService) => ({
  getCurrentAdvisor: asyncHandler(async (req, res) => {
    const advisor = await advising.getCurrentAdvisor(toRecordId(req.params.studentId, 'studentId'));
    res.json({ advisor });
  }),

  getAdvisorHistory: asyncHandler(async (req, res) => {
    res.json(await advising.getAdvisorHistory(toRecordId(req.params.studentId, 'studentId')));
  }),

  assignAdvisor: asyncHandler(async (req, res) => {
    const body = toFields(req.body);
    const advisor = await advising.assignAdvisor(
      toRecordId(req.params.studentId, 'studentId'),
      toRecordId(body.instructorId, 'instructorId'),
      toIsoDate(body.startDate)
    );
    res.json(advisor);
  }),

  endAdvising: asyncHandler(async (req, res) => {
    const body = toFields(req.body);
    const advisor = await advising.endAdvising(
      toRecordId(req.params.studentId, 'studentId'),
      toIsoDate(body.endDate)
    );
    res.json(advisor);
  })
});
