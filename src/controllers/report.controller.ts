import { Request, Response } from 'express';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { academicService } from '../services';

/**
 * @desc    Backlog audit trail across all students, newest first
 * @route   GET /api/v1/reports/backlog-history
 * @access  Private (Admin, Coordinator)
 */
export const getBacklogHistoryReport = asyncHandler(async (_req: Request, res: Response) => {
  const history = await academicService.getBacklogHistory();
  res.status(200).json(ApiResponse.success('Backlog history retrieved successfully', history, { total: history.length }));
});
