import { Request, Response } from 'express';
import { ApiError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { applicationService } from '../services';
import { isStaff } from '../middleware/role.middleware';
import { ApplicationFilter } from '../repositories/placement.repository';
import { ApplyBody, StatusUpdateBody } from '../validators/application.validator';

/**
 * @desc    List applications. Students only see their own
 * @route   GET /api/v1/applications
 * @access  Private
 */
export const listApplications = asyncHandler(async (req: Request, res: Response) => {
  if (!req.user) throw ApiError.unauthorized('Authentication required');

  const filter: ApplicationFilter = {};
  if (typeof req.query.companyId === 'string') filter.companyId = req.query.companyId;
  if (isStaff(req.user)) {
    if (typeof req.query.studentId === 'string') filter.studentId = req.query.studentId;
  } else {
    if (!req.user.studentId) throw ApiError.forbidden('No student record is linked to this account');
    filter.studentId = req.user.studentId;
  }

  const applications = await applicationService.listApplications(filter);
  res
    .status(200)
    .json(ApiResponse.success('Applications retrieved successfully', applications, { total: applications.length }));
});

/**
 * @desc    Apply to a company
 * @route   POST /api/v1/applications
 * @access  Private (students for themselves; staff on behalf of a student)
 */
export const applyToCompany = asyncHandler(async (req: Request, res: Response) => {
  if (!req.user) throw ApiError.unauthorized('Authentication required');
  const { companyId, studentId }: ApplyBody = req.body;

  const applicantId = isStaff(req.user) ? studentId : req.user.studentId;
  if (!applicantId) {
    throw ApiError.badRequest(isStaff(req.user) ? 'studentId is required' : 'No student record is linked to this account');
  }

  const application = await applicationService.apply(applicantId, companyId);
  res.status(201).json(ApiResponse.success('Application submitted successfully', application));
});

/**
 * @desc    Change an application's status, applying the selection policy
 * @route   PUT /api/v1/applications/:id/status
 * @access  Private (Admin, Coordinator)
 */
export const updateApplicationStatus = asyncHandler(async (req: Request, res: Response) => {
  if (!req.user) throw ApiError.unauthorized('Authentication required');
  const { status }: StatusUpdateBody = req.body;

  const result = await applicationService.updateStatus(req.params.id, status, req.user.email);
  res.status(200).json(ApiResponse.success('Application status updated successfully', result));
});
