import { Request, Response } from 'express';
import { ApiError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { academicService } from '../services';
import { SgpaImportBody } from '../validators/import.validator';

/**
 * @desc    Import a semester result sheet (PDF) and recompute CGPA and backlogs
 * @route   POST /api/v1/imports/sgpa
 * @access  Private (Admin, Coordinator)
 */
export const importSemesterResults = asyncHandler(async (req: Request, res: Response) => {
  if (!req.user) throw ApiError.unauthorized('Authentication required');
  if (!req.file) throw ApiError.badRequest('A PDF file is required');

  const { semesterNo, branch, semesterCredits }: SgpaImportBody = req.body;
  const summary = await academicService.importSemesterResults({
    filePath: req.file.path,
    sourceFile: req.file.originalname,
    semesterNo,
    branch,
    ...(semesterCredits !== undefined && { semesterCredits }),
    actor: req.user.email,
  });

  res.status(200).json(ApiResponse.success('Semester results imported successfully', summary));
});
