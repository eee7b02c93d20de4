import { Request, Response } from 'express';
import { asyncHandler } from '../utils/asyncHandler';
import { exportService } from '../services';
import { WorkbookExport } from '../services/export.service';
import { XLSX_MIME_TYPE } from '../utils/constants';

/**
 * Header values must stay ASCII, so the failure list travels
 * percent-encoded; clients read it with `decodeURIComponent`.
 */
export const encodeExportErrors = (failures: WorkbookExport['failures']): string =>
  encodeURIComponent(JSON.stringify(failures));

// Applications are stamped only after every header has been accepted.
const sendWorkbook = async (res: Response, workbook: WorkbookExport) => {
  res.setHeader('Content-Type', XLSX_MIME_TYPE);
  res.setHeader('Content-Disposition', `attachment; filename="${workbook.filename}"`);
  if (workbook.failures.length > 0) {
    res.setHeader('X-Export-Errors', encodeExportErrors(workbook.failures));
  }
  await exportService.markExported(workbook.applicationIds);
  res.status(200).send(workbook.buffer);
};

/**
 * @desc    Export one company's applicants as an Excel workbook
 * @route   GET /api/v1/exports/companies/:id
 * @access  Private (Admin, Coordinator)
 */
export const exportCompany = asyncHandler(async (req: Request, res: Response) => {
  await sendWorkbook(res, await exportService.exportCompany(req.params.id));
});

/**
 * @desc    Export every company, one sheet each. Companies that fail are listed in X-Export-Errors (percent-encoded JSON)
 * @route   GET /api/v1/exports/companies
 * @access  Private (Admin, Coordinator)
 */
export const exportAllCompanies = asyncHandler(async (_req: Request, res: Response) => {
  await sendWorkbook(res, await exportService.exportAllCompanies());
});
