import { Router } from 'express';
import { importSemesterResults } from '../../controllers/import.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';
import { handleUploadError, uploadResultPdf } from '../../middleware/upload.middleware';
import { validate } from '../../middleware/validate.middleware';
import { sgpaImportSchema } from '../../validators/import.validator';

const router = Router();

/**
 * @swagger
 * /api/v1/imports/sgpa:
 *   post:
 *     tags: [Imports]
 *     summary: Import a semester result sheet
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         multipart/form-data:
 *           schema:
 *             type: object
 *             required:
 *               - file
 *               - semesterNo
 *               - branch
 *             properties:
 *               file:
 *                 type: string
 *                 format: binary
 *               semesterNo:
 *                 type: integer
 *               branch:
 *                 type: string
 *               semesterCredits:
 *                 type: number
 *     responses:
 *       200:
 *         description: Import summary
 *       400:
 *         description: No usable rows, or missing semester credits
 */
router.post(
  '/sgpa',
  authenticate,
  authorizeRoles('admin', 'coordinator'),
  uploadResultPdf,
  handleUploadError,
  validate(sgpaImportSchema),
  importSemesterResults
);

export default router;
