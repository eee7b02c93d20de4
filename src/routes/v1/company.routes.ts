import { Router } from 'express';
import {
  listCompanies,
  getCompany,
  createCompany,
  updateCompany,
  getExportFields,
} from '../../controllers/company.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';
import { validate } from '../../middleware/validate.middleware';
import { createCompanySchema, updateCompanySchema } from '../../validators/company.validator';

const router = Router();

router.use(authenticate);

/**
 * @swagger
 * /api/v1/companies/export-fields:
 *   get:
 *     tags: [Companies]
 *     summary: Source keys usable in export templates
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Export fields retrieved successfully
 */
router.get('/export-fields', getExportFields);

/**
 * @swagger
 * /api/v1/companies:
 *   get:
 *     tags: [Companies]
 *     summary: List companies
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Companies retrieved successfully
 *   post:
 *     tags: [Companies]
 *     summary: Create a company
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - name
 *             properties:
 *               name:
 *                 type: string
 *               eligibleBranches:
 *                 type: array
 *                 items:
 *                   type: string
 *               minCgpa:
 *                 type: number
 *               maxBacklogs:
 *                 type: integer
 *               selectionPolicy:
 *                 type: string
 *                 enum: [BLOCKING, NON_BLOCKING]
 *               exportTemplate:
 *                 type: array
 *                 items:
 *                   type: object
 *                   properties:
 *                     header:
 *                       type: string
 *                     source:
 *                       type: string
 *     responses:
 *       201:
 *         description: Company created successfully
 *       400:
 *         description: Invalid export template
 */
router.get('/', listCompanies);
router.post('/', authorizeRoles('admin', 'coordinator'), validate(createCompanySchema), createCompany);

router.get('/:id', getCompany);
router.put('/:id', authorizeRoles('admin', 'coordinator'), validate(updateCompanySchema), updateCompany);

export default router;
