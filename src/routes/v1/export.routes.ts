import { Router } from 'express';
import { exportCompany, exportAllCompanies } from '../../controllers/export.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';

const router = Router();

router.use(authenticate, authorizeRoles('admin', 'coordinator'));

/**
 * @swagger
 * /api/v1/exports/companies:
 *   get:
 *     tags: [Exports]
 *     summary: Export all companies, one sheet each
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Excel workbook. Companies with an invalid template are listed in the X-Export-Errors header as percent-encoded JSON
 *       404:
 *         description: No companies to export
 *       422:
 *         description: No company could be exported
 */
router.get('/companies', exportAllCompanies);

/**
 * @swagger
 * /api/v1/exports/companies/{id}:
 *   get:
 *     tags: [Exports]
 *     summary: Export one company's applicants
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Excel workbook
 *       422:
 *         description: Invalid export template
 */
router.get('/companies/:id', exportCompany);

export default router;
