import { Router } from 'express';
import {
  listApplications,
  applyToCompany,
  updateApplicationStatus,
} from '../../controllers/application.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';
import { validate } from '../../middleware/validate.middleware';
import { applySchema, statusUpdateSchema } from '../../validators/application.validator';

const router = Router();

router.use(authenticate);

router.get('/', listApplications);
router.post('/', validate(applySchema), applyToCompany);

/**
 * @swagger
 * /api/v1/applications/{id}/status:
 *   put:
 *     tags: [Applications]
 *     summary: Change an application's status
 *     description: Selecting a student in a BLOCKING company closes their other open applications and blocks new ones.
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - status
 *             properties:
 *               status:
 *                 type: string
 *                 enum: [APPLIED, SHORTLISTED, INTERVIEW, SELECTED, REJECTED]
 *     responses:
 *       200:
 *         description: Application status updated successfully
 *       409:
 *         description: Student already selected in another blocking company
 */
router.put(
  '/:id/status',
  authorizeRoles('admin', 'coordinator'),
  validate(statusUpdateSchema),
  updateApplicationStatus
);

export default router;
