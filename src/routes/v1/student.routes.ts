import { Router } from 'express';
import {
  listStudents,
  createStudent,
  getStudent,
  updateResumeLink,
  updateEligibilityStatus,
  updateBacklog,
  getBacklogHistory,
} from '../../controllers/student.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles, authorizeStudentAccess } from '../../middleware/role.middleware';
import { validate } from '../../middleware/validate.middleware';
import {
  backlogUpdateSchema,
  createStudentSchema,
  eligibilityStatusSchema,
  resumeLinkSchema,
} from '../../validators/student.validator';

const router = Router();

router.use(authenticate);

/**
 * @swagger
 * /api/v1/students:
 *   get:
 *     tags: [Students]
 *     summary: List students
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: query
 *         name: branch
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Students retrieved successfully
 *   post:
 *     tags: [Students]
 *     summary: Create a student
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       201:
 *         description: Student created successfully
 *       409:
 *         description: Roll number already exists
 */
router.get('/', authorizeRoles('admin', 'coordinator'), listStudents);
router.post('/', authorizeRoles('admin', 'coordinator'), validate(createStudentSchema), createStudent);

/**
 * @swagger
 * /api/v1/students/{id}:
 *   get:
 *     tags: [Students]
 *     summary: Get a student with semester records
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Student retrieved successfully
 */
router.get('/:id', authorizeStudentAccess, getStudent);

router.put('/:id/resume-link', authorizeStudentAccess, validate(resumeLinkSchema), updateResumeLink);

/**
 * @swagger
 * /api/v1/students/{id}/eligibility-status:
 *   put:
 *     tags: [Students]
 *     summary: Set eligibility status
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
 *                 enum: [ELIGIBLE, EXTERNAL_INTERN, CAMPUS_INTERN, EXTERNAL_PLACED, BLOCKED_BY_POLICY]
 *               note:
 *                 type: string
 *     responses:
 *       200:
 *         description: Eligibility status updated successfully
 */
router.put(
  '/:id/eligibility-status',
  authorizeRoles('admin', 'coordinator'),
  validate(eligibilityStatusSchema),
  updateEligibilityStatus
);

/**
 * @swagger
 * /api/v1/students/{id}/backlog:
 *   put:
 *     tags: [Students]
 *     summary: Edit one semester's backlog count
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - semesterNo
 *               - backlogCount
 *             properties:
 *               semesterNo:
 *                 type: integer
 *               backlogCount:
 *                 type: integer
 *               note:
 *                 type: string
 *     responses:
 *       200:
 *         description: Backlog updated successfully
 *       404:
 *         description: Semester record not found
 */
router.put('/:id/backlog', authorizeRoles('admin', 'coordinator'), validate(backlogUpdateSchema), updateBacklog);

router.get('/:id/backlog-history', authorizeStudentAccess, getBacklogHistory);

export default router;
