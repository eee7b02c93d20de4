import { Router } from 'express';
import { getBacklogHistoryReport } from '../../controllers/report.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';

const router = Router();

router.get('/backlog-history', authenticate, authorizeRoles('admin', 'coordinator'), getBacklogHistoryReport);

export default router;
