import { Router } from 'express';
import authRoutes from './auth.routes';
import studentRoutes from './student.routes';
import companyRoutes from './company.routes';
import applicationRoutes from './application.routes';
import importRoutes from './import.routes';
import exportRoutes from './export.routes';
import reportRoutes from './report.routes';

const router = Router();

router.use('/auth', authRoutes);
router.use('/students', studentRoutes);
router.use('/companies', companyRoutes);
router.use('/applications', applicationRoutes);
router.use('/imports', importRoutes);
router.use('/exports', exportRoutes);
router.use('/reports', reportRoutes);

export default router;
