// src/routes/index.ts
import { Router } from 'express';
import attendanceRoutes from './attendance.routes';
import umkmRoutes from './umkm.routes';

const router = Router();

router.use('/attendance', attendanceRoutes);
router.use('/umkm', umkmRoutes);

export default router;
