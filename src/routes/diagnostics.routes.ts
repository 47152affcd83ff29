// src/routes/diagnostics.routes.ts
import { Router } from 'express';
import * as diagnosticsController from '../controllers/diagnostics.controller';

const router = Router();

/**
 * @swagger
 * /:
 *   get:
 *     summary: Service health check
 *     tags: [Diagnostics]
 *     responses:
 *       200:
 *         description: Service is running
 */
router.get('/', diagnosticsController.healthCheck);

/**
 * @swagger
 * /test:
 *   get:
 *     summary: Database connectivity report
 *     description: Always 200; failures are described in the body.
 *     tags: [Diagnostics]
 *     responses:
 *       200:
 *         description: Diagnostics report
 */
router.get('/test', diagnosticsController.testDatabase);

export default router;
