// src/routes/attendance.routes.ts
import { Router } from 'express';
import * as attendanceController from '../controllers/attendance.controller';

/**
 * @swagger
 * tags:
 *   name: Attendance
 *   description: Attendance check-ins
 */

/**
 * @swagger
 * components:
 *   schemas:
 *     AttendanceInput:
 *       type: object
 *       required:
 *         - name
 *       properties:
 *         name:
 *           type: string
 *     Attendance:
 *       type: object
 *       properties:
 *         id:
 *           type: string
 *           readOnly: true
 *         name:
 *           type: string
 *         timestamp:
 *           type: string
 *           format: date-time
 *           readOnly: true
 */

const router = Router();

/**
 * @swagger
 * /api/attendance:
 *   post:
 *     summary: Record a check-in
 *     description: The timestamp is assigned by the server; any client value is ignored.
 *     tags: [Attendance]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/AttendanceInput'
 *     responses:
 *       200:
 *         description: Check-in recorded
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Attendance'
 *       400:
 *         description: Name is required
 *       422:
 *         description: Malformed request body
 *   get:
 *     summary: List check-ins, newest first
 *     tags: [Attendance]
 *     responses:
 *       200:
 *         description: All check-ins
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items:
 *                 $ref: '#/components/schemas/Attendance'
 */
router.post('/', attendanceController.markAttendance);
router.get('/', attendanceController.listAttendance);

export default router;
