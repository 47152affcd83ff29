// src/routes/umkm.routes.ts
import { Router } from 'express';
import * as umkmController from '../controllers/umkm.controller';

/**
 * @swagger
 * tags:
 *   name: UMKM
 *   description: Small business registrations
 */

/**
 * @swagger
 * components:
 *   schemas:
 *     UmkmInput:
 *       type: object
 *       required:
 *         - name
 *         - contact
 *         - description
 *       properties:
 *         name:
 *           type: string
 *         contact:
 *           type: string
 *         description:
 *           type: string
 *         social:
 *           type: string
 *           nullable: true
 *     Umkm:
 *       allOf:
 *         - $ref: '#/components/schemas/UmkmInput'
 *         - type: object
 *           properties:
 *             id:
 *               type: string
 *               readOnly: true
 */

const router = Router();

/**
 * @swagger
 * /api/umkm:
 *   post:
 *     summary: Register a business
 *     tags: [UMKM]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/UmkmInput'
 *     responses:
 *       200:
 *         description: Business registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Umkm'
 *       400:
 *         description: Name, contact, and description are required
 *       422:
 *         description: Malformed request body
 *   get:
 *     summary: List businesses alphabetically
 *     tags: [UMKM]
 *     responses:
 *       200:
 *         description: All registered businesses
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items:
 *                 $ref: '#/components/schemas/Umkm'
 */
router.post('/', umkmController.registerUmkm);
router.get('/', umkmController.listUmkm);

export default router;
