// src/controllers/diagnostics.controller.ts
import { Request, Response } from 'express';
import { getDatabase } from '../lib/database';
import { checkDatabase, renderFailure, renderReport } from '../lib/diagnostics';

// GET / - Static confirmation, no storage access
export const healthCheck = (req: Request, res: Response) => {
  res.status(200).json({ message: 'UMKM & Attendance API is running' });
};

// GET /test - Database connectivity report. Always answers 200.
export const testDatabase = async (req: Request, res: Response) => {
  try {
    const status = await checkDatabase(getDatabase());
    res.status(200).json(renderReport(status));
  } catch (error) {
    res.status(200).json(renderFailure(error));
  }
};
