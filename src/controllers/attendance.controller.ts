// src/controllers/attendance.controller.ts
import { Request, Response, NextFunction } from 'express';
import { requireStore } from '../lib/database';
import { sendValidationFailure } from '../lib/http.utils';
import {
  createAttendance,
  sortByTimestampDesc,
  toAttendanceView,
  validateAttendanceInput,
} from '../models/attendance.model';
import { ATTENDANCE_COLLECTION } from '../models/attendance.types';

// POST /api/attendance - Record a check-in stamped with the server clock
export const markAttendance = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = validateAttendanceInput(req.body);
    if (!result.ok) {
      return sendValidationFailure(res, result.failure);
    }

    const store = requireStore();
    const attendance = createAttendance(result.value);
    const id = await store.insert(ATTENDANCE_COLLECTION, attendance);

    return res.status(200).json({ id, name: attendance.name, timestamp: attendance.timestamp });
  } catch (error) {
    next(error);
  }
};

// GET /api/attendance - All check-ins, newest first
export const listAttendance = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const docs = await requireStore().query(ATTENDANCE_COLLECTION, {});
    return res.status(200).json(sortByTimestampDesc(docs.map(toAttendanceView)));
  } catch (error) {
    next(error);
  }
};
