// src/controllers/umkm.controller.ts
import { Request, Response, NextFunction } from 'express';
import { requireStore } from '../lib/database';
import { sendValidationFailure } from '../lib/http.utils';
import { sortByName, toUmkmView, validateUmkmInput } from '../models/umkm.model';
import { UMKM_COLLECTION } from '../models/umkm.types';

// POST /api/umkm - Register a business
export const registerUmkm = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = validateUmkmInput(req.body);
    if (!result.ok) {
      return sendValidationFailure(res, result.failure);
    }

    const umkm = result.value;
    const id = await requireStore().insert(UMKM_COLLECTION, umkm);

    return res.status(200).json({ id, ...umkm });
  } catch (error) {
    next(error);
  }
};

// GET /api/umkm - All registrations, alphabetical by name
export const listUmkm = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const docs = await requireStore().query(UMKM_COLLECTION, {});
    return res.status(200).json(sortByName(docs.map(toUmkmView)));
  } catch (error) {
    next(error);
  }
};
