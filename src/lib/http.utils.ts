// src/lib/http.utils.ts
import { Response } from 'express';
import { ValidationFailure } from '../models/validation';

export const sendValidationFailure = (res: Response, failure: ValidationFailure) => {
  if (failure.kind === 'invalid-shape') {
    return res.status(422).json({ detail: failure.issues });
  }
  return res.status(failure.error.statusCode).json({ detail: failure.error.message });
};
