// src/models/umkm.model.ts
import { z } from 'zod';
import { StoredDocument } from '../lib/storage/document.store';
import { Umkm, UmkmInput, UmkmView } from './umkm.types';
import { stringOrNull, stringifyId } from './document.utils';
import { ValidationResult, blankField, parseShape } from './validation';

export const UMKM_REQUIRED_MESSAGE = 'Name, contact, and description are required';

const umkmInputSchema = z.object({
  name: z.string(),
  contact: z.string(),
  description: z.string(),
  social: z.string().nullish(),
});

/** Validates a register-UMKM body and returns the normalized record to persist. */
export const validateUmkmInput = (body: unknown): ValidationResult<Umkm> => {
  const shape = parseShape(umkmInputSchema, body);
  if (!shape.ok) {
    return shape;
  }

  const input: UmkmInput = shape.value;
  const name = input.name.trim();
  const contact = input.contact.trim();
  const description = input.description.trim();
  if (!name || !contact || !description) {
    return blankField(UMKM_REQUIRED_MESSAGE);
  }

  return {
    ok: true,
    value: {
      name,
      contact,
      description,
      social: input.social ? input.social.trim() : null,
    },
  };
};

export const toUmkmView = (doc: StoredDocument): UmkmView => ({
  id: stringifyId(doc._id),
  name: stringOrNull(doc.name),
  contact: stringOrNull(doc.contact),
  description: stringOrNull(doc.description),
  social: stringOrNull(doc.social),
});

// Alphabetical, case-insensitive. Missing names compare as ''.
export const sortByName = (views: UmkmView[]): UmkmView[] =>
  [...views].sort((a, b) => {
    const left = (a.name ?? '').toLowerCase();
    const right = (b.name ?? '').toLowerCase();
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });
