// src/models/document.utils.ts
// Helpers for turning loosely-typed stored documents into response fields.

export const stringifyId = (id: unknown): string => (id === undefined || id === null ? '' : String(id));

export const stringOrNull = (value: unknown): string | null => (typeof value === 'string' ? value : null);

/** Renders a stored date (Date or pre-formatted string) as ISO-8601, or null. */
export const toIsoString = (value: unknown): string | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  return null;
};
