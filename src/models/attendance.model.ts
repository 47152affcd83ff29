// src/models/attendance.model.ts
import { z } from 'zod';
import { StoredDocument } from '../lib/storage/document.store';
import { Attendance, AttendanceInput, AttendanceView } from './attendance.types';
import { stringOrNull, stringifyId, toIsoString } from './document.utils';
import { ValidationResult, blankField, parseShape } from './validation';

export const NAME_REQUIRED_MESSAGE = 'Name is required';

const attendanceInputSchema = z.object({
  name: z.string(),
});

/**
 * Validates a create-attendance body and returns the trimmed input.
 * Any client-supplied timestamp is dropped.
 */
export const validateAttendanceInput = (body: unknown): ValidationResult<AttendanceInput> => {
  const shape = parseShape(attendanceInputSchema, body);
  if (!shape.ok) {
    return shape;
  }

  const name = shape.value.name.trim();
  if (!name) {
    return blankField(NAME_REQUIRED_MESSAGE);
  }
  return { ok: true, value: { name } };
};

export const createAttendance = (input: AttendanceInput, now: Date = new Date(Date.now())): Attendance => ({
  name: input.name,
  timestamp: now.toISOString(),
});

/**
 * Projects a stored document into the response shape. Documents written
 * without a `timestamp` fall back to their `created_at` stamp.
 */
export const toAttendanceView = (doc: StoredDocument): AttendanceView => ({
  id: stringifyId(doc._id),
  name: stringOrNull(doc.name),
  timestamp: toIsoString(doc.timestamp) ?? toIsoString(doc.created_at),
});

// Newest first; ISO-8601 strings order correctly as text. Missing timestamps go last.
export const sortByTimestampDesc = (views: AttendanceView[]): AttendanceView[] =>
  [...views].sort((a, b) => {
    const left = a.timestamp ?? '';
    const right = b.timestamp ?? '';
    if (left === right) return 0;
    return left < right ? 1 : -1;
  });
