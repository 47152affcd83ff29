// src/models/attendance.types.ts

export const ATTENDANCE_COLLECTION = 'attendance';

export interface AttendanceInput {
  name: string;
}

// Shape persisted in the `attendance` collection.
export interface Attendance {
  name: string;
  timestamp: string; // ISO-8601, UTC
}

export interface AttendanceView {
  id: string;
  name: string | null;
  timestamp: string | null;
}
