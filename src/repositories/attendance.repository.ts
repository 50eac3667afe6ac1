import {
  AbsentRow,
  AttendanceSession,
  DateWindow,
  NewAttendanceRow,
  NewAttendanceSession,
  PresenceCount,
  UserRecord,
  UserSummary,
} from '../types';
import { ApiError } from '../utils/ApiError';

/**
 * Query primitives over attendance sessions ("meta") and their rows. Any
 * storage fault surfaces as StorageUnavailableError; an empty array is a
 * legitimate result, never a stand-in for a failure.
 */
export interface AttendanceStore {
  /**
   * Creates the session and appends one row per roster entry as a single
   * atomic unit. Returns the new session id.
   */
  recordSubmission(session: NewAttendanceSession, rows: readonly NewAttendanceRow[]): Promise<number>;

  findSession(sessionId: number): Promise<AttendanceSession | null>;

  /**
   * With a window: sessions inside it ordered by date then period.
   * Without one: every session, most recent first.
   */
  sessionsForSection(section: string, window?: DateWindow): Promise<AttendanceSession[]>;

  sectionsWithData(): Promise<string[]>;

  absentRows(sessionIds: readonly number[], regdNo?: string): Promise<AbsentRow[]>;

  presenceCounts(sessionIds: readonly number[]): Promise<PresenceCount[]>;
}

export interface UserStore {
  findUser(username: string): Promise<UserRecord | null>;
  listUsers(): Promise<UserSummary[]>;
  upsertUser(user: UserRecord): Promise<void>;
}

/**
 * Checks shared by every AttendanceStore implementation before a submission
 * is written.
 */
export const assertValidSubmission = (session: NewAttendanceSession, rows: readonly NewAttendanceRow[]): void => {
  const missing = (['section', 'attendanceDate', 'period', 'submittedBy'] as const).filter(
    (field) => !session[field].trim()
  );
  if (missing.length) {
    throw ApiError.badRequest(`Attendance session is missing: ${missing.join(', ')}`);
  }
  if (!rows.length) {
    throw ApiError.badRequest('Attendance submission has no rows');
  }
  const seen = new Set<string>();
  for (const row of rows) {
    if (seen.has(row.regdNo)) {
      throw ApiError.badRequest(`Registration number ${row.regdNo} appears twice in one session`);
    }
    seen.add(row.regdNo);
  }
};

/** Period labels compare numerically when both are numbers ("2" < "10"). */
export const comparePeriods = (a: string, b: string): number => {
  const na = Number(a);
  const nb = Number(b);
  if (Number.isFinite(na) && Number.isFinite(nb) && na !== nb) return na - nb;
  return a < b ? -1 : a > b ? 1 : 0;
};

export const compareSessionsChronologically = (a: AttendanceSession, b: AttendanceSession): number => {
  if (a.attendanceDate !== b.attendanceDate) return a.attendanceDate < b.attendanceDate ? -1 : 1;
  return comparePeriods(a.period, b.period) || a.id - b.id;
};

export const compareSessionsRecentFirst = (a: AttendanceSession, b: AttendanceSession): number => {
  if (a.attendanceDate !== b.attendanceDate) return a.attendanceDate < b.attendanceDate ? 1 : -1;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
  return b.id - a.id;
};
