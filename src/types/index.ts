/// <reference path="./express.d.ts" />

export type UserRole = 'Faculty' | 'HOD' | 'Admin' | 'Coordinator';

export interface SectionDefinition {
  id: string;
  aliases: readonly string[];
  filenames: readonly string[];
}

export interface SectionCatalog {
  periods: readonly string[];
  sections: readonly SectionDefinition[];
}

/**
 * Inclusive date window. Both ends are `YYYY-MM-DD` strings.
 */
export interface DateWindow {
  start: string;
  end: string;
}

export interface RosterEntry {
  regdNo: string;
  name: string;
  parentName: string;
  parentPhone: string;
}

export interface AttendanceSession {
  id: number;
  section: string;
  attendanceDate: string;
  period: string;
  submittedBy: string;
  createdAt: string;
}

export interface NewAttendanceSession {
  section: string;
  attendanceDate: string;
  period: string;
  submittedBy: string;
}

export interface AttendanceRow {
  sessionId: number;
  regdNo: string;
  name: string;
  present: boolean;
  parentName: string;
  parentPhone: string;
}

export type NewAttendanceRow = Omit<AttendanceRow, 'sessionId'>;

export type AbsentRow = Omit<AttendanceRow, 'present'>;

export interface PresenceCount {
  regdNo: string;
  name: string;
  presents: number;
}

export interface UserRecord {
  username: string;
  passwordHash: string;
  role: UserRole;
}

export interface UserSummary {
  username: string;
  role: UserRole;
}

export interface AuthResult {
  valid: boolean;
  role: UserRole | null;
}

export type StudentIdentity = RosterEntry;

export type SessionAbsenteeStatus = 'not_found' | 'all_present' | 'absentees';

export interface SessionAbsenteeReport {
  section: string;
  session: AttendanceSession | null;
  status: SessionAbsenteeStatus;
  absentees: StudentIdentity[];
}

export type RollupMode = 'date' | 'range' | 'daily' | 'week' | 'month';

export type RollupStatus = 'no_sessions' | 'no_absentees' | 'absentees';

export interface RollupEntry extends StudentIdentity {
  periodDates: string[];
  absenceCount: number;
}

export interface RollupReport {
  section: string;
  mode: RollupMode;
  window: DateWindow;
  sessionCount: number;
  status: RollupStatus;
  entries: RollupEntry[];
}

export interface PeriodPivotEntry extends StudentIdentity {
  periodCounts: Record<string, number>;
  absenceCount: number;
  periodsAbsent: string;
}

export interface PeriodPivotReport {
  section: string;
  window: DateWindow;
  periods: readonly string[];
  sessionCount: number;
  status: RollupStatus;
  entries: PeriodPivotEntry[];
}

export interface PercentageEntry {
  regdNo: string;
  name: string;
  presents: number;
  totalClasses: number;
  absences: number;
  percentage: number;
}

export interface PercentageReport {
  section: string;
  window: DateWindow | null;
  totalClasses: number;
  rosterAvailable: boolean;
  entries: PercentageEntry[];
}

export type StudentReportStatus = 'no_sessions' | 'perfect_attendance' | 'absences';

export interface StudentAbsenceEntry {
  regdNo: string;
  name: string;
  date: string;
  period: string;
  parentName: string;
  parentPhone: string;
}

export interface StudentReport {
  section: string;
  regdNo: string;
  window: DateWindow;
  sessionCount: number;
  status: StudentReportStatus;
  entries: StudentAbsenceEntry[];
}

export type ReportCell = string | number;

export interface ReportTable {
  columns: string[];
  rows: Array<Record<string, ReportCell>>;
}
