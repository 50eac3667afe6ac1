import { UserRole } from '../types';

export const ALL_ROLES = ['Faculty', 'HOD', 'Admin', 'Coordinator'] as const satisfies readonly UserRole[];

export const ROSTER_COLUMNS = {
  REGD_NO: 'Regd. No.',
  NAME: 'Name',
  PARENT_NAME: 'Father Name',
  PARENT_PHONE: 'Parent Ph.-1',
} as const;

export const REQUIRED_ROSTER_COLUMNS = [ROSTER_COLUMNS.REGD_NO, ROSTER_COLUMNS.NAME];

// Column names shared by every report table.
export const REPORT_COLUMNS = {
  REGD_NO: 'Regd. No.',
  NAME: 'Name',
  PARENT_NAME: 'Parent Name',
  PARENT_PHONE: 'Parent Phone',
  PERIOD_DATE: 'Period_Date',
  ABSENCE_COUNT: 'Absence Count',
  PERIODS_ABSENT: 'Periods Absent',
  PRESENTS: 'Presents',
  TOTAL_CLASSES: 'Total Classes',
  ABSENCES: 'Absences',
  PERCENTAGE: '% Attendance',
  DATE: 'Date',
  PERIOD: 'Period',
} as const;

export const DEFAULT_BCRYPT_ROUNDS = 12;
export const ACCESS_TOKEN_EXPIRY = '8h';
export const ID_CHUNK_SIZE = 200;
export const MAX_ROSTER_UPLOAD_BYTES = 2 * 1024 * 1024; // 2MB
