import {
  AbsentRow,
  AttendanceSession,
  DateWindow,
  PercentageEntry,
  PercentageReport,
  PeriodPivotEntry,
  PeriodPivotReport,
  PresenceCount,
  ReportTable,
  RollupEntry,
  RollupMode,
  RollupReport,
  RosterEntry,
  SessionAbsenteeReport,
  StudentAbsenceEntry,
  StudentIdentity,
  StudentReport,
} from '../types';
import { comparePeriods } from '../repositories/attendance.repository';
import { REPORT_COLUMNS } from '../utils/constants';
import { compareText, percentageOf, uniqueSorted } from '../utils/helpers';
import { searchRoster } from './roster.service';

/*
 * Report builders. Every function here is pure: it takes the sessions and rows
 * the store returned (plus a roster snapshot where needed) and returns a typed
 * report. Nothing is cached between calls.
 */

interface AbsenceGroup {
  student: StudentIdentity;
  sessions: AttendanceSession[];
}

const identityOf = (row: AbsentRow): StudentIdentity => ({
  regdNo: row.regdNo,
  name: row.name,
  parentName: row.parentName,
  parentPhone: row.parentPhone,
});

/**
 * Groups absent rows by (regdNo, name, parentName, parentPhone), attaching
 * the session each absence belongs to. Rows of sessions outside `sessions`
 * are ignored.
 */
const groupAbsences = (sessions: readonly AttendanceSession[], rows: readonly AbsentRow[]): AbsenceGroup[] => {
  const sessionsById = new Map(sessions.map((session) => [session.id, session]));
  const groups = new Map<string, AbsenceGroup>();
  for (const row of rows) {
    const session = sessionsById.get(row.sessionId);
    if (!session) continue;
    const key = JSON.stringify([row.regdNo, row.name, row.parentName, row.parentPhone]);
    const group = groups.get(key) ?? { student: identityOf(row), sessions: [] };
    group.sessions.push(session);
    groups.set(key, group);
  }
  return Array.from(groups.values());
};

const byAbsenceCountDesc = <T extends StudentIdentity & { absenceCount: number }>(a: T, b: T): number =>
  b.absenceCount - a.absenceCount || compareText(a.regdNo, b.regdNo) || compareText(a.name, b.name);

const ROLLUP_LABELS: Record<RollupMode, (session: AttendanceSession) => string> = {
  date: (s) => `P${s.period} (${s.attendanceDate})`,
  range: (s) => `P${s.period} (${s.attendanceDate})`,
  daily: (s) => `P${s.period}`,
  week: (s) => `${s.attendanceDate} P${s.period}`,
  month: (s) => `${s.attendanceDate} P${s.period}`,
};

export const sessionAbsentees = (
  section: string,
  session: AttendanceSession | null,
  rows: readonly AbsentRow[]
): SessionAbsenteeReport => {
  if (!session || session.section !== section) {
    return { section, session: null, status: 'not_found', absentees: [] };
  }
  const absentees = rows.filter((row) => row.sessionId === session.id).map(identityOf);
  return { section, session, status: absentees.length ? 'absentees' : 'all_present', absentees };
};

export const rollupAbsentees = (
  section: string,
  mode: RollupMode,
  window: DateWindow,
  sessions: readonly AttendanceSession[],
  rows: readonly AbsentRow[]
): RollupReport => {
  const label = ROLLUP_LABELS[mode];
  const entries: RollupEntry[] = groupAbsences(sessions, rows)
    .map(({ student, sessions: absentIn }) => ({
      ...student,
      periodDates: uniqueSorted(absentIn.map(label)),
      absenceCount: absentIn.length,
    }))
    .sort(byAbsenceCountDesc);

  const status = !sessions.length ? 'no_sessions' : entries.length ? 'absentees' : 'no_absentees';
  return { section, mode, window, sessionCount: sessions.length, status, entries };
};

export const periodPivot = (
  section: string,
  window: DateWindow,
  periods: readonly string[],
  sessions: readonly AttendanceSession[],
  rows: readonly AbsentRow[]
): PeriodPivotReport => {
  const entries: PeriodPivotEntry[] = groupAbsences(sessions, rows)
    .map(({ student, sessions: absentIn }) => {
      const periodCounts: Record<string, number> = {};
      for (const period of periods) periodCounts[period] = 0;
      for (const session of absentIn) {
        if (periods.includes(session.period)) periodCounts[session.period] += 1;
      }
      return {
        ...student,
        periodCounts,
        absenceCount: absentIn.length,
        periodsAbsent: uniqueSorted(absentIn.map((s) => `${s.attendanceDate} (P${s.period})`)).join(', '),
      };
    })
    .sort(byAbsenceCountDesc);

  const status = !sessions.length ? 'no_sessions' : entries.length ? 'absentees' : 'no_absentees';
  return { section, window, periods, sessionCount: sessions.length, status, entries };
};

/**
 * Left-joins the roster against presence counts: every roster entry appears,
 * and a student with no rows counts as absent from every session. Without a
 * roster the students seen in the rows are used instead.
 */
export const attendancePercentages = (
  section: string,
  window: DateWindow | null,
  sessions: readonly AttendanceSession[],
  counts: readonly PresenceCount[],
  roster: readonly RosterEntry[] | null,
  query = ''
): PercentageReport => {
  const totalClasses = sessions.length;

  const presentsByRegd = new Map<string, number>();
  for (const count of counts) {
    presentsByRegd.set(count.regdNo, (presentsByRegd.get(count.regdNo) ?? 0) + count.presents);
  }

  let students: Array<Pick<RosterEntry, 'regdNo' | 'name'>>;
  if (roster) {
    students = searchRoster(roster, query);
  } else {
    const seen = new Map<string, RosterEntry>();
    for (const count of counts) {
      if (!seen.has(count.regdNo)) {
        seen.set(count.regdNo, { regdNo: count.regdNo, name: count.name, parentName: '', parentPhone: '' });
      }
    }
    students = searchRoster(Array.from(seen.values()), query);
  }

  const entries: PercentageEntry[] = students
    .map(({ regdNo, name }) => {
      const presents = presentsByRegd.get(regdNo) ?? 0;
      return {
        regdNo,
        name,
        presents,
        totalClasses,
        absences: totalClasses - presents,
        percentage: percentageOf(presents, totalClasses),
      };
    })
    .sort((a, b) => a.percentage - b.percentage);

  return { section, window, totalClasses, rosterAvailable: roster !== null, entries };
};

export const studentAbsences = (
  section: string,
  regdNo: string,
  window: DateWindow,
  sessions: readonly AttendanceSession[],
  rows: readonly AbsentRow[]
): StudentReport => {
  if (!sessions.length) {
    return { section, regdNo, window, sessionCount: 0, status: 'no_sessions', entries: [] };
  }
  const sessionsById = new Map(sessions.map((session) => [session.id, session]));
  const itemized: Array<StudentAbsenceEntry & { sessionId: number }> = [];
  for (const row of rows) {
    const session = sessionsById.get(row.sessionId);
    if (!session || row.regdNo !== regdNo) continue;
    itemized.push({
      sessionId: session.id,
      regdNo: row.regdNo,
      name: row.name,
      date: session.attendanceDate,
      period: session.period,
      parentName: row.parentName,
      parentPhone: row.parentPhone,
    });
  }
  itemized.sort((a, b) => compareText(a.date, b.date) || comparePeriods(a.period, b.period) || a.sessionId - b.sessionId);
  const entries = itemized.map(({ sessionId: _sessionId, ...entry }) => entry);

  return {
    section,
    regdNo,
    window,
    sessionCount: sessions.length,
    status: entries.length ? 'absences' : 'perfect_attendance',
    entries,
  };
};

// ---------------------------------------------------------------------------
// Tabular projections (stable column names for rendering and export)
// ---------------------------------------------------------------------------

const IDENTITY_COLUMNS = [
  REPORT_COLUMNS.REGD_NO,
  REPORT_COLUMNS.NAME,
  REPORT_COLUMNS.PARENT_NAME,
  REPORT_COLUMNS.PARENT_PHONE,
];

const identityCells = (student: StudentIdentity) => ({
  [REPORT_COLUMNS.REGD_NO]: student.regdNo,
  [REPORT_COLUMNS.NAME]: student.name,
  [REPORT_COLUMNS.PARENT_NAME]: student.parentName,
  [REPORT_COLUMNS.PARENT_PHONE]: student.parentPhone,
});

export const sessionAbsenteeTable = (report: SessionAbsenteeReport): ReportTable => ({
  columns: [...IDENTITY_COLUMNS],
  rows: report.absentees.map(identityCells),
});

export const rollupTable = (report: RollupReport): ReportTable => ({
  columns: [...IDENTITY_COLUMNS, REPORT_COLUMNS.PERIOD_DATE, REPORT_COLUMNS.ABSENCE_COUNT],
  rows: report.entries.map((entry) => ({
    ...identityCells(entry),
    [REPORT_COLUMNS.PERIOD_DATE]: entry.periodDates.join(', '),
    [REPORT_COLUMNS.ABSENCE_COUNT]: entry.absenceCount,
  })),
});

export const periodPivotTable = (report: PeriodPivotReport): ReportTable => {
  const periodColumns = report.periods.map((period) => `P${period}`);
  return {
    columns: [...IDENTITY_COLUMNS, ...periodColumns, REPORT_COLUMNS.ABSENCE_COUNT, REPORT_COLUMNS.PERIODS_ABSENT],
    rows: report.entries.map((entry) => {
      const row: Record<string, string | number> = identityCells(entry);
      report.periods.forEach((period, i) => {
        row[periodColumns[i]] = entry.periodCounts[period] ?? 0;
      });
      row[REPORT_COLUMNS.ABSENCE_COUNT] = entry.absenceCount;
      row[REPORT_COLUMNS.PERIODS_ABSENT] = entry.periodsAbsent;
      return row;
    }),
  };
};

export const percentageTable = (report: PercentageReport): ReportTable => ({
  columns: [
    REPORT_COLUMNS.REGD_NO,
    REPORT_COLUMNS.NAME,
    REPORT_COLUMNS.PRESENTS,
    REPORT_COLUMNS.TOTAL_CLASSES,
    REPORT_COLUMNS.ABSENCES,
    REPORT_COLUMNS.PERCENTAGE,
  ],
  rows: report.entries.map((entry) => ({
    [REPORT_COLUMNS.REGD_NO]: entry.regdNo,
    [REPORT_COLUMNS.NAME]: entry.name,
    [REPORT_COLUMNS.PRESENTS]: entry.presents,
    [REPORT_COLUMNS.TOTAL_CLASSES]: entry.totalClasses,
    [REPORT_COLUMNS.ABSENCES]: entry.absences,
    [REPORT_COLUMNS.PERCENTAGE]: entry.percentage.toFixed(2),
  })),
});

export const studentAbsenceTable = (report: StudentReport): ReportTable => ({
  columns: [
    REPORT_COLUMNS.REGD_NO,
    REPORT_COLUMNS.NAME,
    REPORT_COLUMNS.DATE,
    REPORT_COLUMNS.PERIOD,
    REPORT_COLUMNS.PARENT_NAME,
    REPORT_COLUMNS.PARENT_PHONE,
  ],
  rows: report.entries.map((entry) => ({
    [REPORT_COLUMNS.REGD_NO]: entry.regdNo,
    [REPORT_COLUMNS.NAME]: entry.name,
    [REPORT_COLUMNS.DATE]: entry.date,
    [REPORT_COLUMNS.PERIOD]: entry.period,
    [REPORT_COLUMNS.PARENT_NAME]: entry.parentName,
    [REPORT_COLUMNS.PARENT_PHONE]: entry.parentPhone,
  })),
});
