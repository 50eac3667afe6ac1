import {
  AttendanceSession,
  DateWindow,
  PercentageReport,
  PeriodPivotReport,
  RollupMode,
  RollupReport,
  SessionAbsenteeReport,
  StudentReport,
} from '../types';
import { AttendanceStore } from '../repositories/attendance.repository';
import { assertValidWindow, dayWindow, monthWindow, weekWindow } from '../utils/dateWindow';
import { ApiError } from '../utils/ApiError';
import {
  attendancePercentages,
  periodPivot,
  rollupAbsentees,
  sessionAbsentees,
  studentAbsences,
} from './aggregation.service';
import { RosterService } from './roster.service';
import { SectionResolver } from './sectionResolver.service';

/** How a caller names a report window. */
export type WindowRequest =
  | { mode: 'date' | 'daily'; date: string }
  | { mode: 'week' | 'month'; anchor: string }
  | { mode: 'range'; start: string; end: string };

export const windowFor = (request: WindowRequest): DateWindow => {
  switch (request.mode) {
    case 'date':
    case 'daily':
      return dayWindow(request.date);
    case 'week':
      return weekWindow(request.anchor);
    case 'month':
      return monthWindow(request.anchor);
    case 'range':
      return assertValidWindow({ start: request.start, end: request.end });
  }
};

/**
 * Runs report queries for one request: validates the window, resolves the
 * section, reads the store and hands the results to the aggregation
 * functions. Holds no state between calls.
 */
export class ReportService {
  constructor(
    private readonly store: AttendanceStore,
    private readonly resolver: SectionResolver,
    private readonly rosters: RosterService
  ) {}

  listSessions(sectionLabel: string): Promise<AttendanceSession[]> {
    return this.store.sessionsForSection(this.resolver.resolve(sectionLabel));
  }

  sectionsWithData(): Promise<string[]> {
    return this.store.sectionsWithData();
  }

  async sessionAbsentees(sectionLabel: string, sessionId: number): Promise<SessionAbsenteeReport> {
    if (!Number.isSafeInteger(sessionId) || sessionId < 1) throw ApiError.badRequest('Invalid session id');
    const section = this.resolver.resolve(sectionLabel);
    const session = await this.store.findSession(sessionId);
    const rows = session && session.section === section ? await this.store.absentRows([session.id]) : [];
    return sessionAbsentees(section, session, rows);
  }

  async absenteeRollup(sectionLabel: string, request: WindowRequest): Promise<RollupReport> {
    const window = windowFor(request);
    const section = this.resolver.resolve(sectionLabel);
    const sessions = await this.store.sessionsForSection(section, window);
    const rows = sessions.length ? await this.store.absentRows(sessions.map((s) => s.id)) : [];
    return rollupAbsentees(section, request.mode, window, sessions, rows);
  }

  async periodSummary(sectionLabel: string, start: string, end: string): Promise<PeriodPivotReport> {
    const window = assertValidWindow({ start, end });
    const section = this.resolver.resolve(sectionLabel);
    const sessions = await this.store.sessionsForSection(section, window);
    const rows = sessions.length ? await this.store.absentRows(sessions.map((s) => s.id)) : [];
    return periodPivot(section, window, this.resolver.periods, sessions, rows);
  }

  /**
   * Percentages over a window, or over all time when no window is given. The
   * roster is read (and validated) before the store is queried.
   */
  async percentage(sectionLabel: string, window?: DateWindow, query = ''): Promise<PercentageReport> {
    const checked = window ? assertValidWindow(window) : null;
    const section = this.resolver.resolve(sectionLabel);
    const roster = this.rosters.find(sectionLabel);
    const sessions = await this.store.sessionsForSection(section, checked ?? undefined);
    const counts = sessions.length ? await this.store.presenceCounts(sessions.map((s) => s.id)) : [];
    return attendancePercentages(section, checked, sessions, counts, roster ? roster.entries : null, query);
  }

  async student(sectionLabel: string, regdNo: string, request: WindowRequest): Promise<StudentReport> {
    const window = windowFor(request);
    const regd = regdNo.trim();
    if (!regd) throw ApiError.badRequest('Registration number is required');
    const section = this.resolver.resolve(sectionLabel);
    const sessions = await this.store.sessionsForSection(section, window);
    const rows = sessions.length ? await this.store.absentRows(sessions.map((s) => s.id), regd) : [];
    return studentAbsences(section, regd, window, sessions, rows);
  }
}
