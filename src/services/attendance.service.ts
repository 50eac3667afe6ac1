import { NewAttendanceRow } from '../types';
import { AttendanceStore } from '../repositories/attendance.repository';
import { ApiError } from '../utils/ApiError';
import { parseIsoDate } from '../utils/dateWindow';
import { RosterService } from './roster.service';
import { SectionResolver } from './sectionResolver.service';
import logger from '../config/logger';

export interface AttendanceSubmission {
  section: string;
  date: string;
  period: string;
  submittedBy: string;
  absentees: readonly string[];
}

export interface SubmissionResult {
  sessionId: number;
  section: string;
  date: string;
  period: string;
  presentCount: number;
  absentCount: number;
  totalStudents: number;
}

export class AttendanceService {
  constructor(
    private readonly store: AttendanceStore,
    private readonly resolver: SectionResolver,
    private readonly rosters: RosterService
  ) {}

  /**
   * Snapshots the full roster with each student's presence and records it as
   * one session. Everyone not listed in `absentees` is marked present.
   */
  async submit(submission: AttendanceSubmission): Promise<SubmissionResult> {
    const section = this.resolver.resolve(submission.section);
    if (!this.resolver.isCanonical(section)) {
      throw ApiError.badRequest(`Unknown section ${submission.section}`);
    }
    const period = submission.period.trim();
    if (!this.resolver.periods.includes(period)) {
      throw ApiError.badRequest(`Unknown period ${submission.period}; expected one of ${this.resolver.periods.join(', ')}`);
    }
    const date = parseIsoDate(submission.date);

    const roster = this.rosters.load(section);
    const absent = new Set(submission.absentees.map((regdNo) => regdNo.trim()));
    const known = new Set(roster.entries.map((entry) => entry.regdNo));
    const unknown = Array.from(absent).filter((regdNo) => !known.has(regdNo));
    if (unknown.length) {
      throw ApiError.badRequest(`Not on the ${section} roster: ${unknown.join(', ')}`);
    }

    const rows: NewAttendanceRow[] = roster.entries.map((entry) => ({
      regdNo: entry.regdNo,
      name: entry.name,
      present: !absent.has(entry.regdNo),
      parentName: entry.parentName,
      parentPhone: entry.parentPhone,
    }));

    const sessionId = await this.store.recordSubmission(
      { section, attendanceDate: date, period, submittedBy: submission.submittedBy },
      rows
    );
    logger.info(`Attendance submitted for ${section} P${period} on ${date} by ${submission.submittedBy} (session ${sessionId})`);

    return {
      sessionId,
      section,
      date,
      period,
      presentCount: rows.length - absent.size,
      absentCount: absent.size,
      totalStudents: rows.length,
    };
  }
}
