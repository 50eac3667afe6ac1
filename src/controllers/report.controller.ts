import { Request, Response } from 'express';
import { z } from 'zod';
import { ReportTable } from '../types';
import { ReportService, WindowRequest } from '../services/report.service';
import {
  percentageTable,
  periodPivotTable,
  rollupTable,
  sessionAbsenteeTable,
  studentAbsenceTable,
} from '../services/aggregation.service';
import { toCsv } from '../services/export.service';
import { ApiError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { todayIso } from '../utils/dateWindow';
import { sanitizeFilename } from '../utils/helpers';
import { isoDate, parseRequest, reportFormat } from '../utils/validation';

const sectionParams = z.object({ section: z.string().trim().min(1) });

const windowQuery = z.object({
  mode: z.enum(['date', 'range', 'daily', 'week', 'month']).default('date'),
  date: isoDate.optional(),
  start: isoDate.optional(),
  end: isoDate.optional(),
  format: reportFormat,
});

const rangeQuery = z.object({
  start: isoDate,
  end: isoDate,
  format: reportFormat,
});

const percentageQuery = z.object({
  start: isoDate.optional(),
  end: isoDate.optional(),
  q: z.string().default(''),
  format: reportFormat,
});

type WindowQuery = z.infer<typeof windowQuery>;

// `date` is the day for date/daily and the anchor for week/month; it defaults to today.
const toWindowRequest = (query: WindowQuery): WindowRequest => {
  switch (query.mode) {
    case 'date':
    case 'daily':
      return { mode: query.mode, date: query.date ?? todayIso() };
    case 'week':
    case 'month':
      return { mode: query.mode, anchor: query.date ?? todayIso() };
    case 'range':
      if (!query.start || !query.end) throw ApiError.badRequest('start and end are required for a range report');
      return { mode: 'range', start: query.start, end: query.end };
  }
};

interface ReportPayload<R> {
  message: string;
  report: R;
  table: ReportTable;
  filename: string;
  format: 'json' | 'csv';
}

const sendReport = <R>(res: Response, payload: ReportPayload<R>): void => {
  if (payload.format === 'csv') {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${sanitizeFilename(payload.filename)}.csv"`);
    res.send(toCsv(payload.table));
    return;
  }
  res.json(ApiResponse.success(payload.message, { report: payload.report, table: payload.table }));
};

const ROLLUP_MESSAGES = {
  no_sessions: 'No attendance sessions in this window',
  no_absentees: 'No absentees in this window',
  absentees: 'Absentee report generated',
} as const;

const STUDENT_MESSAGES = {
  no_sessions: 'No attendance sessions in this window',
  perfect_attendance: 'Student has perfect attendance in this window',
  absences: 'Student absences retrieved',
} as const;

const SESSION_MESSAGES = {
  not_found: 'Attendance session not found for this section',
  all_present: 'All students were present',
  absentees: 'Session absentees retrieved',
} as const;

export const createReportController = (reports: ReportService) => ({
  // @desc    Absentees of one session
  // @route   GET /api/v1/reports/:section/sessions/:sessionId/absentees
  // @access  Private (HOD)
  sessionAbsentees: asyncHandler(async (req: Request, res: Response) => {
    const { section, sessionId } = parseRequest(
      sectionParams.extend({ sessionId: z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER) }),
      req.params
    );
    const { format } = parseRequest(z.object({ format: reportFormat }), req.query);
    const report = await reports.sessionAbsentees(section, sessionId);
    if (report.status === 'not_found') throw ApiError.notFound(SESSION_MESSAGES.not_found);
    sendReport(res, {
      message: SESSION_MESSAGES[report.status],
      report,
      table: sessionAbsenteeTable(report),
      filename: `${report.section}_session_${sessionId}_absentees`,
      format,
    });
  }),

  // @desc    Absentee roll-up over a date, range, day, week or month
  // @route   GET /api/v1/reports/:section/absentees
  // @access  Private (HOD)
  absentees: asyncHandler(async (req: Request, res: Response) => {
    const { section } = parseRequest(sectionParams, req.params);
    const query = parseRequest(windowQuery, req.query);
    const report = await reports.absenteeRollup(section, toWindowRequest(query));
    sendReport(res, {
      message: ROLLUP_MESSAGES[report.status],
      report,
      table: rollupTable(report),
      filename: `${report.section}_${report.mode}_absentees_${report.window.start}_${report.window.end}`,
      format: query.format,
    });
  }),

  // @desc    Absences pivoted by period
  // @route   GET /api/v1/reports/:section/period-summary
  // @access  Private (HOD, Coordinator)
  periodSummary: asyncHandler(async (req: Request, res: Response) => {
    const { section } = parseRequest(sectionParams, req.params);
    const { start, end, format } = parseRequest(rangeQuery, req.query);
    const report = await reports.periodSummary(section, start, end);
    sendReport(res, {
      message: ROLLUP_MESSAGES[report.status],
      report,
      table: periodPivotTable(report),
      filename: `${report.section}_period_summary_${start}_${end}`,
      format,
    });
  }),

  // @desc    Attendance percentage per student
  // @route   GET /api/v1/reports/:section/percentage
  // @access  Private (HOD)
  percentage: asyncHandler(async (req: Request, res: Response) => {
    const { section } = parseRequest(sectionParams, req.params);
    const { start, end, q, format } = parseRequest(percentageQuery, req.query);
    if (Boolean(start) !== Boolean(end)) throw ApiError.badRequest('Provide both start and end, or neither');
    const window = start && end ? { start, end } : undefined;
    const report = await reports.percentage(section, window, q);
    sendReport(res, {
      message: report.totalClasses ? 'Attendance percentages calculated' : 'No attendance sessions in this window',
      report,
      table: percentageTable(report),
      filename: window ? `${report.section}_percentage_${window.start}_${window.end}` : `${report.section}_percentage`,
      format,
    });
  }),

  // @desc    One student's absences
  // @route   GET /api/v1/reports/:section/students/:regdNo
  // @access  Private (HOD)
  student: asyncHandler(async (req: Request, res: Response) => {
    const { section, regdNo } = parseRequest(sectionParams.extend({ regdNo: z.string().trim().min(1) }), req.params);
    const query = parseRequest(windowQuery, req.query);
    const report = await reports.student(section, regdNo, toWindowRequest(query));
    sendReport(res, {
      message: STUDENT_MESSAGES[report.status],
      report,
      table: studentAbsenceTable(report),
      filename: `${report.regdNo}_absences_${report.window.start}_${report.window.end}`,
      format: query.format,
    });
  }),
});
