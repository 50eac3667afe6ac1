import { Request, Response } from 'express';
import { z } from 'zod';
import { AttendanceService } from '../services/attendance.service';
import { ReportService } from '../services/report.service';
import { ApiError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { isoDate, parseRequest } from '../utils/validation';

const submissionSchema = z.object({
  section: z.string().trim().min(1, 'Section is required'),
  date: isoDate,
  period: z.union([z.string(), z.number()]).transform((value) => String(value).trim()),
  absentees: z.array(z.string().trim().min(1)).default([]),
});

export const createAttendanceController = (attendance: AttendanceService, reports: ReportService) => ({
  // @desc    Submit attendance for one period
  // @route   POST /api/v1/attendance
  // @access  Private (Faculty)
  submit: asyncHandler(async (req: Request, res: Response) => {
    if (!req.user) throw ApiError.unauthorized('User not authenticated');
    const body = parseRequest(submissionSchema, req.body);
    const result = await attendance.submit({ ...body, submittedBy: req.user.username });
    res
      .status(201)
      .json(ApiResponse.success(`Attendance for ${result.section} P${result.period} on ${result.date} submitted`, result));
  }),

  // @desc    All sessions of a section, most recent first
  // @route   GET /api/v1/attendance/:section/sessions
  // @access  Private (HOD)
  listSessions: asyncHandler(async (req: Request, res: Response) => {
    const { section } = parseRequest(z.object({ section: z.string().trim().min(1) }), req.params);
    const sessions = await reports.listSessions(section);
    res.json(ApiResponse.success('Attendance sessions retrieved', sessions, { total: sessions.length }));
  }),
});
