import { Request, Response } from 'express';
import { z } from 'zod';
import { ReportService } from '../services/report.service';
import { RosterService, searchRoster } from '../services/roster.service';
import { SectionResolver } from '../services/sectionResolver.service';
import { ApiError, UnresolvedSectionError } from '../utils/ApiError';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { parseRequest } from '../utils/validation';

const sectionParams = z.object({ section: z.string().trim().min(1) });

export const createSectionController = (resolver: SectionResolver, rosters: RosterService, reports: ReportService) => ({
  // @desc    Sections split by whether a roster is on file, plus the period labels
  // @route   GET /api/v1/sections
  // @access  Private
  listSections: (_req: Request, res: Response) => {
    const { available, missing } = resolver.availability();
    res.json(ApiResponse.success('Sections retrieved', { available, missing, periods: resolver.periods }));
  },

  // @desc    Sections that have at least one attendance session
  // @route   GET /api/v1/sections/with-data
  // @access  Private (HOD, Coordinator)
  sectionsWithData: asyncHandler(async (_req: Request, res: Response) => {
    const sections = await reports.sectionsWithData();
    res.json(ApiResponse.success('Sections with attendance data retrieved', sections, { total: sections.length }));
  }),

  // @desc    Roster of a section, optionally filtered by name or registration number
  // @route   GET /api/v1/sections/:section/roster
  // @access  Private (Faculty, HOD)
  getRoster: (req: Request, res: Response) => {
    const { section } = parseRequest(sectionParams, req.params);
    const { q } = parseRequest(z.object({ q: z.string().default('') }), req.query);
    const roster = rosters.find(section);
    if (!roster) throw new UnresolvedSectionError(resolver.resolve(section));
    const students = searchRoster(roster.entries, q);
    res.json(ApiResponse.success(`Roster for ${roster.section} retrieved`, { section: roster.section, students }, { total: students.length }));
  },

  // @desc    Upload a roster CSV for a section
  // @route   POST /api/v1/sections/:section/roster
  // @access  Private (Faculty, Admin)
  uploadRoster: (req: Request, res: Response) => {
    const { section } = parseRequest(sectionParams, req.params);
    if (!req.file) throw ApiError.badRequest('A roster CSV is required in the "file" field');
    const roster = rosters.save(section, req.file.buffer.toString('utf-8'));
    res
      .status(201)
      .json(ApiResponse.success(`Roster for ${roster.section} saved`, { section: roster.section, students: roster.entries.length }));
  },
});
