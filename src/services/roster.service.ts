import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { RosterEntry } from '../types';
import { ApiError, MalformedRosterError, UnresolvedSectionError } from '../utils/ApiError';
import { REQUIRED_ROSTER_COLUMNS, ROSTER_COLUMNS } from '../utils/constants';
import { SectionResolver } from './sectionResolver.service';
import logger from '../config/logger';

export interface LoadedRoster {
  section: string;
  filePath: string;
  entries: RosterEntry[];
}

const cell = (row: Record<string, string | undefined>, column: string): string => String(row[column] ?? '').trim();

/**
 * Parses roster CSV text. Missing mandatory columns raise
 * MalformedRosterError; rows without a registration number are skipped and a
 * repeated registration number keeps its first occurrence.
 */
export const parseRosterCsv = (section: string, csvText: string): RosterEntry[] => {
  const result = Papa.parse<Record<string, string | undefined>>(csvText, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  const fields = result.meta.fields ?? [];
  const missing = REQUIRED_ROSTER_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length) throw new MalformedRosterError(section, missing);

  const seen = new Set<string>();
  const entries: RosterEntry[] = [];
  for (const row of result.data) {
    const regdNo = cell(row, ROSTER_COLUMNS.REGD_NO);
    if (!regdNo) continue;
    if (seen.has(regdNo)) {
      logger.warn(`Roster for ${section} repeats registration number ${regdNo}; keeping the first entry`);
      continue;
    }
    seen.add(regdNo);
    entries.push({
      regdNo,
      name: cell(row, ROSTER_COLUMNS.NAME),
      parentName: cell(row, ROSTER_COLUMNS.PARENT_NAME),
      parentPhone: cell(row, ROSTER_COLUMNS.PARENT_PHONE),
    });
  }
  return entries;
};

export const searchRoster = (entries: readonly RosterEntry[], query: string): RosterEntry[] => {
  const needle = query.trim().toLowerCase();
  if (!needle) return [...entries];
  return entries.filter(
    (entry) => entry.name.toLowerCase().includes(needle) || entry.regdNo.toLowerCase().includes(needle)
  );
};

export class RosterService {
  constructor(private readonly resolver: SectionResolver, private readonly rosterDir: string) {}

  /** Roster for the section, or null when no roster file exists under any of its names. */
  find(sectionLabel: string): LoadedRoster | null {
    const section = this.resolver.resolve(sectionLabel);
    const filePath = this.resolver.locateRoster(sectionLabel);
    if (!filePath) return null;
    const entries = parseRosterCsv(section, fs.readFileSync(filePath, 'utf-8'));
    return { section, filePath, entries };
  }

  load(sectionLabel: string): LoadedRoster {
    const roster = this.find(sectionLabel);
    if (!roster) throw new UnresolvedSectionError(this.resolver.resolve(sectionLabel));
    return roster;
  }

  /**
   * Validates an uploaded roster and writes it under the section's primary
   * filename.
   */
  save(sectionLabel: string, csvText: string): LoadedRoster {
    const section = this.resolver.resolve(sectionLabel);
    if (!this.resolver.isCanonical(section)) throw ApiError.badRequest(`Unknown section ${sectionLabel}`);
    const entries = parseRosterCsv(section, csvText);
    fs.mkdirSync(this.rosterDir, { recursive: true });
    const filePath = path.join(this.rosterDir, this.resolver.primaryFilename(section));
    fs.writeFileSync(filePath, csvText);
    logger.info(`Saved roster for ${section} (${entries.length} students) to ${path.basename(filePath)}`);
    return { section, filePath, entries };
  }
}
