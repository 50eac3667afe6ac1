import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
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
import { ApiError, StorageUnavailableError } from '../utils/ApiError';
import { ALL_ROLES } from '../utils/constants';
import { compareText, inChunks } from '../utils/helpers';
import logger from '../config/logger';
import {
  AttendanceStore,
  UserStore,
  assertValidSubmission,
  compareSessionsChronologically,
  compareSessionsRecentFirst,
} from './attendance.repository';

// PostgREST caps a single response; larger selections are paged.
const PAGE_SIZE = 1000;

const metaRowSchema = z.object({
  id: z.coerce.number().int(),
  section: z.string(),
  attendance_date: z.string(),
  period: z.string(),
  submitted_by: z.string(),
  created_at: z.string(),
});

const absentRowSchema = z.object({
  meta_id: z.coerce.number().int(),
  regd_no: z.string(),
  name: z.string(),
  parent_name: z.string().nullable(),
  parent_phone: z.string().nullable(),
});

const presenceRowSchema = z.object({
  regd_no: z.string(),
  name: z.string(),
  present: z.boolean(),
});

const roleSchema = z.enum(ALL_ROLES);

const userRowSchema = z.object({
  username: z.string(),
  password_hash: z.string(),
  role: roleSchema,
});

const userSummarySchema = userRowSchema.pick({ username: true, role: true });

type PostgrestResult = PromiseLike<{ data: unknown; error: { message: string } | null }>;

const META_COLUMNS = 'id, section, attendance_date, period, submitted_by, created_at';

const toSession = (row: z.infer<typeof metaRowSchema>): AttendanceSession => ({
  id: row.id,
  section: row.section,
  attendanceDate: row.attendance_date.slice(0, 10),
  period: row.period,
  submittedBy: row.submitted_by,
  createdAt: row.created_at,
});

/**
 * Attendance and user storage on Supabase (Postgres). Submissions go through
 * the `record_attendance` database function so the session and its rows
 * commit in one transaction.
 */
export class SupabaseAttendanceRepository implements AttendanceStore, UserStore {
  constructor(private readonly db: SupabaseClient) {}

  private async run<T>(operation: string, query: PostgrestResult, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let result: Awaited<PostgrestResult>;
    try {
      result = await query;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Storage request failed (${operation}): ${message}`);
      throw new StorageUnavailableError(operation, message);
    }
    if (result.error) {
      logger.error(`Storage request failed (${operation}): ${result.error.message}`);
      throw new StorageUnavailableError(operation, result.error.message);
    }
    const parsed = schema.safeParse(result.data);
    if (!parsed.success) {
      logger.error(`Unexpected storage response (${operation}): ${parsed.error.message}`);
      throw new StorageUnavailableError(operation, 'unexpected response shape');
    }
    return parsed.data;
  }

  private async runPaged<T>(
    operation: string,
    page: (from: number, to: number) => PostgrestResult,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const rows: T[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const batch = await this.run(operation, page(from, from + PAGE_SIZE - 1), z.array(schema));
      rows.push(...batch);
      if (batch.length < PAGE_SIZE) return rows;
    }
  }

  async recordSubmission(session: NewAttendanceSession, rows: readonly NewAttendanceRow[]): Promise<number> {
    assertValidSubmission(session, rows);
    const sessionId = await this.run(
      'record attendance',
      this.db.rpc('record_attendance', {
        p_section: session.section,
        p_date: session.attendanceDate,
        p_period: session.period,
        p_submitted_by: session.submittedBy,
        p_rows: rows.map((row) => ({
          regd_no: row.regdNo,
          name: row.name,
          present: row.present,
          parent_name: row.parentName,
          parent_phone: row.parentPhone,
        })),
      }),
      z.coerce.number().int()
    );
    logger.info(`Recorded attendance session ${sessionId} for ${session.section} (${rows.length} rows)`);
    return sessionId;
  }

  async findSession(sessionId: number): Promise<AttendanceSession | null> {
    const row = await this.run(
      'load attendance session',
      this.db.from('attendance_meta').select(META_COLUMNS).eq('id', sessionId).maybeSingle(),
      metaRowSchema.nullable()
    );
    return row ? toSession(row) : null;
  }

  async sessionsForSection(section: string, window?: DateWindow): Promise<AttendanceSession[]> {
    const rows = await this.runPaged(
      'list attendance sessions',
      (from, to) => {
        let query = this.db.from('attendance_meta').select(META_COLUMNS).eq('section', section);
        if (window) {
          query = query.gte('attendance_date', window.start).lte('attendance_date', window.end);
        }
        return query.order('id', { ascending: true }).range(from, to);
      },
      metaRowSchema
    );
    const sessions = rows.map(toSession);
    return sessions.sort(window ? compareSessionsChronologically : compareSessionsRecentFirst);
  }

  async sectionsWithData(): Promise<string[]> {
    const rows = await this.runPaged(
      'list sections',
      (from, to) => this.db.from('attendance_meta').select('section').order('id', { ascending: true }).range(from, to),
      z.object({ section: z.string() })
    );
    return Array.from(new Set(rows.map((row) => row.section))).sort(compareText);
  }

  async absentRows(sessionIds: readonly number[], regdNo?: string): Promise<AbsentRow[]> {
    const result: AbsentRow[] = [];
    for (const chunk of inChunks(sessionIds)) {
      const rows = await this.runPaged(
        'load absentees',
        (from, to) => {
          let query = this.db
            .from('attendance_rows')
            .select('meta_id, regd_no, name, parent_name, parent_phone')
            .eq('present', false)
            .in('meta_id', chunk);
          if (regdNo !== undefined) query = query.eq('regd_no', regdNo);
          return query.order('id', { ascending: true }).range(from, to);
        },
        absentRowSchema
      );
      for (const row of rows) {
        result.push({
          sessionId: row.meta_id,
          regdNo: row.regd_no,
          name: row.name,
          parentName: row.parent_name ?? '',
          parentPhone: row.parent_phone ?? '',
        });
      }
    }
    return result;
  }

  async presenceCounts(sessionIds: readonly number[]): Promise<PresenceCount[]> {
    const counts = new Map<string, PresenceCount>();
    for (const chunk of inChunks(sessionIds)) {
      const rows = await this.runPaged(
        'count presences',
        (from, to) =>
          this.db
            .from('attendance_rows')
            .select('regd_no, name, present')
            .in('meta_id', chunk)
            .order('id', { ascending: true })
            .range(from, to),
        presenceRowSchema
      );
      for (const row of rows) {
        const key = JSON.stringify([row.regd_no, row.name]);
        const entry = counts.get(key) ?? { regdNo: row.regd_no, name: row.name, presents: 0 };
        if (row.present) entry.presents += 1;
        counts.set(key, entry);
      }
    }
    return Array.from(counts.values());
  }

  async findUser(username: string): Promise<UserRecord | null> {
    const row = await this.run(
      'load user',
      this.db.from('users').select('username, password_hash, role').eq('username', username).maybeSingle(),
      userRowSchema.nullable()
    );
    return row ? { username: row.username, passwordHash: row.password_hash, role: row.role } : null;
  }

  async listUsers(): Promise<UserSummary[]> {
    return this.run(
      'list users',
      this.db.from('users').select('username, role').order('username', { ascending: true }),
      z.array(userSummarySchema)
    );
  }

  async upsertUser(user: UserRecord): Promise<void> {
    if (!user.username.trim()) throw ApiError.badRequest('Username is required');
    await this.run(
      'save user',
      this.db
        .from('users')
        .upsert({ username: user.username, password_hash: user.passwordHash, role: user.role }, { onConflict: 'username' }),
      z.unknown()
    );
  }
}
