import { InvalidDateWindowError, MalformedRosterError, StorageUnavailableError } from '../src/utils/ApiError';
import { ROSTER_HEADER, TestContext, makeContext, removeDir } from './utils/fixtures';

const submit = (t: TestContext, date: string, period: string, absentees: string[]) =>
  t.ctx.attendance.submit({ section: 'II-CSE_A', date, period, submittedBy: 'fac1', absentees });

describe('ReportService', () => {
  let t: TestContext;

  beforeEach(async () => {
    t = makeContext();
    await submit(t, '2024-01-01', '1', ['R2']);
    await submit(t, '2024-01-01', '2', ['R1', 'R2']);
    await submit(t, '2024-01-02', '1', []);
  });

  afterEach(() => removeDir(t.rosterDir));

  it('lists sessions most recent first', async () => {
    const sessions = await t.ctx.reports.listSessions('ii cse.a');
    expect(sessions.map((s) => s.id)).toEqual([3, 2, 1]);
  });

  it('lists the sections that have sessions', async () => {
    expect(await t.ctx.reports.sectionsWithData()).toEqual(['II-CSE_A']);
  });

  it('reports the absentees of one session', async () => {
    const report = await t.ctx.reports.sessionAbsentees('II-CSE_A', 2);
    expect(report.status).toBe('absentees');
    expect(report.absentees.map((a) => a.regdNo)).toEqual(['R1', 'R2']);
    expect((await t.ctx.reports.sessionAbsentees('II-CSE_A', 3)).status).toBe('all_present');
    expect((await t.ctx.reports.sessionAbsentees('II-CSE_B', 2)).status).toBe('not_found');
  });

  it('rejects an invalid session id', async () => {
    await expect(t.ctx.reports.sessionAbsentees('II-CSE_A', 0)).rejects.toThrow('Invalid session id');
  });

  it('rejects a session id beyond the safe integer range before reading storage', async () => {
    t.store.failWith = 'unreachable';
    await expect(t.ctx.reports.sessionAbsentees('II-CSE_A', 2 ** 53)).rejects.toThrow('Invalid session id');
  });

  it('rolls up one date', async () => {
    const report = await t.ctx.reports.absenteeRollup('II CSE A', { mode: 'date', date: '2024-01-01' });
    expect(report.section).toBe('II-CSE_A');
    expect(report.sessionCount).toBe(2);
    expect(report.entries.map((e) => [e.regdNo, e.absenceCount])).toEqual([
      ['R2', 2],
      ['R1', 1],
    ]);
  });

  it('rolls up the week ending on the anchor', async () => {
    const report = await t.ctx.reports.absenteeRollup('II-CSE_A', { mode: 'week', anchor: '2024-01-07' });
    expect(report.window).toEqual({ start: '2024-01-01', end: '2024-01-07' });
    expect(report.sessionCount).toBe(3);
    expect(report.entries[0].periodDates).toEqual(['2024-01-01 P1', '2024-01-01 P2']);
  });

  it('reports no sessions for an empty window', async () => {
    const report = await t.ctx.reports.absenteeRollup('II-CSE_A', { mode: 'daily', date: '2024-02-01' });
    expect(report.status).toBe('no_sessions');
  });

  it('rejects a range that ends before it starts', async () => {
    await expect(
      t.ctx.reports.absenteeRollup('II-CSE_A', { mode: 'range', start: '2024-01-05', end: '2024-01-01' })
    ).rejects.toBeInstanceOf(InvalidDateWindowError);
  });

  it('pivots absences by period', async () => {
    const report = await t.ctx.reports.periodSummary('II-CSE_A', '2024-01-01', '2024-01-31');
    expect(report.periods).toEqual(['1', '2', '3', '4', '5', '6']);
    expect(report.entries[0].periodCounts).toEqual({ '1': 1, '2': 1, '3': 0, '4': 0, '5': 0, '6': 0 });
  });

  it('computes percentages over all time', async () => {
    const report = await t.ctx.reports.percentage('II-CSE_A');
    expect(report.totalClasses).toBe(3);
    expect(report.entries.map((e) => [e.regdNo, e.percentage])).toEqual([
      ['R2', 33.33],
      ['R1', 66.67],
      ['R3', 100],
    ]);
  });

  it('computes percentages within a window', async () => {
    const report = await t.ctx.reports.percentage('II-CSE_A', { start: '2024-01-02', end: '2024-01-02' });
    expect(report.totalClasses).toBe(1);
    expect(report.entries.every((e) => e.percentage === 100)).toBe(true);
  });

  it('falls back to recorded students when the roster is gone', async () => {
    await t.store.recordSubmission(
      { section: 'II-CSE_B', attendanceDate: '2024-01-01', period: '1', submittedBy: 'fac1' },
      [{ regdNo: 'B1', name: 'Bhavya', present: true, parentName: '', parentPhone: '' }]
    );
    const report = await t.ctx.reports.percentage('II-CSE_B');
    expect(report.rosterAvailable).toBe(false);
    expect(report.entries).toEqual([
      { regdNo: 'B1', name: 'Bhavya', presents: 1, totalClasses: 1, absences: 0, percentage: 100 },
    ]);
  });

  it('validates the roster before querying storage', async () => {
    const broken = makeContext({ 'II-CSE_A.csv': `${ROSTER_HEADER.replace('Name', 'Full Name')}\nR1,Asha,,` });
    broken.store.failWith = 'connection refused';
    await expect(broken.ctx.reports.percentage('II-CSE_A')).rejects.toBeInstanceOf(MalformedRosterError);
    removeDir(broken.rosterDir);
  });

  it('itemizes one student', async () => {
    const report = await t.ctx.reports.student('II-CSE_A', 'R2', { mode: 'month', anchor: '2024-01-15' });
    expect(report.status).toBe('absences');
    expect(report.entries.map((e) => e.period)).toEqual(['1', '2']);
    const perfect = await t.ctx.reports.student('II-CSE_A', 'R3', { mode: 'month', anchor: '2024-01-15' });
    expect(perfect.status).toBe('perfect_attendance');
  });

  it('propagates storage outages instead of returning empty reports', async () => {
    t.store.failWith = 'connection refused';
    await expect(t.ctx.reports.absenteeRollup('II-CSE_A', { mode: 'date', date: '2024-01-01' })).rejects.toThrow(
      'Attendance storage unavailable while trying to list attendance sessions: connection refused'
    );
    await expect(t.ctx.reports.listSessions('II-CSE_A')).rejects.toBeInstanceOf(StorageUnavailableError);
  });
});
