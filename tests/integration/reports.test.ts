import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/app';
import { generateAccessToken } from '../../src/config/jwt';
import { ROSTER_HEADER, TEST_JWT, TestContext, makeContext, removeDir } from '../utils/fixtures';

const bearer = (username: string, role: 'Faculty' | 'HOD' | 'Admin' | 'Coordinator') =>
  `Bearer ${generateAccessToken({ username, role }, TEST_JWT)}`;

describe('Attendance submission', () => {
  let t: TestContext;
  let app: Express;

  beforeEach(() => {
    t = makeContext();
    app = createApp(t.ctx);
  });

  afterEach(() => removeDir(t.rosterDir));

  it('records a faculty submission', async () => {
    const res = await request(app)
      .post('/api/v1/attendance')
      .set('Authorization', bearer('fac1', 'Faculty'))
      .send({ section: 'ii cse.a', date: '2024-01-05', period: 3, absentees: ['R3'] });

    expect(res.status).toBe(201);
    expect(res.body.message).toBe('Attendance for II-CSE_A P3 on 2024-01-05 submitted');
    expect(res.body.data).toEqual({
      sessionId: 1,
      section: 'II-CSE_A',
      date: '2024-01-05',
      period: '3',
      presentCount: 2,
      absentCount: 1,
      totalStudents: 3,
    });
    expect(t.store.sessions[0].submittedBy).toBe('fac1');
  });

  it('only accepts submissions from faculty', async () => {
    const res = await request(app)
      .post('/api/v1/attendance')
      .set('Authorization', bearer('hod', 'HOD'))
      .send({ section: 'II-CSE_A', date: '2024-01-05', period: '1', absentees: [] });
    expect(res.status).toBe(403);
  });

  it('validates the submission body', async () => {
    const res = await request(app)
      .post('/api/v1/attendance')
      .set('Authorization', bearer('fac1', 'Faculty'))
      .send({ section: 'II-CSE_A', period: '1' });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('date: Required');
  });

  it('reports a missing roster as 404', async () => {
    const res = await request(app)
      .post('/api/v1/attendance')
      .set('Authorization', bearer('fac1', 'Faculty'))
      .send({ section: 'II-CSE_B', date: '2024-01-05', period: '1', absentees: [] });
    expect(res.status).toBe(404);
    expect(res.body.message).toBe('No student roster available for section II-CSE_B. Upload one to continue.');
  });
});

describe('Report routes', () => {
  let t: TestContext;
  let app: Express;
  const hod = bearer('hod', 'HOD');
  const coord = bearer('coord', 'Coordinator');

  beforeAll(async () => {
    t = makeContext();
    app = createApp(t.ctx);
    // P1: Bala absent. P2: Asha and Bala absent.
    await t.ctx.attendance.submit({ section: 'II-CSE_A', date: '2024-01-01', period: '1', submittedBy: 'fac1', absentees: ['R2'] });
    await t.ctx.attendance.submit({
      section: 'II-CSE_A',
      date: '2024-01-01',
      period: '2',
      submittedBy: 'fac1',
      absentees: ['R1', 'R2'],
    });
  });

  afterAll(() => removeDir(t.rosterDir));

  it('rolls up the absentees of a date', async () => {
    const res = await request(app)
      .get('/api/v1/reports/ii%20cse.a/absentees')
      .query({ mode: 'date', date: '2024-01-01' })
      .set('Authorization', hod);

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Absentee report generated');
    expect(res.body.data.report.section).toBe('II-CSE_A');
    expect(res.body.data.table.rows).toEqual([
      {
        'Regd. No.': 'R2',
        Name: 'Bala',
        'Parent Name': 'Kumar',
        'Parent Phone': '9000000002',
        Period_Date: 'P1 (2024-01-01), P2 (2024-01-01)',
        'Absence Count': 2,
      },
      {
        'Regd. No.': 'R1',
        Name: 'Asha',
        'Parent Name': 'Ravi',
        'Parent Phone': '9000000001',
        Period_Date: 'P2 (2024-01-01)',
        'Absence Count': 1,
      },
    ]);
  });

  it('exports a report as CSV', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/absentees')
      .query({ mode: 'date', date: '2024-01-01', format: 'csv' })
      .set('Authorization', hod);

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/csv/);
    expect(res.headers['content-disposition']).toBe(
      'attachment; filename="II-CSE_A_date_absentees_2024-01-01_2024-01-01.csv"'
    );
    expect(res.text.split('\r\n')).toEqual([
      'Regd. No.,Name,Parent Name,Parent Phone,Period_Date,Absence Count',
      'R2,Bala,Kumar,9000000002,"P1 (2024-01-01), P2 (2024-01-01)",2',
      'R1,Asha,Ravi,9000000001,P2 (2024-01-01),1',
    ]);
  });

  it('keeps reports away from faculty', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/absentees')
      .query({ date: '2024-01-01' })
      .set('Authorization', bearer('fac1', 'Faculty'));
    expect(res.status).toBe(403);
  });

  it('requires both ends of a range', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/absentees')
      .query({ mode: 'range', start: '2024-01-01' })
      .set('Authorization', hod);
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('start and end are required for a range report');
  });

  it('rejects a reversed range', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/absentees')
      .query({ mode: 'range', start: '2024-01-05', end: '2024-01-01' })
      .set('Authorization', hod);
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Start date must be before or equal to end date');
  });

  it('rejects badly formatted dates', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/absentees')
      .query({ date: '01-01-2024' })
      .set('Authorization', hod);
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('date: Dates must be formatted YYYY-MM-DD');
  });

  it('reports an empty window without failing', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/absentees')
      .query({ mode: 'month', date: '2024-03-10' })
      .set('Authorization', hod);
    expect(res.status).toBe(200);
    expect(res.body.message).toBe('No attendance sessions in this window');
    expect(res.body.data.report.window).toEqual({ start: '2024-03-01', end: '2024-03-31' });
    expect(res.body.data.table.rows).toEqual([]);
  });

  it('serves the period summary to coordinators', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/period-summary')
      .query({ start: '2024-01-01', end: '2024-01-31' })
      .set('Authorization', coord);

    expect(res.status).toBe(200);
    expect(res.body.data.table.columns).toEqual([
      'Regd. No.',
      'Name',
      'Parent Name',
      'Parent Phone',
      'P1',
      'P2',
      'P3',
      'P4',
      'P5',
      'P6',
      'Absence Count',
      'Periods Absent',
    ]);
    expect(res.body.data.table.rows[0]).toMatchObject({ 'Regd. No.': 'R2', P1: 1, P2: 1, P3: 0, 'Absence Count': 2 });
  });

  it('requires a full range for the period summary', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/period-summary')
      .query({ start: '2024-01-01' })
      .set('Authorization', coord);
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('end: Required');
  });

  it('computes attendance percentages', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/percentage')
      .query({ start: '2024-01-01', end: '2024-01-01' })
      .set('Authorization', hod);

    expect(res.status).toBe(200);
    expect(res.body.data.report.totalClasses).toBe(2);
    expect(res.body.data.table.rows.map((row: Record<string, string>) => [row['Regd. No.'], row['% Attendance']])).toEqual([
      ['R2', '0.00'],
      ['R1', '50.00'],
      ['R3', '100.00'],
    ]);
  });

  it('looks up one student percentage by search query', async () => {
    const res = await request(app).get('/api/v1/reports/II-CSE_A/percentage').query({ q: 'chit' }).set('Authorization', hod);
    expect(res.body.data.report.entries).toEqual([
      { regdNo: 'R3', name: 'Chitra', presents: 2, totalClasses: 2, absences: 0, percentage: 100 },
    ]);
  });

  it('requires both percentage window ends or neither', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/percentage')
      .query({ start: '2024-01-01' })
      .set('Authorization', hod);
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Provide both start and end, or neither');
  });

  it('keeps the percentage report away from coordinators', async () => {
    const res = await request(app).get('/api/v1/reports/II-CSE_A/percentage').set('Authorization', coord);
    expect(res.status).toBe(403);
  });

  it('lists the absentees of one session', async () => {
    const res = await request(app).get('/api/v1/reports/II-CSE_A/sessions/2/absentees').set('Authorization', hod);
    expect(res.status).toBe(200);
    expect(res.body.data.report.absentees.map((a: { regdNo: string }) => a.regdNo)).toEqual(['R1', 'R2']);
  });

  it('answers 400 for a session id too large to address', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/sessions/100000000000000000000/absentees')
      .set('Authorization', hod);
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('sessionId: Number must be less than or equal to 9007199254740991');
  });

  it('answers 404 for a session outside the section', async () => {
    const res = await request(app).get('/api/v1/reports/II-CSE_B/sessions/2/absentees').set('Authorization', hod);
    expect(res.status).toBe(404);
    expect(res.body.message).toBe('Attendance session not found for this section');
  });

  it('itemizes one student', async () => {
    const res = await request(app)
      .get('/api/v1/reports/II-CSE_A/students/R2')
      .query({ mode: 'range', start: '2024-01-01', end: '2024-01-31' })
      .set('Authorization', hod);
    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Student absences retrieved');
    expect(res.body.data.table.rows.map((row: Record<string, string>) => row.Period)).toEqual(['1', '2']);
  });

  it('lists sessions most recent first', async () => {
    const res = await request(app).get('/api/v1/attendance/II-CSE_A/sessions').set('Authorization', hod);
    expect(res.status).toBe(200);
    expect(res.body.data.map((s: { id: number }) => s.id)).toEqual([2, 1]);
    expect(res.body.meta).toEqual({ total: 2 });
  });

  it('lists sections with data for coordinators', async () => {
    const res = await request(app).get('/api/v1/sections/with-data').set('Authorization', coord);
    expect(res.body.data).toEqual(['II-CSE_A']);
  });

  it('lists section availability', async () => {
    const res = await request(app).get('/api/v1/sections').set('Authorization', hod);
    expect(res.status).toBe(200);
    expect(res.body.data.available).toContain('II-CSE_A');
    expect(res.body.data.periods).toEqual(['1', '2', '3', '4', '5', '6']);
  });

  it('uploads and searches a roster', async () => {
    const upload = await request(app)
      .post('/api/v1/sections/ii%20cse%20b/roster')
      .set('Authorization', bearer('admin', 'Admin'))
      .attach('file', Buffer.from(`${ROSTER_HEADER}\nB1,Bhavya,Suresh,9000000011\nB2,Charan,Naidu,9000000012`), 'roster.csv');
    expect(upload.status).toBe(201);
    expect(upload.body.data).toEqual({ section: 'II-CSE_B', students: 2 });

    const search = await request(app)
      .get('/api/v1/sections/II-CSE_B/roster')
      .query({ q: 'char' })
      .set('Authorization', hod);
    expect(search.status).toBe(200);
    expect(search.body.data.students).toEqual([
      { regdNo: 'B2', name: 'Charan', parentName: 'Naidu', parentPhone: '9000000012' },
    ]);
  });

  it('refuses uploads that are not CSV', async () => {
    const res = await request(app)
      .post('/api/v1/sections/II-CSE_C/roster')
      .set('Authorization', bearer('admin', 'Admin'))
      .attach('file', Buffer.from('hello'), 'roster.txt');
    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Only .csv files are allowed');
  });

  it('refuses rosters without the mandatory columns', async () => {
    const res = await request(app)
      .post('/api/v1/sections/II-CSE_C/roster')
      .set('Authorization', bearer('fac1', 'Faculty'))
      .attach('file', Buffer.from('Regd. No.\nC1'), 'roster.csv');
    expect(res.status).toBe(422);
  });

  it('answers 503 when storage is down', async () => {
    t.store.failWith = 'connection refused';
    const res = await request(app).get('/api/v1/attendance/II-CSE_A/sessions').set('Authorization', hod);
    t.store.failWith = null;
    expect(res.status).toBe(503);
    expect(res.body.message).toBe('Attendance storage unavailable while trying to list attendance sessions: connection refused');
  });
});
