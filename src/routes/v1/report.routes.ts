import { Router } from 'express';
import { AppContext } from '../../context';
import { createReportController } from '../../controllers/report.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';

/**
 * @swagger
 * components:
 *   parameters:
 *     SectionParam:
 *       in: path
 *       name: section
 *       required: true
 *       schema:
 *         type: string
 *     FormatParam:
 *       in: query
 *       name: format
 *       schema:
 *         type: string
 *         enum: [json, csv]
 *         default: json
 */
export const createReportRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createReportController(ctx.reports);

  router.use(authenticate(ctx.config.jwt));

  /**
   * @swagger
   * /reports/{section}/sessions/{sessionId}/absentees:
   *   get:
   *     tags: [Reports]
   *     summary: Absentees of one session
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/SectionParam'
   *       - in: path
   *         name: sessionId
   *         required: true
   *         schema:
   *           type: integer
   *       - $ref: '#/components/parameters/FormatParam'
   *     responses:
   *       200:
   *         description: Absentee list
   *       404:
   *         description: Session not found in this section
   */
  router.get('/:section/sessions/:sessionId/absentees', authorizeRoles('HOD'), controller.sessionAbsentees);

  /**
   * @swagger
   * /reports/{section}/absentees:
   *   get:
   *     tags: [Reports]
   *     summary: Absentee roll-up
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/SectionParam'
   *       - in: query
   *         name: mode
   *         schema:
   *           type: string
   *           enum: [date, range, daily, week, month]
   *           default: date
   *       - in: query
   *         name: date
   *         schema:
   *           type: string
   *           format: date
   *         description: Day for date/daily, anchor for week/month (default today)
   *       - in: query
   *         name: start
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: end
   *         schema:
   *           type: string
   *           format: date
   *       - $ref: '#/components/parameters/FormatParam'
   *     responses:
   *       200:
   *         description: Roll-up report
   */
  router.get('/:section/absentees', authorizeRoles('HOD'), controller.absentees);

  /**
   * @swagger
   * /reports/{section}/period-summary:
   *   get:
   *     tags: [Reports]
   *     summary: Absences pivoted by period over a date range
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/SectionParam'
   *       - in: query
   *         name: start
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: end
   *         required: true
   *         schema:
   *           type: string
   *           format: date
   *       - $ref: '#/components/parameters/FormatParam'
   *     responses:
   *       200:
   *         description: Period summary
   */
  router.get('/:section/period-summary', authorizeRoles('HOD', 'Coordinator'), controller.periodSummary);

  /**
   * @swagger
   * /reports/{section}/percentage:
   *   get:
   *     tags: [Reports]
   *     summary: Attendance percentage per student
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/SectionParam'
   *       - in: query
   *         name: start
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: end
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: q
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/FormatParam'
   *     responses:
   *       200:
   *         description: Percentage report
   */
  router.get('/:section/percentage', authorizeRoles('HOD'), controller.percentage);

  /**
   * @swagger
   * /reports/{section}/students/{regdNo}:
   *   get:
   *     tags: [Reports]
   *     summary: One student's absences
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/SectionParam'
   *       - in: path
   *         name: regdNo
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: mode
   *         schema:
   *           type: string
   *           enum: [date, range, daily, week, month]
   *       - in: query
   *         name: date
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: start
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: end
   *         schema:
   *           type: string
   *           format: date
   *       - $ref: '#/components/parameters/FormatParam'
   *     responses:
   *       200:
   *         description: Student detail report
   */
  router.get('/:section/students/:regdNo', authorizeRoles('HOD'), controller.student);

  return router;
};
