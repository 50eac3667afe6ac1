import { Router } from 'express';
import { AppContext } from '../../context';
import { createAttendanceController } from '../../controllers/attendance.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';

export const createAttendanceRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createAttendanceController(ctx.attendance, ctx.reports);

  router.use(authenticate(ctx.config.jwt));

  /**
   * @swagger
   * /attendance:
   *   post:
   *     tags: [Attendance]
   *     summary: Submit attendance for one period
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [section, date, period]
   *             properties:
   *               section:
   *                 type: string
   *               date:
   *                 type: string
   *                 format: date
   *               period:
   *                 type: string
   *               absentees:
   *                 type: array
   *                 items:
   *                   type: string
   *     responses:
   *       201:
   *         description: Attendance recorded
   */
  router.post('/', authorizeRoles('Faculty'), controller.submit);

  /**
   * @swagger
   * /attendance/{section}/sessions:
   *   get:
   *     tags: [Attendance]
   *     summary: All sessions of a section, most recent first
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: section
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Sessions
   */
  router.get('/:section/sessions', authorizeRoles('HOD'), controller.listSessions);

  return router;
};
