import { Router } from 'express';
import { AppContext } from '../../context';
import { createSectionController } from '../../controllers/section.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';
import { uploadRosterCsv } from '../../middleware/upload.middleware';

export const createSectionRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createSectionController(ctx.resolver, ctx.rosters, ctx.reports);

  router.use(authenticate(ctx.config.jwt));

  /**
   * @swagger
   * /sections:
   *   get:
   *     tags: [Sections]
   *     summary: Sections with and without a roster on file, and the period labels
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Section availability
   */
  router.get('/', controller.listSections);

  /**
   * @swagger
   * /sections/with-data:
   *   get:
   *     tags: [Sections]
   *     summary: Sections that have attendance sessions
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Section ids
   */
  router.get('/with-data', authorizeRoles('HOD', 'Coordinator'), controller.sectionsWithData);

  /**
   * @swagger
   * /sections/{section}/roster:
   *   get:
   *     tags: [Sections]
   *     summary: Roster of a section
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: section
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: q
   *         schema:
   *           type: string
   *         description: Name or registration number substring
   *     responses:
   *       200:
   *         description: Roster entries
   *       404:
   *         description: No roster on file for the section
   *   post:
   *     tags: [Sections]
   *     summary: Upload a roster CSV
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: section
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             type: object
   *             properties:
   *               file:
   *                 type: string
   *                 format: binary
   *     responses:
   *       201:
   *         description: Roster saved
   *       422:
   *         description: Roster is missing required columns
   */
  router.get('/:section/roster', authorizeRoles('Faculty', 'HOD'), controller.getRoster);
  router.post('/:section/roster', authorizeRoles('Faculty', 'Admin'), uploadRosterCsv, controller.uploadRoster);

  return router;
};
