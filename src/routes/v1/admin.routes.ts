import { Router } from 'express';
import { AppContext } from '../../context';
import { createAdminController } from '../../controllers/admin.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';

export const createAdminRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createAdminController(ctx.auth);

  router.use(authenticate(ctx.config.jwt), authorizeRoles('Admin'));

  /**
   * @swagger
   * /admin/users:
   *   get:
   *     tags: [Admin]
   *     summary: List users
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Users with their roles
   *   put:
   *     tags: [Admin]
   *     summary: Add or update a user
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [username, password, role]
   *             properties:
   *               username:
   *                 type: string
   *               password:
   *                 type: string
   *               role:
   *                 type: string
   *                 enum: [Faculty, HOD, Admin, Coordinator]
   *     responses:
   *       200:
   *         description: User saved
   */
  router.get('/users', controller.listUsers);
  router.put('/users', controller.saveUser);

  return router;
};
