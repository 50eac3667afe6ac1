import { Router } from 'express';
import { AppContext } from '../../context';
import { createAuthController } from '../../controllers/auth.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authLimiter } from '../../middleware/rateLimit.middleware';

export const createAuthRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const controller = createAuthController(ctx.auth, ctx.config.jwt);

  /**
   * @swagger
   * /auth/login:
   *   post:
   *     tags: [Authentication]
   *     summary: Login with username and password
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - username
   *               - password
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
   *         description: Login successful
   *       401:
   *         description: Invalid username or password
   *       403:
   *         description: Account role differs from the requested role
   */
  router.post('/login', authLimiter, controller.login);

  /**
   * @swagger
   * /auth/me:
   *   get:
   *     tags: [Authentication]
   *     summary: Current user
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Current user
   */
  router.get('/me', authenticate(ctx.config.jwt), controller.me);

  return router;
};
