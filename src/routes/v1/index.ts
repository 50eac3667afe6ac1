import { Router } from 'express';
import { AppContext } from '../../context';
import { createAdminRoutes } from './admin.routes';
import { createAttendanceRoutes } from './attendance.routes';
import { createAuthRoutes } from './auth.routes';
import { createReportRoutes } from './report.routes';
import { createSectionRoutes } from './section.routes';

export const createV1Router = (ctx: AppContext): Router => {
  const router = Router();

  router.use('/auth', createAuthRoutes(ctx));
  router.use('/admin', createAdminRoutes(ctx));
  router.use('/sections', createSectionRoutes(ctx));
  router.use('/attendance', createAttendanceRoutes(ctx));
  router.use('/reports', createReportRoutes(ctx));

  return router;
};
