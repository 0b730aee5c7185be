import { Router, Request, Response, NextFunction } from 'express';
import { DashboardService } from '../../services/dashboard/DashboardService';

export function createDashboardRouter(dashboardService: DashboardService): Router {
  const router = Router();

  // GET /
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const page = await dashboardService.renderPage();
      res.status(200).type('html').send(page);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
