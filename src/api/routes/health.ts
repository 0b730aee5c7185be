import { Router, Request, Response } from 'express';

const router = Router();

// GET /health (liveness probe)
router.get('/', (req: Request, res: Response) => {
  res.status(200).json({ status: 'alive', uptime: process.uptime() });
});

export default router;
