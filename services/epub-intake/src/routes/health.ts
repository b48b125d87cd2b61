import { Router } from 'express';

export function createHealthRouter(): Router {
  const router = Router();

  router.all('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  return router;
}
