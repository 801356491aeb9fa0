import { Request, Response, Router } from 'express';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    service: 'vocabulary-service',
    timestamp: new Date().toISOString()
  });
});

export default router;
