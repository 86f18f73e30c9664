import { Router, Request, Response } from 'express';
import fs from 'fs';
import { config } from '../config';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get('/', (_req: Request, res: Response) => {
  const dirs = {
    uploads: fs.existsSync(config.uploadsDir),
    outputs: fs.existsSync(config.outputsDir),
    runs: fs.existsSync(config.runsDir),
  };

  res.json({
    status: Object.values(dirs).every(Boolean) ? 'healthy' : 'degraded',
    storage: dirs,
    config: {
      dialogueStyle: config.dialogueStyle,
      maxFileSize: config.maxFileSize,
      remoteLookup: false,
    },
  });
});

export default router;
