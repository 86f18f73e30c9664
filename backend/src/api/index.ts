import { Router } from 'express';
import runsRouter from './runs';
import uploadRouter from './upload';
import healthRouter from './health';

const router = Router();

router.use('/runs', runsRouter);
router.use('/upload', uploadRouter);
router.use('/health', healthRouter);

export default router;
