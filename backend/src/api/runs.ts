import { Router, Request, Response, NextFunction } from 'express';
import fs from 'fs';
import path from 'path';
import { runStore, decisionBroker, assembleRunConfiguration } from '../runs';
import { preparationPipeline } from '../pipelines';
import { parseDiscardIndex, parseRunInputs } from './runInputs';

const router = Router();

/**
 * Error handler wrapper
 */
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

/**
 * GET /api/runs
 * List all runs
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const runs = await runStore.list();
    res.json({ runs });
  })
);

/**
 * POST /api/runs
 * Validate inputs and create a run (ValidationError becomes a 400)
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const inputs = parseRunInputs(req.body);
    const configuration = assembleRunConfiguration(inputs);
    const run = await runStore.create(inputs, configuration);
    res.status(201).json({ run });
  })
);

/**
 * GET /api/runs/:id
 * Get run details, including the discard request waiting for an answer
 */
router.get(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const runId = req.params.id ?? '';
    const run = await runStore.get(runId);

    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }

    res.json({ run, pendingDecision: decisionBroker.getPending(runId) ?? null });
  })
);

/**
 * POST /api/runs/:id/start
 * Start processing a run
 */
router.post(
  '/:id/start',
  asyncHandler(async (req: Request, res: Response) => {
    const runId = req.params.id ?? '';
    const run = await runStore.get(runId);

    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }

    if (run.status !== 'pending') {
      res.status(400).json({ error: 'Run has already been started' });
      return;
    }

    // Start pipeline in background
    preparationPipeline.run(runId).catch((error) => {
      console.error(`Pipeline failed for run ${runId}:`, error);
    });

    res.json({ message: 'Run started', runId });
  })
);

/**
 * POST /api/runs/:id/discard
 * Answer the pending discard request with { index }
 */
router.post(
  '/:id/discard',
  asyncHandler(async (req: Request, res: Response) => {
    const runId = req.params.id ?? '';
    const index = parseDiscardIndex(req.body);

    if (index === undefined) {
      res.status(400).json({ error: 'index must be an integer line index' });
      return;
    }

    if (!decisionBroker.discard(runId, index)) {
      res.status(409).json({ error: 'No discard request is waiting for this run' });
      return;
    }

    res.json({ message: `Line ${index} submitted for discard` });
  })
);

/**
 * POST /api/runs/:id/abort
 * Abort interactive resolution, or an interrupted run; the run ends without output
 */
router.post(
  '/:id/abort',
  asyncHandler(async (req: Request, res: Response) => {
    const runId = req.params.id ?? '';

    if (!(await preparationPipeline.abort(runId))) {
      res.status(409).json({ error: 'No discard request is waiting for this run' });
      return;
    }

    res.json({ message: 'Run aborted' });
  })
);

/**
 * DELETE /api/runs/:id
 * Delete a run
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const runId = req.params.id ?? '';
    const run = await runStore.get(runId);

    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }

    if (preparationPipeline.isActive(runId)) {
      res.status(409).json({ error: 'Run is still processing; abort it first' });
      return;
    }

    await runStore.delete(runId);
    res.json({ message: 'Run deleted' });
  })
);

/**
 * GET /api/runs/:id/download
 * Download the chart manifest
 */
router.get(
  '/:id/download',
  asyncHandler(async (req: Request, res: Response) => {
    const run = await runStore.get(req.params.id ?? '');

    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }

    if (run.status !== 'completed') {
      res.status(400).json({ error: 'Run not completed' });
      return;
    }

    const manifestPath = run.outputs?.manifestPath;
    if (!manifestPath) {
      res.status(404).json({ error: 'Manifest not available for this run' });
      return;
    }

    const fullPath = runStore.resolveOutput(manifestPath);
    if (!fs.existsSync(fullPath)) {
      res.status(404).json({ error: 'File not found' });
      return;
    }

    res.download(fullPath, path.basename(fullPath));
  })
);

export default router;
