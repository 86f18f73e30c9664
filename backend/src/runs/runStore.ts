import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  RawRunInputs,
  Run,
  RunConfiguration,
  RunListItem,
  RunLogLevel,
  RunStatus,
  describeSource,
} from './types';
import { config } from '../config';

const MAX_LOGS = 100;

export type RunResults = Partial<Pick<Run, 'lineCount' | 'clusterCount' | 'decisions' | 'outputs'>>;

export interface RunStoreOptions {
  runsDir?: string;
  outputsDir?: string;
}

/**
 * Simple file-based run store
 */
export class RunStore {
  private runsDir: string;
  private outputsDir: string;

  constructor(options: RunStoreOptions = {}) {
    this.runsDir = options.runsDir ?? config.runsDir;
    this.outputsDir = options.outputsDir ?? config.outputsDir;
    this.ensureDirectory();
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.runsDir)) {
      fs.mkdirSync(this.runsDir, { recursive: true });
    }
  }

  private getRunPath(runId: string): string {
    return path.join(this.runsDir, `${runId}.json`);
  }

  private async require(runId: string): Promise<Run> {
    const run = await this.get(runId);
    if (!run) {
      throw new Error(`Run ${runId} not found`);
    }
    return run;
  }

  /**
   * Creates a new run from already assembled configuration
   */
  async create(inputs: RawRunInputs, configuration: RunConfiguration): Promise<Run> {
    const now = new Date();

    const run: Run = {
      id: uuidv4(),
      inputs,
      configuration,
      status: 'pending',
      progress: {
        stage: 'pending',
        currentStep: 'Waiting to start',
        completedStages: [],
        errors: [],
        logs: [],
      },
      createdAt: now,
      updatedAt: now,
    };

    await this.save(run);
    return run;
  }

  /**
   * Gets a run by ID
   */
  async get(runId: string): Promise<Run | null> {
    const runPath = this.getRunPath(runId);

    if (!fs.existsSync(runPath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(runPath, 'utf-8');
      const run = JSON.parse(content) as Run;

      // Convert date strings back to Date objects
      run.createdAt = new Date(run.createdAt);
      run.updatedAt = new Date(run.updatedAt);
      if (run.completedAt) {
        run.completedAt = new Date(run.completedAt);
      }
      if (run.progress.startedAt) {
        run.progress.startedAt = new Date(run.progress.startedAt);
      }
      for (const entry of run.progress.logs) {
        entry.timestamp = new Date(entry.timestamp);
      }

      return run;
    } catch (error) {
      console.error(`Failed to read run ${runId}:`, error);
      return null;
    }
  }

  /**
   * Saves a run
   */
  async save(run: Run): Promise<void> {
    run.updatedAt = new Date();
    fs.writeFileSync(this.getRunPath(run.id), JSON.stringify(run, null, 2), 'utf-8');
  }

  /**
   * Updates run status and current step
   */
  async updateStatus(runId: string, status: RunStatus, currentStep: string): Promise<void> {
    const run = await this.require(runId);

    // Mark previous stage as completed if moving to a new stage
    if (run.status !== status && run.status !== 'pending') {
      run.progress.completedStages.push(run.status);
    }
    if (run.status === 'pending' && status !== 'pending') {
      run.progress.startedAt = new Date();
    }

    run.status = status;
    run.progress.stage = status;
    run.progress.currentStep = currentStep;

    if (status === 'completed') {
      run.completedAt = new Date();
    }

    await this.save(run);
  }

  /**
   * Updates the current step within the current status
   */
  async updateStep(runId: string, currentStep: string): Promise<void> {
    const run = await this.require(runId);
    run.progress.currentStep = currentStep;
    await this.save(run);
  }

  /**
   * Records processing results on a run
   */
  async recordResults(runId: string, results: RunResults): Promise<void> {
    const run = await this.require(runId);
    Object.assign(run, results);
    await this.save(run);
  }

  /**
   * Ends a run without output: 'failed' on error, 'aborted' when the user stopped it
   */
  async setFinishedWithError(
    runId: string,
    status: Extract<RunStatus, 'failed' | 'aborted'>,
    error: string
  ): Promise<void> {
    const run = await this.require(runId);

    run.status = status;
    run.progress.stage = status;
    run.progress.currentStep = status === 'aborted' ? 'Aborted' : 'Failed';
    run.progress.errors.push(error);
    run.error = error;
    run.completedAt = new Date();
    run.progress.logs.push({ timestamp: new Date(), level: 'error', message: error, stage: status });

    await this.save(run);
  }

  /**
   * Adds a log entry to a run
   */
  async addLog(runId: string, level: RunLogLevel, message: string): Promise<void> {
    const run = await this.require(runId);

    run.progress.logs.push({
      timestamp: new Date(),
      level,
      message,
      stage: run.status,
    });

    // Keep only the latest entries
    if (run.progress.logs.length > MAX_LOGS) {
      run.progress.logs = run.progress.logs.slice(-MAX_LOGS);
    }

    await this.save(run);
  }

  /**
   * Lists all runs, newest first
   */
  async list(): Promise<RunListItem[]> {
    this.ensureDirectory();
    const files = fs.readdirSync(this.runsDir).filter((f) => f.endsWith('.json'));

    const runs: RunListItem[] = [];

    for (const file of files) {
      const run = await this.get(file.replace(/\.json$/, ''));

      if (run) {
        runs.push({
          id: run.id,
          source: describeSource(run.configuration.subtitleSource),
          status: run.status,
          createdAt: run.createdAt,
          clusterCount: run.clusterCount,
        });
      }
    }

    return runs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a run and its output directory
   */
  async delete(runId: string): Promise<boolean> {
    const runPath = this.getRunPath(runId);

    if (!fs.existsSync(runPath)) {
      return false;
    }

    fs.unlinkSync(runPath);

    const outputDir = this.getOutputDir(runId);
    if (fs.existsSync(outputDir)) {
      fs.rmSync(outputDir, { recursive: true });
    }

    return true;
  }

  /**
   * Gets the output directory for a run
   */
  getOutputDir(runId: string): string {
    return path.join(this.outputsDir, runId);
  }

  /**
   * Resolves a path stored relative to the outputs directory
   */
  resolveOutput(relativePath: string): string {
    return path.join(this.outputsDir, relativePath);
  }

  /**
   * Stores a path relative to the outputs directory
   */
  relativeOutput(absolutePath: string): string {
    return path.relative(this.outputsDir, absolutePath);
  }
}
