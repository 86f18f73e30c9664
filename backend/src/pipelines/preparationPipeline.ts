import fs from 'fs';
import { parseAssContent, selectChartLines, SubtitleLine } from '../subtitles';
import {
  AbortedResolutionError,
  DecisionChannel,
  detectOverlaps,
  OverlapCluster,
  resolveOverlaps,
  ResolutionResult,
} from '../overlap';
import { isFinished, Run, RunConfiguration } from '../runs/types';
import { assembleRunConfiguration } from '../runs/configAssembler';
import { RunStore } from '../runs/runStore';
import { DecisionBroker } from '../runs/decisionBroker';
import { ChartRenderer, ManifestRenderer, RemoteSubtitleSource } from './chartRenderer';
import { config } from '../config';

export interface PreparationPipelineOptions {
  store: RunStore;
  broker: DecisionBroker;
  renderer?: ChartRenderer;
  remoteSource?: RemoteSubtitleSource;
  dialogueStyle?: string;
}

/**
 * Pipeline taking a run from its configuration to an overlap-free chart handoff
 */
export class PreparationPipeline {
  private store: RunStore;
  private broker: DecisionBroker;
  private renderer: ChartRenderer;
  private remoteSource?: RemoteSubtitleSource;
  private dialogueStyle: string;
  private active = new Set<string>();

  constructor(options: PreparationPipelineOptions) {
    this.store = options.store;
    this.broker = options.broker;
    this.renderer = options.renderer ?? new ManifestRenderer();
    this.remoteSource = options.remoteSource;
    this.dialogueStyle = options.dialogueStyle ?? config.dialogueStyle;
  }

  /**
   * Whether this process is still working on the run
   */
  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  /**
   * Aborts a run. A waiting discard request is answered with an abort; a run left
   * unfinished by a pipeline that is no longer alive is marked aborted directly.
   * @returns False when the run is missing, finished, not started or busy in another stage
   */
  async abort(runId: string): Promise<boolean> {
    if (this.broker.abort(runId)) {
      return true;
    }

    const run = await this.store.get(runId);
    if (!run || run.status === 'pending' || isFinished(run.status) || this.active.has(runId)) {
      return false;
    }

    await this.store.setFinishedWithError(runId, 'aborted', `Run was interrupted during ${run.status}`);
    return true;
  }

  /**
   * Runs the complete pipeline for a run.
   * Nothing is rendered unless every overlap was settled.
   */
  async run(runId: string): Promise<void> {
    const run = await this.store.get(runId);
    if (!run) {
      throw new Error(`Run ${runId} not found`);
    }
    if (this.active.has(runId)) {
      throw new Error(`Run ${runId} is already being processed`);
    }
    this.active.add(runId);

    try {
      // Stage 1: Re-check inputs, files may have changed since the run was created
      const configuration = await this.validateInputs(run);

      // Stage 2: Load chart lines
      const lines = await this.loadLines(run, configuration);

      // Stage 3: Detect overlaps
      const clusters = await this.detect(run, lines);

      // Stage 4: Resolve overlaps
      const result = await this.resolve(run, configuration, lines, clusters);

      // Stage 5: Hand off to the chart renderer
      await this.render(run, configuration, result);

      await this.store.updateStatus(runId, 'completed', 'Chart preparation complete');
      await this.store.addLog(runId, 'success', 'Run completed');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      const status = error instanceof AbortedResolutionError ? 'aborted' : 'failed';
      await this.store.setFinishedWithError(runId, status, message);
      throw error;
    } finally {
      this.active.delete(runId);
    }
  }

  /**
   * Stage 1: Validate inputs
   */
  private async validateInputs(run: Run): Promise<RunConfiguration> {
    await this.store.updateStatus(run.id, 'validating', 'Validating inputs');
    return assembleRunConfiguration(run.inputs);
  }

  /**
   * Stage 2: Read the subtitle script and select the chart lines
   */
  private async loadLines(run: Run, configuration: RunConfiguration): Promise<SubtitleLine[]> {
    await this.store.updateStatus(run.id, 'loading', 'Loading subtitles');

    const source = configuration.subtitleSource;
    let content: string;

    if (source.kind === 'file') {
      content = fs.readFileSync(source.path, 'utf-8');
    } else {
      if (!this.remoteSource) {
        throw new Error(
          `Remote subtitle lookup is not available (${source.identifier}); supply a local subtitle file`
        );
      }
      content = await this.remoteSource.fetchSubtitles(source.identifier);
    }

    const script = parseAssContent(content);
    const lines = selectChartLines(script.events, {
      forceDialogueStyle: configuration.flags.forceDialogueStyle,
      dialogueStyle: this.dialogueStyle,
    });

    if (lines.length === 0) {
      throw new Error(
        configuration.flags.forceDialogueStyle
          ? `No lines styled "${this.dialogueStyle}" found in subtitles`
          : 'No karaoke-timed lines found in subtitles (try forceDialogueStyle)'
      );
    }

    await this.store.recordResults(run.id, { lineCount: lines.length });
    await this.store.addLog(
      run.id,
      'info',
      `Loaded ${lines.length} of ${script.events.length} subtitle events`
    );

    return lines;
  }

  /**
   * Stage 3: Group overlapping lines
   */
  private async detect(run: Run, lines: SubtitleLine[]): Promise<OverlapCluster[]> {
    await this.store.updateStatus(run.id, 'detecting', 'Detecting overlapping lines');

    const clusters = detectOverlaps(lines);

    await this.store.recordResults(run.id, { clusterCount: clusters.length });
    await this.store.addLog(
      run.id,
      clusters.length > 0 ? 'warn' : 'info',
      `Found ${clusters.length} overlap cluster(s)`
    );

    return clusters;
  }

  /**
   * Stage 4: Settle overlaps, interactively unless the run ignores them
   */
  private async resolve(
    run: Run,
    configuration: RunConfiguration,
    lines: SubtitleLine[],
    clusters: OverlapCluster[]
  ): Promise<ResolutionResult> {
    await this.store.updateStatus(run.id, 'resolving', 'Resolving overlaps');

    const result = configuration.flags.ignoreOverlaps
      ? await resolveOverlaps(lines, clusters, { policy: 'ignore-all' })
      : await resolveOverlaps(lines, clusters, {
          policy: 'interactive',
          channel: this.trackedChannel(run.id),
        });

    const discardedCount = lines.length - result.lines.length;
    await this.store.recordResults(run.id, { decisions: result.decisions });
    await this.store.addLog(
      run.id,
      'info',
      configuration.flags.ignoreOverlaps && clusters.length > 0
        ? 'Overlaps ignored; the chart may need manual editing'
        : `Discarded ${discardedCount} line(s)`
    );

    return result;
  }

  /**
   * Stage 5: Render
   */
  private async render(
    run: Run,
    configuration: RunConfiguration,
    result: ResolutionResult
  ): Promise<void> {
    await this.store.updateStatus(run.id, 'rendering', 'Handing off to the chart renderer');

    const artifactPath = await this.renderer.render({
      runId: run.id,
      configuration,
      lines: result.lines,
      outputDir: this.store.getOutputDir(run.id),
    });

    await this.store.recordResults(run.id, {
      outputs: { manifestPath: this.store.relativeOutput(artifactPath) },
    });
  }

  /**
   * Broker channel that keeps the run record in step with each request
   */
  private trackedChannel(runId: string): DecisionChannel {
    const channel = this.broker.channelFor(runId);

    return {
      chooseDiscard: async (request) => {
        await this.store.updateStep(
          runId,
          `Choose a line to discard (overlap ${request.clusterNumber}/${request.clusterCount}, round ${request.round})`
        );
        if (request.rejection) {
          await this.store.addLog(runId, 'warn', request.rejection);
        }

        const choice = await channel.chooseDiscard(request);

        if (choice.type === 'discard') {
          await this.store.addLog(runId, 'info', `Discard requested for line ${choice.index}`);
        }
        return choice;
      },
    };
  }
}
