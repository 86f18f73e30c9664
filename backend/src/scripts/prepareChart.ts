/**
 * Prepares a local .ass file for chart conversion from the terminal
 * Run with: npm run prepare-chart -- --subtitles song.ass --cover cover.jpg [--ignore-overlaps]
 */

import fs from 'fs';
import path from 'path';
import readline from 'readline/promises';
import { parseArgs } from 'util';
import { assembleRunConfiguration, ValidationError } from '../runs/configAssembler';
import { parseAssContent, selectChartLines } from '../subtitles';
import {
  AbortedResolutionError,
  createLinePrompt,
  createTerminalChannel,
  detectOverlaps,
  resolveOverlaps,
} from '../overlap';
import { ManifestRenderer } from '../pipelines/chartRenderer';
import { config } from '../config';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      subtitles: { type: 'string' },
      remote: { type: 'string' },
      cover: { type: 'string' },
      background: { type: 'string' },
      video: { type: 'string' },
      audio: { type: 'string' },
      tv: { type: 'boolean', default: false },
      'ignore-overlaps': { type: 'boolean', default: false },
      'force-dialogue': { type: 'boolean', default: false },
      pitches: { type: 'boolean', default: false },
      out: { type: 'string' },
    },
  });

  const configuration = assembleRunConfiguration({
    remoteSource: values.remote,
    subtitleFile: values.subtitles,
    coverImage: values.cover,
    backgroundImage: values.background,
    backgroundVideo: values.video,
    audio: values.audio,
    tvSized: values.tv,
    ignoreOverlaps: values['ignore-overlaps'],
    forceDialogueStyle: values['force-dialogue'],
    generatePitches: values.pitches,
  });

  const source = configuration.subtitleSource;
  if (source.kind !== 'file') {
    throw new Error('Remote subtitle lookup is not available from the terminal; pass --subtitles');
  }

  const script = parseAssContent(fs.readFileSync(source.path, 'utf-8'));
  const lines = selectChartLines(script.events, {
    forceDialogueStyle: configuration.flags.forceDialogueStyle,
    dialogueStyle: config.dialogueStyle,
  });
  const clusters = detectOverlaps(lines);
  console.log(`Loaded ${lines.length} lines, ${clusters.length} overlap cluster(s)`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  try {
    const channel = createTerminalChannel(createLinePrompt(rl), (text) => console.log(text));

    const result = configuration.flags.ignoreOverlaps
      ? await resolveOverlaps(lines, clusters, { policy: 'ignore-all' })
      : await resolveOverlaps(lines, clusters, { policy: 'interactive', channel });

    const runId = `local-${Date.now()}`;
    const manifestPath = await new ManifestRenderer().render({
      runId,
      configuration,
      lines: result.lines,
      outputDir: path.resolve(values.out ?? path.join(config.outputsDir, runId)),
    });

    console.log(`Kept ${result.lines.length} of ${lines.length} lines`);
    console.log(`Manifest written to ${manifestPath}`);
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ValidationError || error instanceof AbortedResolutionError) {
    console.error(error.message);
  } else {
    console.error('Chart preparation failed:', error);
  }
  process.exit(1);
});
