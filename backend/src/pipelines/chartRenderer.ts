import fs from 'fs';
import path from 'path';
import { SubtitleLine, secondsToAssTime } from '../subtitles';
import { RunConfiguration } from '../runs/types';

/**
 * Everything the chart converter needs for one run. Read-only once handed off.
 */
export interface ChartHandoff {
  runId: string;
  configuration: RunConfiguration;
  lines: readonly SubtitleLine[];
  outputDir: string;
}

/**
 * Downstream converter producing the chart artifact
 */
export interface ChartRenderer {
  /**
   * @returns Absolute path of the produced artifact
   */
  render(handoff: ChartHandoff): Promise<string>;
}

/**
 * Looks up subtitles for a remote identifier. No network client ships with this service.
 */
export interface RemoteSubtitleSource {
  /**
   * @returns Raw ASS script content
   */
  fetchSubtitles(identifier: string): Promise<string>;
}

export const MANIFEST_FILE_NAME = 'chart-manifest.json';

/**
 * Writes the handoff as a JSON manifest for an external chart converter
 */
export class ManifestRenderer implements ChartRenderer {
  async render(handoff: ChartHandoff): Promise<string> {
    if (!fs.existsSync(handoff.outputDir)) {
      fs.mkdirSync(handoff.outputDir, { recursive: true });
    }

    const manifestPath = path.join(handoff.outputDir, MANIFEST_FILE_NAME);
    const manifest = {
      runId: handoff.runId,
      configuration: handoff.configuration,
      lines: handoff.lines.map((line) => ({
        start: line.start,
        end: line.end,
        startTime: secondsToAssTime(line.start),
        endTime: secondsToAssTime(line.end),
        style: line.style,
        text: line.text,
      })),
    };

    fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2), 'utf-8');
    return manifestPath;
  }
}
