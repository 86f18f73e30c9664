import { AssEvent, SubtitleLine } from './types';
import { secondsToAssTime } from './assParser';

/** Inline override blocks such as `{\k25}` or `{\an8}` */
const FORMATTING_TAG_PATTERN = /\{(.*?)\}/g;

/** Karaoke timing overrides: \k, \K, \kf, \ko */
const KARAOKE_TAG_PATTERN = /\{[^}]*\\(?:k|K|kf|ko)\d+[^}]*\}/;

/**
 * Options controlling which events become chart lines
 */
export interface ChartLineOptions {
  /** Use lines styled as dialogue instead of karaoke-timed lines */
  forceDialogueStyle: boolean;
  /** Style name treated as dialogue (case-insensitive) */
  dialogueStyle: string;
}

/**
 * Creates an immutable subtitle line
 * @throws Error if the times are not finite or start is not before end
 */
export function createSubtitleLine(
  start: number,
  end: number,
  style: string,
  text: string
): SubtitleLine {
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new Error(`Invalid subtitle times: ${start} -> ${end}`);
  }
  if (start >= end) {
    throw new Error(`Subtitle line must start before it ends: ${start} -> ${end}`);
  }

  return Object.freeze({ start, end, style, text });
}

/**
 * Removes `{...}` formatting tags from subtitle text, for display only
 */
export function stripFormattingTags(text: string): string {
  return text.replace(FORMATTING_TAG_PATTERN, '');
}

/**
 * Whether the text carries karaoke syllable timing
 */
export function hasKaraokeTiming(text: string): boolean {
  return KARAOKE_TAG_PATTERN.test(text);
}

/**
 * Formats a time in seconds as MM:SS for compact display
 * @param seconds - Time in seconds
 * @returns Formatted time string
 */
export function formatTimeMarker(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

/**
 * Picks the events that make up the sung chart and converts them to subtitle lines.
 *
 * By default the lines carrying karaoke timing tags are used. With `forceDialogueStyle`
 * the lines styled as dialogue are used instead. Comment events never take part, and
 * events whose end does not come after their start are skipped.
 */
export function selectChartLines(events: AssEvent[], options: ChartLineOptions): SubtitleLine[] {
  const dialogueStyle = options.dialogueStyle.toLowerCase();
  const lines: SubtitleLine[] = [];

  for (const event of events) {
    if (event.kind !== 'Dialogue') continue;

    const selected = options.forceDialogueStyle
      ? event.style.toLowerCase() === dialogueStyle
      : hasKaraokeTiming(event.text);
    if (!selected) continue;

    if (event.endTime <= event.startTime) {
      console.warn(
        `Subtitles: Skipping zero-length line at ${secondsToAssTime(event.startTime)}: ${stripFormattingTags(event.text)}`
      );
      continue;
    }

    lines.push(createSubtitleLine(event.startTime, event.endTime, event.style, event.text));
  }

  return lines;
}
