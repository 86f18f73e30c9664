/**
 * A single timed line of a subtitle track.
 * Lines are never mutated; their identity is their position in the original sequence.
 */
export interface SubtitleLine {
  /** Start time in seconds */
  readonly start: number;
  /** End time in seconds (always greater than start) */
  readonly end: number;
  /** Style tag, e.g. "Dialogue" or "Sample KM [Up]" */
  readonly style: string;
  /** Raw text, inline `{...}` override tags included */
  readonly text: string;
}

/**
 * Event kinds found in the [Events] section of an ASS script
 */
export type AssEventKind = 'Dialogue' | 'Comment';

/**
 * Raw parsed ASS event before it becomes a SubtitleLine
 */
export interface AssEvent {
  kind: AssEventKind;
  layer: number;
  startTime: number;
  endTime: number;
  style: string;
  name: string;
  text: string;
}

/**
 * Parsed ASS script: metadata from [Script Info], declared style names and events
 */
export interface AssScript {
  scriptInfo: Record<string, string>;
  styles: string[];
  events: AssEvent[];
}
