import { ResolutionDecision } from '../overlap/types';

/**
 * Run inputs as collected by a front end. Blank strings count as absent.
 */
export interface RawRunInputs {
  /** Remote lookup identifier (e.g. a karaoke database URL) */
  remoteSource?: string | null;
  /** Local .ass subtitle file */
  subtitleFile?: string | null;
  coverImage?: string | null;
  backgroundImage?: string | null;
  backgroundVideo?: string | null;
  audio?: string | null;
  /** Appends "(TV)" to the song title */
  tvSized?: boolean;
  ignoreOverlaps?: boolean;
  forceDialogueStyle?: boolean;
  generatePitches?: boolean;
}

export type SubtitleSource =
  | { readonly kind: 'remote'; readonly identifier: string }
  | { readonly kind: 'file'; readonly path: string };

export interface RunFlags {
  readonly tvSized: boolean;
  readonly ignoreOverlaps: boolean;
  readonly forceDialogueStyle: boolean;
  readonly generatePitches: boolean;
}

/**
 * Validated, immutable bundle of sources and flags for one chart conversion
 */
export interface RunConfiguration {
  readonly subtitleSource: SubtitleSource;
  readonly coverImage: string;
  readonly backgroundImage?: string;
  readonly backgroundVideo?: string;
  readonly audio?: string;
  readonly flags: RunFlags;
}

/**
 * Possible run status values
 */
export type RunStatus =
  | 'pending'
  | 'validating'
  | 'loading'
  | 'detecting'
  | 'resolving'
  | 'rendering'
  | 'completed'
  | 'failed'
  | 'aborted';

export type RunLogLevel = 'info' | 'warn' | 'error' | 'success';

export interface RunLogEntry {
  timestamp: Date;
  level: RunLogLevel;
  message: string;
  stage: RunStatus;
}

/**
 * Detailed progress information for a run
 */
export interface RunProgress {
  stage: RunStatus;
  currentStep: string;
  startedAt?: Date;
  completedStages: RunStatus[];
  errors: string[];
  logs: RunLogEntry[];
}

/**
 * Complete run definition
 */
export interface Run {
  id: string;
  inputs: RawRunInputs;
  configuration: RunConfiguration;
  status: RunStatus;
  progress: RunProgress;

  // Processing results
  lineCount?: number;
  clusterCount?: number;
  decisions?: ResolutionDecision[];

  // Output paths (relative to outputs dir)
  outputs?: {
    manifestPath?: string;
  };

  // Metadata
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  error?: string;
}

/**
 * Run list response
 */
export interface RunListItem {
  id: string;
  source: string;
  status: RunStatus;
  createdAt: Date;
  clusterCount?: number;
}

/**
 * Short label for a subtitle source
 */
export function describeSource(source: SubtitleSource): string {
  return source.kind === 'remote' ? source.identifier : source.path;
}

/**
 * Whether the run can no longer change
 */
export function isFinished(status: RunStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'aborted';
}
