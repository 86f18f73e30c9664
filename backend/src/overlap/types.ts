import { SubtitleLine } from '../subtitles/types';

/**
 * Indices of lines whose intervals intersect directly or through a shared member
 */
export interface OverlapCluster {
  /** Line indices into the original sequence, ordered by start time then index */
  readonly members: readonly number[];
  /** Earliest start among the members, in seconds */
  readonly start: number;
  /** Latest end among the members, in seconds */
  readonly end: number;
}

/**
 * How overlap clusters are settled
 */
export type ResolutionPolicy = 'interactive' | 'ignore-all';

/**
 * Per-cluster progress while resolving interactively
 */
export type ClusterState = 'pending' | 'awaiting-choice' | 'resolved';

/**
 * What a front end sees about one cluster member
 */
export interface MemberDescriptor {
  index: number;
  start: number;
  end: number;
  style: string;
  /** Text with formatting tags removed */
  preview: string;
}

/**
 * A request to pick one line to discard
 */
export interface DiscardRequest {
  /** 1-based position of the cluster in presentation order */
  clusterNumber: number;
  clusterCount: number;
  /** 1-based discard round within this cluster */
  round: number;
  members: MemberDescriptor[];
  /** Why the previous answer was refused, when this is a re-prompt */
  rejection?: string;
}

export type DiscardChoice = { type: 'discard'; index: number } | { type: 'abort' };

/**
 * Outward call made for every discard decision.
 * Implemented by the HTTP broker, the terminal prompt, or a test double.
 */
export interface DecisionChannel {
  chooseDiscard(request: DiscardRequest): Promise<DiscardChoice>;
}

export type ResolutionOptions =
  | { policy: 'ignore-all' }
  | { policy: 'interactive'; channel: DecisionChannel };

/**
 * Lines discarded from one cluster
 */
export interface ResolutionDecision {
  members: number[];
  discarded: number[];
}

export interface ResolutionResult {
  /** Surviving lines in their original order */
  lines: SubtitleLine[];
  /** Original indices of the surviving lines */
  keptIndices: number[];
  decisions: ResolutionDecision[];
}
