import { SubtitleLine } from '../subtitles/types';
import { stripFormattingTags, formatTimeMarker } from '../subtitles/subtitleUtils';
import { detectOverlaps } from './overlapDetector';
import { AbortedResolutionError, InvalidSelectionError } from './errors';
import {
  ClusterState,
  DecisionChannel,
  DiscardChoice,
  MemberDescriptor,
  OverlapCluster,
  ResolutionDecision,
  ResolutionOptions,
  ResolutionResult,
} from './types';

interface ClusterContext {
  lines: readonly SubtitleLine[];
  channel: DecisionChannel;
  clusterNumber: number;
  clusterCount: number;
}

function logState(context: ClusterContext, state: ClusterState, detail: string): void {
  console.log(`Overlaps: cluster ${context.clusterNumber}/${context.clusterCount} ${state} (${detail})`);
}

/**
 * Builds the descriptors shown to the front end for the given member indices
 */
export function describeMembers(
  lines: readonly SubtitleLine[],
  members: readonly number[]
): MemberDescriptor[] {
  const descriptors: MemberDescriptor[] = [];
  for (const index of members) {
    const line = lines[index];
    if (!line) continue;
    descriptors.push({
      index,
      start: line.start,
      end: line.end,
      style: line.style,
      preview: stripFormattingTags(line.text),
    });
  }
  return descriptors;
}

/**
 * Asks the channel until it names a member of `overlap`.
 * Invalid answers are re-prompted with the reason attached.
 */
async function requestDiscard(
  context: ClusterContext,
  overlap: OverlapCluster,
  round: number
): Promise<number> {
  const members = describeMembers(context.lines, overlap.members);
  let rejection: string | undefined;

  for (;;) {
    let choice: DiscardChoice;
    try {
      choice = await context.channel.chooseDiscard({
        clusterNumber: context.clusterNumber,
        clusterCount: context.clusterCount,
        round,
        members,
        ...(rejection ? { rejection } : {}),
      });
    } catch (error) {
      throw new AbortedResolutionError(context.clusterNumber, context.clusterCount, { cause: error });
    }

    if (choice.type === 'abort') {
      throw new AbortedResolutionError(context.clusterNumber, context.clusterCount);
    }

    if (overlap.members.includes(choice.index)) {
      return choice.index;
    }

    const invalid = new InvalidSelectionError(choice.index, overlap.members);
    console.warn(`Overlaps: ${invalid.message}`);
    rejection = invalid.message;
  }
}

/**
 * Resolves one cluster: one discard per round, re-detecting on the remainder
 * until none of the remaining members overlap.
 * @returns Indices discarded from this cluster, in the order chosen
 */
async function resolveCluster(context: ClusterContext, cluster: OverlapCluster): Promise<number[]> {
  let remaining = [...cluster.members];
  const discarded: number[] = [];

  logState(context, 'pending', `${remaining.length} lines from ${formatTimeMarker(cluster.start)}`);

  for (let round = 1; ; round++) {
    const overlap = detectOverlaps(context.lines, remaining)[0];
    if (!overlap) break;

    logState(context, 'awaiting-choice', `round ${round}, ${overlap.members.length} lines`);
    const choice = await requestDiscard(context, overlap, round);

    discarded.push(choice);
    remaining = remaining.filter((index) => index !== choice);
  }

  logState(context, 'resolved', `discarded ${discarded.join(', ') || 'nothing'}`);
  return discarded;
}

/**
 * Settles every overlap cluster and returns the overlap-free line sequence.
 *
 * With `ignore-all` nothing is discarded and overlaps pass through unchanged.
 * With `interactive` clusters are resolved one at a time in order of their earliest
 * start. Aborting (or a failing channel) throws `AbortedResolutionError` and no
 * partial result is produced.
 */
export async function resolveOverlaps(
  lines: readonly SubtitleLine[],
  clusters: readonly OverlapCluster[],
  options: ResolutionOptions
): Promise<ResolutionResult> {
  const ordered = [...clusters].sort(
    (a, b) => a.start - b.start || (a.members[0] ?? 0) - (b.members[0] ?? 0)
  );

  if (options.policy === 'ignore-all') {
    if (ordered.length > 0) {
      console.warn(`Overlaps: Ignoring ${ordered.length} overlap cluster(s); lines kept as-is`);
    }
    return {
      lines: [...lines],
      keptIndices: lines.map((_, index) => index),
      decisions: ordered.map((cluster) => ({ members: [...cluster.members], discarded: [] })),
    };
  }

  const removed = new Set<number>();
  const decisions: ResolutionDecision[] = [];

  for (const [position, cluster] of ordered.entries()) {
    const discarded = await resolveCluster(
      {
        lines,
        channel: options.channel,
        clusterNumber: position + 1,
        clusterCount: ordered.length,
      },
      cluster
    );
    discarded.forEach((index) => removed.add(index));
    decisions.push({ members: [...cluster.members], discarded });
  }

  const keptIndices = lines.map((_, index) => index).filter((index) => !removed.has(index));

  return {
    lines: lines.filter((_, index) => !removed.has(index)),
    keptIndices,
    decisions,
  };
}
