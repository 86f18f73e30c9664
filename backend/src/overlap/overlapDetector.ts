import { OverlapCluster } from './types';

/**
 * Anything with a half-open time interval [start, end)
 */
export interface TimedInterval {
  readonly start: number;
  readonly end: number;
}

/**
 * Two intervals overlap when each starts before the other ends.
 * Touching endpoints (a.end === b.start) do not count.
 */
export function linesOverlap(a: TimedInterval, b: TimedInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Groups overlapping lines into clusters (connected components of the interval graph).
 *
 * Lines are swept in (start, index) order while tracking the running cluster's latest
 * end. A line starting before that end joins the cluster; any other line closes it.
 * Only clusters of two or more lines are returned, in ascending order of start time.
 *
 * @param lines - The full line sequence; cluster members are indices into it
 * @param indices - Optional subset of indices to consider (defaults to every line)
 */
export function detectOverlaps(
  lines: readonly TimedInterval[],
  indices?: readonly number[]
): OverlapCluster[] {
  const candidates = indices ? [...indices] : lines.map((_, index) => index);

  const order: Array<{ index: number; line: TimedInterval }> = [];
  for (const index of candidates) {
    const line = lines[index];
    if (line) order.push({ index, line });
  }
  order.sort((a, b) => a.line.start - b.line.start || a.index - b.index);

  const clusters: OverlapCluster[] = [];
  let members: number[] = [];
  let clusterStart = 0;
  let clusterEnd = -Infinity;

  const close = (): void => {
    if (members.length >= 2) {
      clusters.push({ members, start: clusterStart, end: clusterEnd });
    }
  };

  for (const { index, line } of order) {
    if (members.length > 0 && line.start < clusterEnd) {
      members.push(index);
      clusterEnd = Math.max(clusterEnd, line.end);
      continue;
    }

    close();
    members = [index];
    clusterStart = line.start;
    clusterEnd = line.end;
  }
  close();

  return clusters;
}
