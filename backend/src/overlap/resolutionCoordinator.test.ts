import { describe, it, expect } from 'vitest';
import { resolveOverlaps, describeMembers } from './resolutionCoordinator';
import { detectOverlaps } from './overlapDetector';
import { AbortedResolutionError } from './errors';
import { DecisionChannel, DiscardChoice, DiscardRequest } from './types';
import { SubtitleLine } from '../subtitles/types';

function line(start: number, end: number, text = `${start}-${end}`, style = 'Default'): SubtitleLine {
  return { start, end, style, text };
}

/**
 * Channel answering from a fixed script and recording every request
 */
function scriptedChannel(answers: DiscardChoice[]): {
  channel: DecisionChannel;
  requests: DiscardRequest[];
} {
  const requests: DiscardRequest[] = [];
  const queue = [...answers];

  return {
    requests,
    channel: {
      async chooseDiscard(request) {
        requests.push(request);
        const next = queue.shift();
        if (!next) {
          throw new Error('No scripted answer left');
        }
        return next;
      },
    },
  };
}

const discard = (index: number): DiscardChoice => ({ type: 'discard', index });

describe('resolveOverlaps (interactive)', () => {
  it('should discard the chosen line of a two-line overlap', async () => {
    const lines = [line(0, 5), line(3, 8), line(10, 12)];
    const { channel, requests } = scriptedChannel([discard(1)]);

    const result = await resolveOverlaps(lines, detectOverlaps(lines), { policy: 'interactive', channel });

    expect(result.lines).toEqual([lines[0], lines[2]]);
    expect(result.keptIndices).toEqual([0, 2]);
    expect(result.decisions).toEqual([{ members: [0, 1], discarded: [1] }]);
    expect(requests).toHaveLength(1);
    expect(detectOverlaps(result.lines)).toEqual([]);
  });

  it('should settle a transitive cluster in one round when the middle line goes', async () => {
    const lines = [line(0, 5), line(3, 8), line(7, 10)];
    const { channel, requests } = scriptedChannel([discard(1)]);

    const result = await resolveOverlaps(lines, detectOverlaps(lines), { policy: 'interactive', channel });

    expect(result.keptIndices).toEqual([0, 2]);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.members.map((member) => member.index)).toEqual([0, 1, 2]);
  });

  it('should ask again while the remaining lines still overlap', async () => {
    const lines = [line(0, 10), line(2, 4), line(6, 8)];
    const { channel, requests } = scriptedChannel([discard(1), discard(2)]);

    const result = await resolveOverlaps(lines, detectOverlaps(lines), { policy: 'interactive', channel });

    expect(requests).toHaveLength(2);
    expect(requests[0]?.round).toBe(1);
    expect(requests[1]?.round).toBe(2);
    expect(requests[1]?.members.map((member) => member.index)).toEqual([0, 2]);
    expect(result.keptIndices).toEqual([0]);
    expect(result.decisions).toEqual([{ members: [0, 1, 2], discarded: [1, 2] }]);
  });

  it('should stop as soon as the remainder no longer overlaps', async () => {
    const lines = [line(0, 10), line(2, 4), line(6, 8)];
    const { channel, requests } = scriptedChannel([discard(0)]);

    const result = await resolveOverlaps(lines, detectOverlaps(lines), { policy: 'interactive', channel });

    expect(requests).toHaveLength(1);
    expect(result.keptIndices).toEqual([1, 2]);
  });

  it('should re-prompt when the choice is not a cluster member', async () => {
    const lines = [line(0, 5), line(3, 8), line(10, 12)];
    const { channel, requests } = scriptedChannel([discard(2), discard(7), discard(0)]);

    const result = await resolveOverlaps(lines, detectOverlaps(lines), { policy: 'interactive', channel });

    expect(requests).toHaveLength(3);
    expect(requests[0]?.rejection).toBeUndefined();
    expect(requests[1]?.rejection).toBe(
      'Line 2 is not part of the current overlap (choose one of 0, 1)'
    );
    expect(requests[2]?.rejection).toBe(
      'Line 7 is not part of the current overlap (choose one of 0, 1)'
    );
    expect(result.keptIndices).toEqual([1, 2]);
  });

  it('should present clusters in order of their earliest start', async () => {
    const lines = [line(20, 25), line(22, 27), line(0, 5), line(3, 8)];
    const clusters = detectOverlaps(lines).reverse();
    const { channel, requests } = scriptedChannel([discard(3), discard(1)]);

    const result = await resolveOverlaps(lines, clusters, { policy: 'interactive', channel });

    expect(requests.map((request) => request.clusterNumber)).toEqual([1, 2]);
    expect(requests.map((request) => request.clusterCount)).toEqual([2, 2]);
    expect(requests[0]?.members.map((member) => member.index)).toEqual([2, 3]);
    expect(result.keptIndices).toEqual([0, 2]);
  });

  it('should throw AbortedResolutionError when the caller aborts', async () => {
    const lines = [line(0, 5), line(3, 8), line(10, 12), line(11, 13)];
    const { channel } = scriptedChannel([discard(1), { type: 'abort' }]);

    const promise = resolveOverlaps(lines, detectOverlaps(lines), { policy: 'interactive', channel });

    await expect(promise).rejects.toBeInstanceOf(AbortedResolutionError);
    await expect(promise).rejects.toThrow('Overlap resolution aborted at cluster 2 of 2');
  });

  it('should treat a failing channel as an abort', async () => {
    const lines = [line(0, 5), line(3, 8)];
    const failure = new Error('window closed');
    const channel: DecisionChannel = {
      chooseDiscard: () => Promise.reject(failure),
    };

    const error = await resolveOverlaps(lines, detectOverlaps(lines), {
      policy: 'interactive',
      channel,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AbortedResolutionError);
    expect(error instanceof AbortedResolutionError ? error.cause : undefined).toBe(failure);
  });

  it('should not call the channel when nothing overlaps', async () => {
    const lines = [line(0, 1), line(1, 2)];
    const { channel, requests } = scriptedChannel([]);

    const result = await resolveOverlaps(lines, detectOverlaps(lines), { policy: 'interactive', channel });

    expect(requests).toHaveLength(0);
    expect(result.lines).toEqual(lines);
    expect(result.decisions).toEqual([]);
  });

  it('should give the same result for the same answers', async () => {
    const lines = [line(0, 10), line(2, 4), line(6, 8), line(20, 22), line(21, 23)];
    const answers = [discard(1), discard(0), discard(4)];

    const first = await resolveOverlaps(lines, detectOverlaps(lines), {
      policy: 'interactive',
      channel: scriptedChannel(answers).channel,
    });
    const second = await resolveOverlaps(lines, detectOverlaps(lines), {
      policy: 'interactive',
      channel: scriptedChannel(answers).channel,
    });

    expect(first).toEqual(second);
    expect(first.keptIndices).toEqual([2, 3]);
    expect(detectOverlaps(first.lines)).toEqual([]);
  });
});

describe('resolveOverlaps (ignore-all)', () => {
  it('should keep every line and record empty decisions', async () => {
    const lines = [line(0, 5), line(3, 8), line(10, 12)];

    const result = await resolveOverlaps(lines, detectOverlaps(lines), { policy: 'ignore-all' });

    expect(result.lines).toEqual(lines);
    expect(result.keptIndices).toEqual([0, 1, 2]);
    expect(result.decisions).toEqual([{ members: [0, 1], discarded: [] }]);
  });
});

describe('describeMembers', () => {
  it('should strip tags from the preview only', () => {
    const lines = [line(1, 2, '{\\k50}Hel{\\k50}lo', 'Romaji')];

    expect(describeMembers(lines, [0])).toEqual([
      { index: 0, start: 1, end: 2, style: 'Romaji', preview: 'Hello' },
    ]);
    expect(lines[0]?.text).toBe('{\\k50}Hel{\\k50}lo');
  });
});
