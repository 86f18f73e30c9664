import { describe, it, expect } from 'vitest';
import { DecisionBroker } from './decisionBroker';
import { DiscardRequest } from '../overlap/types';

const request: DiscardRequest = {
  clusterNumber: 1,
  clusterCount: 1,
  round: 1,
  members: [
    { index: 0, start: 0, end: 5, style: 'Default', preview: 'First' },
    { index: 1, start: 3, end: 8, style: 'Default', preview: 'Second' },
  ],
};

describe('DecisionBroker', () => {
  it('should hold a request until it is answered', async () => {
    const broker = new DecisionBroker();
    const pending = broker.channelFor('run-1').chooseDiscard(request);

    expect(broker.getPending('run-1')?.request).toEqual(request);
    expect(broker.discard('run-1', 1)).toBe(true);
    expect(await pending).toEqual({ type: 'discard', index: 1 });
    expect(broker.getPending('run-1')).toBeUndefined();
  });

  it('should pass aborts through', async () => {
    const broker = new DecisionBroker();
    const pending = broker.channelFor('run-1').chooseDiscard(request);

    expect(broker.abort('run-1')).toBe(true);
    expect(await pending).toEqual({ type: 'abort' });
  });

  it('should report when nothing is waiting', () => {
    const broker = new DecisionBroker();

    expect(broker.discard('run-1', 0)).toBe(false);
    expect(broker.abort('run-1')).toBe(false);
  });

  it('should keep runs apart', async () => {
    const broker = new DecisionBroker();
    const first = broker.channelFor('run-1').chooseDiscard(request);
    const second = broker.channelFor('run-2').chooseDiscard({ ...request, round: 2 });

    expect(broker.getPending('run-2')?.request.round).toBe(2);
    broker.discard('run-2', 0);
    broker.discard('run-1', 1);

    expect(await first).toEqual({ type: 'discard', index: 1 });
    expect(await second).toEqual({ type: 'discard', index: 0 });
  });

  it('should refuse a second request for the same run', async () => {
    const broker = new DecisionBroker();
    const channel = broker.channelFor('run-1');
    const first = channel.chooseDiscard(request);

    await expect(channel.chooseDiscard(request)).rejects.toThrow(
      'Run run-1 already has a pending discard request'
    );

    broker.discard('run-1', 0);
    expect(await first).toEqual({ type: 'discard', index: 0 });
  });
});
