import { DecisionChannel, DiscardChoice, DiscardRequest } from '../overlap/types';

export interface PendingDecision {
  request: DiscardRequest;
  askedAt: Date;
}

interface Waiter extends PendingDecision {
  answer: (choice: DiscardChoice) => void;
}

/**
 * Parks discard requests per run until an HTTP caller answers them.
 * Each run has at most one outstanding request, since its coordinator awaits every answer.
 */
export class DecisionBroker {
  private waiters = new Map<string, Waiter>();

  /**
   * Decision channel bound to one run
   */
  channelFor(runId: string): DecisionChannel {
    return {
      chooseDiscard: (request: DiscardRequest) =>
        new Promise<DiscardChoice>((resolve, reject) => {
          if (this.waiters.has(runId)) {
            reject(new Error(`Run ${runId} already has a pending discard request`));
            return;
          }
          this.waiters.set(runId, { request, askedAt: new Date(), answer: resolve });
        }),
    };
  }

  /**
   * The request currently waiting for an answer, if any
   */
  getPending(runId: string): PendingDecision | undefined {
    const waiter = this.waiters.get(runId);
    return waiter ? { request: waiter.request, askedAt: waiter.askedAt } : undefined;
  }

  /**
   * Answers the pending request with a line to discard.
   * The index is passed through as given; the coordinator re-prompts if it is not a member.
   * @returns False when nothing is waiting
   */
  discard(runId: string, index: number): boolean {
    return this.settle(runId, { type: 'discard', index });
  }

  /**
   * Ends the interactive session for a run
   * @returns False when nothing is waiting
   */
  abort(runId: string): boolean {
    return this.settle(runId, { type: 'abort' });
  }

  private settle(runId: string, choice: DiscardChoice): boolean {
    const waiter = this.waiters.get(runId);
    if (!waiter) {
      return false;
    }
    this.waiters.delete(runId);
    waiter.answer(choice);
    return true;
  }
}
