import { secondsToAssTime } from '../subtitles/assParser';
import { DecisionChannel, DiscardChoice, DiscardRequest } from './types';

/**
 * Asks one question and returns the answer, or null once input has ended
 */
export type Prompt = (question: string) => Promise<string | null>;

/**
 * The part of a readline/promises interface a prompt needs
 */
export interface LineReader {
  question(query: string, options: { signal: AbortSignal }): Promise<string>;
  once(event: 'close', listener: () => void): unknown;
}

const ABORT_ANSWERS = ['q', 'quit', 'abort'];

/**
 * Prompt over a line reader. Closing the reader, even while a question is waiting,
 * answers null.
 */
export function createLinePrompt(reader: LineReader): Prompt {
  const controller = new AbortController();
  reader.once('close', () => controller.abort());

  return async (question) => {
    if (controller.signal.aborted) {
      return null;
    }
    try {
      return await reader.question(question, { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        return null;
      }
      throw error;
    }
  };
}

/**
 * Interprets a typed answer. Anything that is not an integer or an abort word is unreadable.
 */
export function parseDiscardAnswer(answer: string): DiscardChoice | null {
  const trimmed = answer.trim().toLowerCase();

  if (ABORT_ANSWERS.includes(trimmed)) {
    return { type: 'abort' };
  }
  if (/^\d+$/.test(trimmed)) {
    return { type: 'discard', index: parseInt(trimmed, 10) };
  }
  return null;
}

/**
 * Renders a discard request as terminal text
 */
export function formatDiscardRequest(request: DiscardRequest): string {
  const lines = [
    '',
    `Overlap ${request.clusterNumber}/${request.clusterCount} (round ${request.round})`,
    'The following lines overlap, please select one to DISCARD.',
  ];

  if (request.rejection) {
    lines.push(`! ${request.rejection}`);
  }

  for (const member of request.members) {
    lines.push(
      `  [${member.index}] Time = ${secondsToAssTime(member.start)} to ${secondsToAssTime(member.end)}` +
        ` | Style = "${member.style}" | Text = ${member.preview}`
    );
  }

  return lines.join('\n');
}

/**
 * Decision channel reading answers from a terminal prompt.
 * End of input aborts the session.
 */
export function createTerminalChannel(prompt: Prompt, write: (text: string) => void): DecisionChannel {
  return {
    async chooseDiscard(request: DiscardRequest): Promise<DiscardChoice> {
      write(formatDiscardRequest(request));

      for (;;) {
        const answer = await prompt('Line to discard (q to abort): ');
        if (answer === null) {
          return { type: 'abort' };
        }

        const choice = parseDiscardAnswer(answer);
        if (choice) {
          return choice;
        }
        write(`"${answer.trim()}" is not a line number`);
      }
    },
  };
}
