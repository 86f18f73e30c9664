import { RawRunInputs } from '../runs/types';

const PATH_FIELDS = [
  'remoteSource',
  'subtitleFile',
  'coverImage',
  'backgroundImage',
  'backgroundVideo',
  'audio',
] as const;

const FLAG_FIELDS = ['tvSized', 'ignoreOverlaps', 'forceDialogueStyle', 'generatePitches'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Picks the known run inputs out of a request body.
 * Flags accept booleans or the strings "true"/"false".
 */
export function parseRunInputs(body: unknown): RawRunInputs {
  const inputs: RawRunInputs = {};
  if (!isRecord(body)) {
    return inputs;
  }

  for (const field of PATH_FIELDS) {
    const value = body[field];
    if (typeof value === 'string') {
      inputs[field] = value;
    }
  }

  for (const field of FLAG_FIELDS) {
    const value = body[field];
    if (typeof value === 'boolean') {
      inputs[field] = value;
    } else if (value === 'true' || value === 'false') {
      inputs[field] = value === 'true';
    }
  }

  return inputs;
}

/**
 * Reads `{ index }` from a discard request body
 * @returns The line index, or undefined when it is not an integer
 */
export function parseDiscardIndex(body: unknown): number | undefined {
  const index = isRecord(body) ? body.index : undefined;
  return typeof index === 'number' && Number.isInteger(index) ? index : undefined;
}
