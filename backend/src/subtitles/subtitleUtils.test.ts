import { describe, it, expect } from 'vitest';
import {
  createSubtitleLine,
  stripFormattingTags,
  hasKaraokeTiming,
  formatTimeMarker,
  selectChartLines,
} from './subtitleUtils';
import { AssEvent } from './types';

function event(overrides: Partial<AssEvent>): AssEvent {
  return {
    kind: 'Dialogue',
    layer: 0,
    startTime: 0,
    endTime: 1,
    style: 'Default',
    name: '',
    text: '',
    ...overrides,
  };
}

describe('createSubtitleLine', () => {
  it('should create a frozen line', () => {
    const line = createSubtitleLine(1, 2, 'Default', 'Hi');

    expect(line).toEqual({ start: 1, end: 2, style: 'Default', text: 'Hi' });
    expect(Object.isFrozen(line)).toBe(true);
  });

  it('should reject lines that do not start before they end', () => {
    expect(() => createSubtitleLine(2, 1, 'Default', 'Backwards')).toThrow('must start before it ends');
    expect(() => createSubtitleLine(1, 1, 'Default', 'Empty')).toThrow('must start before it ends');
    expect(() => createSubtitleLine(NaN, 1, 'Default', 'NaN')).toThrow('Invalid subtitle times');
  });
});

describe('stripFormattingTags', () => {
  it('should remove override blocks', () => {
    expect(stripFormattingTags('{\\k50}Hel{\\k50}lo')).toBe('Hello');
    expect(stripFormattingTags('{\\an8}{\\be1}Top')).toBe('Top');
  });

  it('should leave plain text untouched', () => {
    expect(stripFormattingTags('No tags here')).toBe('No tags here');
  });
});

describe('hasKaraokeTiming', () => {
  it('should detect karaoke timing tags', () => {
    expect(hasKaraokeTiming('{\\k50}Hi')).toBe(true);
    expect(hasKaraokeTiming('{\\kf20}Hi')).toBe(true);
    expect(hasKaraokeTiming('{\\ko10}Hi')).toBe(true);
    expect(hasKaraokeTiming('{\\K30}Hi')).toBe(true);
    expect(hasKaraokeTiming('{\\blur1\\k20}Hi')).toBe(true);
  });

  it('should ignore other tags and plain text', () => {
    expect(hasKaraokeTiming('{\\an8}Hi')).toBe(false);
    expect(hasKaraokeTiming('plain')).toBe(false);
  });
});

describe('formatTimeMarker', () => {
  it('should format seconds as MM:SS', () => {
    expect(formatTimeMarker(0)).toBe('00:00');
    expect(formatTimeMarker(65)).toBe('01:05');
    expect(formatTimeMarker(3661)).toBe('61:01');
  });
});

describe('selectChartLines', () => {
  const events: AssEvent[] = [
    event({ startTime: 1, endTime: 3, text: '{\\k50}Sing' }),
    event({ startTime: 2, endTime: 4, style: 'Dialogue', text: 'Talk' }),
    event({ kind: 'Comment', startTime: 5, endTime: 6, text: '{\\k20}Template' }),
    event({ startTime: 7, endTime: 7, text: '{\\k20}Zero' }),
    event({ startTime: 8, endTime: 9, style: 'dialogue', text: 'lower' }),
  ];

  it('should pick karaoke-timed dialogue events by default', () => {
    const lines = selectChartLines(events, { forceDialogueStyle: false, dialogueStyle: 'Dialogue' });

    expect(lines).toEqual([{ start: 1, end: 3, style: 'Default', text: '{\\k50}Sing' }]);
  });

  it('should pick dialogue-styled events when forced', () => {
    const lines = selectChartLines(events, { forceDialogueStyle: true, dialogueStyle: 'Dialogue' });

    expect(lines.map((line) => line.text)).toEqual(['Talk', 'lower']);
  });
});
