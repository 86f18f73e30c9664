import { AssEvent, AssEventKind, AssScript } from './types';

/**
 * Field order used when an [Events] section carries no Format line (ASS v4+ default)
 */
const DEFAULT_EVENT_FORMAT = [
  'layer',
  'start',
  'end',
  'style',
  'name',
  'marginl',
  'marginr',
  'marginv',
  'effect',
  'text',
];

type Section = 'none' | 'info' | 'styles' | 'events' | 'other';

/**
 * Converts ASS timestamp format (H:MM:SS.cc) to seconds
 * @param timestamp - Timestamp in format "H:MM:SS.cc" (centiseconds); milliseconds are accepted too
 * @returns Time in seconds (float)
 */
export function assTimeToSeconds(timestamp: string): number {
  const parts = timestamp.trim().split(':');

  if (parts.length !== 3) {
    throw new Error(`Invalid ASS timestamp format: ${timestamp}`);
  }

  const hours = parseInt(parts[0] ?? '0', 10);
  const minutes = parseInt(parts[1] ?? '0', 10);
  const secondsParts = (parts[2] ?? '0').split('.');
  const seconds = parseInt(secondsParts[0] ?? '0', 10);
  const fraction = parseInt((secondsParts[1] ?? '0').padEnd(3, '0').slice(0, 3), 10);

  if ([hours, minutes, seconds, fraction].some((value) => isNaN(value))) {
    throw new Error(`Invalid ASS timestamp format: ${timestamp}`);
  }

  return hours * 3600 + minutes * 60 + seconds + fraction / 1000;
}

/**
 * Converts seconds to ASS timestamp format (H:MM:SS.cc)
 * @param seconds - Time in seconds
 * @returns Timestamp in format "H:MM:SS.cc"
 */
export function secondsToAssTime(seconds: number): string {
  const totalCentis = Math.round(seconds * 100);
  const hours = Math.floor(totalCentis / 360000);
  const minutes = Math.floor((totalCentis % 360000) / 6000);
  const secs = Math.floor((totalCentis % 6000) / 100);
  const centis = totalCentis % 100;

  return (
    `${hours}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')}.` +
    `${centis.toString().padStart(2, '0')}`
  );
}

function sectionFromHeader(header: string): Section {
  switch (header.toLowerCase()) {
    case '[script info]':
      return 'info';
    case '[v4+ styles]':
    case '[v4 styles]':
      return 'styles';
    case '[events]':
      return 'events';
    default:
      return 'other';
  }
}

/**
 * Splits an event payload into exactly `fieldCount` fields.
 * The last field (Text) may itself contain commas.
 */
function splitEventFields(payload: string, fieldCount: number): string[] {
  const parts = payload.split(',');
  if (parts.length <= fieldCount) {
    return parts;
  }
  return [...parts.slice(0, fieldCount - 1), parts.slice(fieldCount - 1).join(',')];
}

function parseEvent(kind: AssEventKind, payload: string, format: string[]): AssEvent | null {
  const fields = splitEventFields(payload, format.length);
  const field = (name: string): string => {
    const idx = format.indexOf(name);
    return idx === -1 ? '' : (fields[idx] ?? '');
  };

  const start = field('start');
  const end = field('end');
  if (!start || !end) {
    return null;
  }

  const layer = parseInt(field('layer'), 10);

  return {
    kind,
    layer: isNaN(layer) ? 0 : layer,
    startTime: assTimeToSeconds(start),
    endTime: assTimeToSeconds(end),
    style: field('style').trim(),
    name: field('name').trim(),
    text: field('text'),
  };
}

/**
 * Parses ASS/SSA script content
 * @param content - The raw script content
 * @returns Script info, declared style names and all Dialogue/Comment events in file order
 */
export function parseAssContent(content: string): AssScript {
  const script: AssScript = { scriptInfo: {}, styles: [], events: [] };

  // Normalize line endings and drop a leading BOM
  const lines = content.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');

  let section: Section = 'none';
  let eventFormat = DEFAULT_EVENT_FORMAT;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line || line.startsWith(';')) continue;

    if (line.startsWith('[') && line.endsWith(']')) {
      section = sectionFromHeader(line);
      continue;
    }

    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trimStart();

    if (section === 'info') {
      script.scriptInfo[key] = value.trim();
      continue;
    }

    if (section === 'styles') {
      if (key.toLowerCase() === 'style') {
        const styleName = value.split(',')[0]?.trim();
        if (styleName) script.styles.push(styleName);
      }
      continue;
    }

    if (section !== 'events') continue;

    if (key.toLowerCase() === 'format') {
      eventFormat = value.split(',').map((f) => f.trim().toLowerCase());
      continue;
    }

    if (key !== 'Dialogue' && key !== 'Comment') continue;

    try {
      const event = parseEvent(key, value, eventFormat);
      if (event) {
        script.events.push(event);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`ASS: Skipping malformed event (${message}): ${line}`);
    }
  }

  return script;
}
