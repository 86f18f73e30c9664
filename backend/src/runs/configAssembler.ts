import fs from 'fs';
import path from 'path';
import { RawRunInputs, RunConfiguration, SubtitleSource } from './types';

export type RunInputField =
  | 'subtitleSource'
  | 'remoteSource'
  | 'subtitleFile'
  | 'coverImage'
  | 'backgroundImage'
  | 'backgroundVideo'
  | 'audio';

export type ValidationReason =
  | 'missing'
  | 'exclusive'
  | 'not-found'
  | 'not-a-file'
  | 'unreadable'
  | 'unsupported-type';

/**
 * Run inputs that violate a precondition. Always names the offending field.
 */
export class ValidationError extends Error {
  constructor(
    public readonly field: RunInputField,
    public readonly reason: ValidationReason,
    detail: string
  ) {
    super(`${field}: ${detail}`);
    this.name = 'ValidationError';
  }
}

type PathField = 'subtitleFile' | 'coverImage' | 'backgroundImage' | 'backgroundVideo' | 'audio';

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png'];

/**
 * Accepted file types per path field
 */
const FILE_RULES: Record<PathField, { label: string; extensions: string[] }> = {
  subtitleFile: { label: 'Subtitle file', extensions: ['.ass'] },
  coverImage: { label: 'Cover image', extensions: IMAGE_EXTENSIONS },
  backgroundImage: { label: 'Background image', extensions: IMAGE_EXTENSIONS },
  backgroundVideo: { label: 'Background video', extensions: ['.mp4'] },
  audio: { label: 'Audio', extensions: ['.mp3'] },
};

function presentText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Checks that a supplied path is an existing, readable file of an accepted type
 * @returns The absolute path
 */
function checkFile(field: PathField, value: string): string {
  const { label, extensions } = FILE_RULES[field];
  const resolved = path.resolve(value);

  const stats = fs.statSync(resolved, { throwIfNoEntry: false });
  if (!stats) {
    throw new ValidationError(field, 'not-found', `${label} not found: ${resolved}`);
  }
  if (!stats.isFile()) {
    throw new ValidationError(field, 'not-a-file', `${label} is not a file: ${resolved}`);
  }

  try {
    fs.accessSync(resolved, fs.constants.R_OK);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : 'EACCES';
    throw new ValidationError(field, 'unreadable', `${label} is not readable (${code}): ${resolved}`);
  }

  const ext = path.extname(resolved).toLowerCase();
  if (!extensions.includes(ext)) {
    throw new ValidationError(
      field,
      'unsupported-type',
      `${label} must be one of ${extensions.join(', ')} (got "${ext || 'no extension'}"): ${resolved}`
    );
  }

  return resolved;
}

function optionalFile(field: PathField, value: string | null | undefined): string | undefined {
  const present = presentText(value);
  return present === undefined ? undefined : checkFile(field, present);
}

function resolveSubtitleSource(raw: RawRunInputs): SubtitleSource {
  const identifier = presentText(raw.remoteSource);
  const file = presentText(raw.subtitleFile);

  if (identifier && file) {
    throw new ValidationError(
      'subtitleSource',
      'exclusive',
      'Specify either remoteSource or subtitleFile, not both'
    );
  }
  if (identifier) {
    return { kind: 'remote', identifier };
  }
  if (file) {
    return { kind: 'file', path: file };
  }

  throw new ValidationError('subtitleSource', 'missing', 'One of remoteSource or subtitleFile is required');
}

/**
 * Validates raw inputs and builds a frozen run configuration.
 *
 * Checks subtitle source exclusivity, cover image presence, then that every supplied
 * path is an existing readable file of the accepted type. Files are never opened.
 * @throws ValidationError on the first violated precondition
 */
export function assembleRunConfiguration(raw: RawRunInputs): RunConfiguration {
  const requested = resolveSubtitleSource(raw);

  const cover = presentText(raw.coverImage);
  if (!cover) {
    throw new ValidationError('coverImage', 'missing', 'Cover image is required');
  }

  const subtitleSource: SubtitleSource =
    requested.kind === 'file' ? { kind: 'file', path: checkFile('subtitleFile', requested.path) } : requested;
  const coverImage = checkFile('coverImage', cover);

  const backgroundImage = optionalFile('backgroundImage', raw.backgroundImage);
  const backgroundVideo = optionalFile('backgroundVideo', raw.backgroundVideo);
  const audio = optionalFile('audio', raw.audio);

  return Object.freeze({
    subtitleSource: Object.freeze(subtitleSource),
    coverImage,
    ...(backgroundImage ? { backgroundImage } : {}),
    ...(backgroundVideo ? { backgroundVideo } : {}),
    ...(audio ? { audio } : {}),
    flags: Object.freeze({
      tvSized: raw.tvSized ?? false,
      ignoreOverlaps: raw.ignoreOverlaps ?? false,
      forceDialogueStyle: raw.forceDialogueStyle ?? false,
      generatePitches: raw.generatePitches ?? false,
    }),
  });
}
