import path from 'node:path';
import { lookup } from 'mime-types';
import { NamingConvention, OutputFormat } from '../types/crop';

const ENCODABLE: ReadonlySet<string> = new Set<OutputFormat>(['PNG', 'JPEG', 'WEBP', 'GIF', 'TIFF', 'AVIF']);

const isOutputFormat = (value: string): value is OutputFormat => ENCODABLE.has(value);

/**
 * Map a declared media type to the encoding used for the output file.
 * Keeps the container format of the upload; anything missing or unknown becomes PNG.
 *
 * @example resolveFormat('image/jpg') // 'JPEG'
 */
export const resolveFormat = (declaredType?: string | null): OutputFormat => {
  if (!declaredType) return 'PNG';

  const mediaType = declaredType.split(';')[0].trim();
  const subtype = mediaType.split('/').pop() ?? '';
  const format = subtype.toUpperCase() === 'JPG' ? 'JPEG' : subtype.toUpperCase();

  return isOutputFormat(format) ? format : 'PNG';
};

export const mimeTypeForFormat = (format: OutputFormat): string => {
  return lookup(format.toLowerCase()) || 'application/octet-stream';
};

/**
 * Name an output after its input: `photo.png` becomes `photo_Cropped.png` (suffix)
 * or `cropped_photo.png` (prefix).
 */
export const outputNameFor = (inputName: string, naming: NamingConvention): string => {
  if (naming.style === 'prefix') {
    return `${naming.token}${inputName}`;
  }

  const { ext } = path.parse(inputName);
  const stem = inputName.slice(0, inputName.length - ext.length);
  return `${stem}${naming.token}${ext}`;
};
