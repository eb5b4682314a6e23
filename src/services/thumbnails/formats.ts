import { ThumbnailExtension } from '../../models/thumbnail';
import { UnsupportedFormatError } from '../../utils/errors';

export const DEFAULT_FORMAT = 'jpg';
export const DEFAULT_QUALITY = 90;

// Requested format (lowercase) => file extension
const FORMAT_EXTENSIONS = new Map<string, ThumbnailExtension>([
  ['jpg', 'jpg'],
  ['jpeg', 'jpg'],
  ['png', 'png'],
  ['gif', 'gif'],
  ['tif', 'tiff'],
  ['tiff', 'tiff'],
  ['bmp', 'bmp'],
  ['webp', 'webp']
]);

/**
 * Maps a requested format to the extension of the thumbnail file.
 *
 * Case-insensitive; `jpeg` becomes `jpg` and `tif` becomes `tiff`.
 * @throws UnsupportedFormatError for anything that is not an image format
 */
export function normalizeFormat(format: string): ThumbnailExtension {
  const extension = FORMAT_EXTENSIONS.get(format.trim().toLowerCase());
  if (!extension) {
    throw new UnsupportedFormatError(format);
  }
  return extension;
}
