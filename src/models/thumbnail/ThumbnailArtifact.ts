import { Anchor } from './ThumbnailRequest';

export type ThumbnailExtension = 'jpg' | 'png' | 'gif' | 'tiff' | 'bmp' | 'webp';

/**
 * A selected operation with every default filled in. This is what gets hashed
 * into the cache key and what the transformer executes.
 */
export type OperationDescriptor =
  | { operation: 'crop'; width: number; height: number; x: number | null; y: number | null }
  | { operation: 'fit'; width: number; height: number; position: Anchor; upsize: boolean }
  | {
      operation: 'resize';
      width: number | null;
      height: number | null;
      aspectRatio: boolean;
      upsize: boolean;
    }
  | {
      operation: 'resizeCanvas';
      width: number | null;
      height: number | null;
      anchor: Anchor;
      relative: boolean;
      bgcolor: string;
    };

export interface EncodeOptions {
  extension: ThumbnailExtension;
  quality: number;
}

export interface ThumbnailArtifact {
  cacheKey: string;
  filePath: string;
  extension: ThumbnailExtension;
  /** `true` when the file was already there and nothing was generated */
  existed: boolean;
}
