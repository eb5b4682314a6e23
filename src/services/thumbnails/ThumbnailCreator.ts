import {
  Anchor,
  OperationDescriptor,
  THUMBNAIL_OPERATIONS,
  ThumbnailArtifact,
  ThumbnailOperation,
  ThumbnailParams
} from '../../models/thumbnail';
import { ArgumentError, NoOperationAppliedError } from '../../utils/errors';

/** What a creator needs from the cache to save */
export interface ThumbnailStore {
  store(sourceRef: string, descriptor: OperationDescriptor, params: ThumbnailParams): Promise<ThumbnailArtifact>;
}

type Dimension = number | null | undefined;

function checkDimensions(
  width: Dimension,
  height: Dimension,
  allowNegative: boolean = false
): { width: number | null; height: number | null; either: number } {
  const w = width ?? null;
  const h = height ?? null;

  for (const [name, value] of [['width', w], ['height', h]] as const) {
    if (value !== null && (!Number.isInteger(value) || (allowNegative ? value === 0 : value < 1))) {
      throw new ArgumentError(`The ${name} must be ${allowNegative ? 'a non-zero' : 'a positive'} integer, got ${value}`);
    }
  }

  const either = w ?? h;
  if (either === null) {
    throw new ArgumentError('You have to set at least the width or the height');
  }
  return { width: w, height: h, either };
}

/**
 * Creates a thumbnail of one source image.
 *
 * Select an operation, then `save()`:
 *
 *     const artifact = await cache.creator('photo.jpg').resize(200).save({ format: 'png' });
 *
 * Selecting another operation replaces the previous one.
 */
export class ThumbnailCreator {
  private descriptor: OperationDescriptor | null = null;

  constructor(
    private readonly sourceRef: string,
    private readonly store: ThumbnailStore
  ) {
    if (sourceRef.trim() === '') {
      throw new ArgumentError('Thumbnail path is missing');
    }
  }

  /**
   * Cuts out a rectangular part of the image. The missing side takes the value
   * of the given one; without `x`/`y` the rectangle is centered.
   */
  crop(width?: Dimension, height?: Dimension, options: { x?: number | null; y?: number | null } = {}): this {
    const size = checkDimensions(width, height);
    this.descriptor = {
      operation: 'crop',
      width: size.width ?? size.either,
      height: size.height ?? size.either,
      x: options.x ?? null,
      y: options.y ?? null
    };
    return this;
  }

  /**
   * Crops to the best fitting aspect ratio and resizes to the given size. The
   * missing side takes the value of the given one.
   */
  fit(width?: Dimension, height?: Dimension, options: { position?: Anchor; upsize?: boolean } = {}): this {
    const size = checkDimensions(width, height);
    this.descriptor = {
      operation: 'fit',
      width: size.width ?? size.either,
      height: size.height ?? size.either,
      position: options.position ?? 'center',
      upsize: options.upsize ?? true
    };
    return this;
  }

  resize(width?: Dimension, height?: Dimension, options: { aspectRatio?: boolean; upsize?: boolean } = {}): this {
    const size = checkDimensions(width, height);
    this.descriptor = {
      operation: 'resize',
      width: size.width,
      height: size.height,
      aspectRatio: options.aspectRatio ?? true,
      upsize: options.upsize ?? true
    };
    return this;
  }

  /**
   * Resizes the boundaries of the image. In `relative` mode the values are
   * added to the current size (and may be negative).
   */
  resizeCanvas(
    width?: Dimension,
    height?: Dimension,
    options: { anchor?: Anchor; relative?: boolean; bgcolor?: string } = {}
  ): this {
    const relative = options.relative ?? false;
    const size = checkDimensions(width, height, relative);
    this.descriptor = {
      operation: 'resizeCanvas',
      width: size.width,
      height: size.height,
      anchor: options.anchor ?? 'center',
      relative,
      bgcolor: options.bgcolor ?? '#ffffff'
    };
    return this;
  }

  /**
   * Saves the thumbnail, or returns the existing one.
   * @param params `format`, `quality` and `target`
   * @throws NoOperationAppliedError when no operation was selected
   */
  async save(params: ThumbnailParams = {}): Promise<ThumbnailArtifact> {
    if (!this.descriptor) {
      throw new NoOperationAppliedError();
    }
    return this.store.store(this.sourceRef, this.descriptor, params);
  }
}

type OperationHandler = (creator: ThumbnailCreator, params: ThumbnailParams) => ThumbnailCreator;

export const OPERATION_HANDLERS: Readonly<Record<ThumbnailOperation, OperationHandler>> = {
  crop: (creator, { width, height, x, y }) => creator.crop(width, height, { x, y }),
  fit: (creator, { width, height, position, upsize }) => creator.fit(width, height, { position, upsize }),
  resize: (creator, { width, height, aspectRatio, upsize }) => creator.resize(width, height, { aspectRatio, upsize }),
  resizeCanvas: (creator, { width, height, anchor, relative, bgcolor }) =>
    creator.resizeCanvas(width, height, { anchor, relative, bgcolor })
};

export function isThumbnailOperation(name: string): name is ThumbnailOperation {
  return THUMBNAIL_OPERATIONS.some((operation) => operation === name);
}
