import sharp from 'sharp';
import { Anchor, EncodeOptions, OperationDescriptor } from '../../models/thumbnail';
import { ArgumentError, InvalidSourceImageError, errorMessage } from '../../utils/errors';
import { encodeBmp } from '../../utils/bmp';

export interface SourceImage {
  /** Normalized source, used in error messages */
  ref: string;
  data: Buffer;
}

/**
 * Renders a thumbnail. Implementations decode the source, apply the operation
 * and return the encoded bytes; they never touch the thumbnail directory.
 */
export interface ThumbnailTransformer {
  render(source: SourceImage, descriptor: OperationDescriptor, encode: EncodeOptions): Promise<Buffer>;
}

interface Size {
  width: number;
  height: number;
}

// Anchor => sharp `position`
const SHARP_POSITIONS: Record<Anchor, string> = {
  'top-left': 'left top',
  top: 'top',
  'top-right': 'right top',
  left: 'left',
  center: 'centre',
  right: 'right',
  'bottom-left': 'left bottom',
  bottom: 'bottom',
  'bottom-right': 'right bottom'
};

/**
 * Where the top-left corner of the image lands on a canvas that is `dx`
 * wider and `dy` taller (both may be negative).
 */
export function anchorOffset(anchor: Anchor, dx: number, dy: number): { left: number; top: number } {
  const [vertical, horizontal] = anchor.includes('-')
    ? anchor.split('-')
    : anchor === 'left' || anchor === 'right'
      ? ['center', anchor]
      : [anchor, 'center'];

  const along = (side: string, start: string, delta: number): number => {
    if (side === start) {
      return 0;
    }
    return side === 'center' ? Math.floor(delta / 2) : delta;
  };

  return {
    left: along(horizontal, 'left', dx),
    top: along(vertical, 'top', dy)
  };
}

export class SharpTransformer implements ThumbnailTransformer {
  async render(source: SourceImage, descriptor: OperationDescriptor, encode: EncodeOptions): Promise<Buffer> {
    const size = await this.readSize(source);
    const pipeline = await this.apply(source.data, size, descriptor);
    return this.encode(pipeline, encode);
  }

  private async readSize(source: SourceImage): Promise<Size> {
    try {
      const { width, height } = await sharp(source.data).metadata();
      if (!width || !height) {
        throw new InvalidSourceImageError(source.ref, 'Missing image dimensions');
      }
      return { width, height };
    } catch (error) {
      if (error instanceof InvalidSourceImageError) {
        throw error;
      }
      throw new InvalidSourceImageError(source.ref, errorMessage(error));
    }
  }

  private async apply(input: Buffer, size: Size, descriptor: OperationDescriptor): Promise<sharp.Sharp> {
    switch (descriptor.operation) {
      case 'crop': {
        const width = Math.min(descriptor.width, size.width);
        const height = Math.min(descriptor.height, size.height);
        const left = descriptor.x ?? Math.floor((size.width - width) / 2);
        const top = descriptor.y ?? Math.floor((size.height - height) / 2);
        return sharp(input).extract({
          left: clamp(left, 0, size.width - width),
          top: clamp(top, 0, size.height - height),
          width,
          height
        });
      }

      case 'fit': {
        // Without enlarging, the box shrinks as a whole so the aspect ratio stays the requested one
        const scale = descriptor.upsize
          ? Math.min(1, size.width / descriptor.width, size.height / descriptor.height)
          : 1;
        return sharp(input).resize({
          width: Math.max(1, Math.round(descriptor.width * scale)),
          height: Math.max(1, Math.round(descriptor.height * scale)),
          fit: 'cover',
          position: SHARP_POSITIONS[descriptor.position]
        });
      }

      case 'resize':
        return sharp(input).resize({
          width: descriptor.width ?? undefined,
          height: descriptor.height ?? undefined,
          fit: descriptor.aspectRatio ? 'inside' : 'fill',
          withoutEnlargement: descriptor.upsize
        });

      case 'resizeCanvas':
        return this.resizeCanvas(input, size, descriptor);
    }
  }

  private async resizeCanvas(
    input: Buffer,
    size: Size,
    descriptor: Extract<OperationDescriptor, { operation: 'resizeCanvas' }>
  ): Promise<sharp.Sharp> {
    const canvas: Size = descriptor.relative
      ? { width: size.width + (descriptor.width ?? 0), height: size.height + (descriptor.height ?? 0) }
      : { width: descriptor.width ?? size.width, height: descriptor.height ?? size.height };

    if (canvas.width < 1 || canvas.height < 1) {
      throw new ArgumentError(`Canvas of ${canvas.width}x${canvas.height} pixels is empty`);
    }

    const { left, top } = anchorOffset(descriptor.anchor, canvas.width - size.width, canvas.height - size.height);

    // Part of the image still visible on the new canvas
    const visibleLeft = Math.max(left, 0);
    const visibleTop = Math.max(top, 0);
    const visibleWidth = Math.min(left + size.width, canvas.width) - visibleLeft;
    const visibleHeight = Math.min(top + size.height, canvas.height) - visibleTop;

    const piece = await sharp(input)
      .extract({ left: Math.max(-left, 0), top: Math.max(-top, 0), width: visibleWidth, height: visibleHeight })
      .toBuffer();

    const background = descriptor.bgcolor.startsWith('#') ? descriptor.bgcolor : `#${descriptor.bgcolor}`;
    const composed = await sharp({
      create: { width: canvas.width, height: canvas.height, channels: 4, background }
    })
      .composite([{ input: piece, left: visibleLeft, top: visibleTop }])
      .png()
      .toBuffer();

    return sharp(composed);
  }

  private async encode(pipeline: sharp.Sharp, { extension, quality }: EncodeOptions): Promise<Buffer> {
    switch (extension) {
      case 'jpg':
        return pipeline.flatten({ background: '#ffffff' }).jpeg({ quality }).toBuffer();
      case 'png':
        return pipeline.png().toBuffer();
      case 'gif':
        return pipeline.gif().toBuffer();
      case 'tiff':
        return pipeline.tiff({ quality }).toBuffer();
      case 'webp':
        return pipeline.webp({ quality }).toBuffer();
      case 'bmp': {
        const { data, info } = await pipeline
          .flatten({ background: '#ffffff' })
          .toColourspace('srgb')
          .raw()
          .toBuffer({ resolveWithObject: true });
        return encodeBmp(data, info.width, info.height, info.channels);
      }
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
