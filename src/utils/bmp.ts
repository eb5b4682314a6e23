const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const HEADER_SIZE = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
const PIXELS_PER_METER = 2835; // 72 dpi

/**
 * Encodes raw, interleaved pixels as an uncompressed 24-bit BMP.
 *
 * `channels` is 1 (grey) or 3/4 (RGB, alpha is dropped). Rows are written
 * bottom-up and padded to 4 bytes.
 */
export function encodeBmp(pixels: Buffer, width: number, height: number, channels: number): Buffer {
  if (pixels.length < width * height * channels) {
    throw new RangeError(`Expected ${width * height * channels} bytes of pixels, got ${pixels.length}`);
  }

  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const imageSize = rowSize * height;
  const output = Buffer.alloc(HEADER_SIZE + imageSize);

  // BITMAPFILEHEADER
  output.write('BM', 0, 'ascii');
  output.writeUInt32LE(HEADER_SIZE + imageSize, 2);
  output.writeUInt32LE(HEADER_SIZE, 10);

  // BITMAPINFOHEADER
  output.writeUInt32LE(INFO_HEADER_SIZE, 14);
  output.writeInt32LE(width, 18);
  output.writeInt32LE(height, 22);
  output.writeUInt16LE(1, 26);
  output.writeUInt16LE(24, 28);
  output.writeUInt32LE(0, 30);
  output.writeUInt32LE(imageSize, 34);
  output.writeInt32LE(PIXELS_PER_METER, 38);
  output.writeInt32LE(PIXELS_PER_METER, 42);

  for (let y = 0; y < height; y++) {
    const rowStart = HEADER_SIZE + (height - 1 - y) * rowSize;
    for (let x = 0; x < width; x++) {
      const source = (y * width + x) * channels;
      const red = pixels[source];
      const green = channels >= 3 ? pixels[source + 1] : red;
      const blue = channels >= 3 ? pixels[source + 2] : red;
      const target = rowStart + x * 3;
      output[target] = blue;
      output[target + 1] = green;
      output[target + 2] = red;
    }
  }

  return output;
}
