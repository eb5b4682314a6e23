import { encodeBmp } from './bmp';

describe('encodeBmp', () => {
  it('should write a 24-bit bottom-up bitmap with padded rows', () => {
    // 2x2: red, green / blue, white
    const pixels = Buffer.from([
      255, 0, 0, 0, 255, 0,
      0, 0, 255, 255, 255, 255
    ]);

    const bmp = encodeBmp(pixels, 2, 2, 3);

    // 2 rows of 6 bytes padded to 8
    expect(bmp.length).toBe(54 + 16);
    expect(bmp.toString('ascii', 0, 2)).toBe('BM');
    expect(bmp.readUInt32LE(2)).toBe(70);
    expect(bmp.readUInt32LE(10)).toBe(54);
    expect(bmp.readInt32LE(18)).toBe(2);
    expect(bmp.readInt32LE(22)).toBe(2);
    expect(bmp.readUInt16LE(28)).toBe(24);

    // Bottom row (blue, white) comes first, as BGR
    expect([...bmp.subarray(54, 62)]).toEqual([255, 0, 0, 255, 255, 255, 0, 0]);
    // Top row (red, green)
    expect([...bmp.subarray(62, 70)]).toEqual([0, 0, 255, 0, 255, 0, 0, 0]);
  });

  it('should expand grey pixels', () => {
    const bmp = encodeBmp(Buffer.from([128]), 1, 1, 1);

    expect([...bmp.subarray(54, 58)]).toEqual([128, 128, 128, 0]);
  });

  it('should drop the alpha channel', () => {
    const bmp = encodeBmp(Buffer.from([10, 20, 30, 40]), 1, 1, 4);

    expect([...bmp.subarray(54, 57)]).toEqual([30, 20, 10]);
  });

  it('should reject short pixel buffers', () => {
    expect(() => encodeBmp(Buffer.alloc(3), 2, 1, 3)).toThrow(RangeError);
  });
});
