import crypto from 'crypto';
import { OperationDescriptor } from '../../models/thumbnail';
import { canonicalJson, computeCacheKey, sourceDigest } from './cacheKey';

const resize: OperationDescriptor = {
  operation: 'resize',
  width: 200,
  height: null,
  aspectRatio: true,
  upsize: true
};

describe('canonicalJson', () => {
  it('should sort keys at every level', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: null } })).toBe('{"a":{"c":null,"d":2},"b":1}');
  });

  it('should keep array order', () => {
    expect(canonicalJson([3, { z: 1, y: 2 }, 1])).toBe('[3,{"y":2,"z":1},1]');
  });

  it('should not depend on insertion order', () => {
    expect(canonicalJson({ width: 200, height: 100 })).toBe(canonicalJson({ height: 100, width: 200 }));
  });
});

describe('computeCacheKey', () => {
  const source = '/var/www/img/400x400.png';

  it('should prefix the key with the digest of the source', () => {
    const key = computeCacheKey(source, resize, { extension: 'jpg', quality: 90 });

    expect(key).toMatch(/^[a-f0-9]{32}_[a-f0-9]{32}$/);
    expect(key.startsWith(`${crypto.createHash('md5').update(source).digest('hex')}_`)).toBe(true);
    expect(sourceDigest(source)).toBe(key.split('_')[0]);
  });

  it('should be deterministic', () => {
    const reordered: OperationDescriptor = {
      upsize: true,
      aspectRatio: true,
      height: null,
      width: 200,
      operation: 'resize'
    };

    expect(computeCacheKey(source, resize, { extension: 'jpg', quality: 90 }))
      .toBe(computeCacheKey(source, reordered, { quality: 90, extension: 'jpg' }));
  });

  it('should change with anything that changes the output', () => {
    const base = computeCacheKey(source, resize, { extension: 'jpg', quality: 90 });

    expect(computeCacheKey(source, { ...resize, width: 201 }, { extension: 'jpg', quality: 90 })).not.toBe(base);
    expect(computeCacheKey(source, resize, { extension: 'png', quality: 90 })).not.toBe(base);
    expect(computeCacheKey(source, resize, { extension: 'jpg', quality: 10 })).not.toBe(base);
    expect(computeCacheKey('/var/www/img/other.png', resize, { extension: 'jpg', quality: 90 })).not.toBe(base);
  });
});
