import crypto from 'crypto';
import { EncodeOptions, OperationDescriptor } from '../../models/thumbnail';

function md5(value: string): string {
  return crypto.createHash('md5').update(value).digest('hex');
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, nested]) => [key, sortKeys(nested)])
    );
  }
  return value;
}

/**
 * JSON with object keys sorted at every level, so two objects with the same
 * entries serialize identically whatever their insertion order.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

/**
 * Digest of a normalized source (absolute path or url). Every thumbnail of a
 * source starts with it, which is how the manager finds them.
 */
export function sourceDigest(source: string): string {
  return md5(source);
}

/**
 * `<md5 of source>_<md5 of operation and encoding>`.
 *
 * Quality is part of the key: the same operation encoded at another quality
 * is another file.
 */
export function computeCacheKey(
  source: string,
  descriptor: OperationDescriptor,
  encode: EncodeOptions
): string {
  return `${sourceDigest(source)}_${md5(canonicalJson({ ...descriptor, ...encode }))}`;
}
