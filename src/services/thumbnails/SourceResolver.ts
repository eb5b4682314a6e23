import { promises as fs } from 'fs';
import path from 'path';
import { AppError, InvalidSourceImageError, SourceNotFoundError, errorMessage, isErrnoException } from '../../utils/errors';
import { logger } from '../../utils/logger';

/** The parts of a fetch `Response` the resolver reads */
export interface FetchedResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type ImageFetcher = (url: string, init: { signal: AbortSignal }) => Promise<FetchedResponse>;

export interface SourceResolverOptions {
  imageRoot: string;
  remoteTimeoutMs: number;
  remoteMaxBytes: number;
  fetcher?: ImageFetcher;
}

const REMOTE_PATTERN = /^https?:\/\//i;
const IMAGE_CONTENT_TYPE = /^image\//i;

/**
 * Turns a source reference into something that can be hashed and read.
 *
 * A relative path is taken relative to the image root, an absolute path is
 * used as it is, and `http(s)` urls are downloaded.
 */
export class SourceResolver {
  private readonly fetcher: ImageFetcher;

  constructor(private readonly options: SourceResolverOptions) {
    this.fetcher = options.fetcher ?? ((url, init) => fetch(url, init));
  }

  isRemote(source: string): boolean {
    return REMOTE_PATTERN.test(source);
  }

  normalize(sourceRef: string): string {
    const source = sourceRef.trim();
    if (this.isRemote(source)) {
      return source;
    }
    return path.isAbsolute(source) ? path.normalize(source) : path.resolve(this.options.imageRoot, source);
  }

  /**
   * Reads the bytes of a normalized source.
   * @throws SourceNotFoundError when a local file cannot be read
   * @throws InvalidSourceImageError when a download fails
   */
  async load(source: string): Promise<Buffer> {
    if (this.isRemote(source)) {
      return this.download(source);
    }

    try {
      return await fs.readFile(source);
    } catch (error) {
      if (isErrnoException(error)) {
        throw new SourceNotFoundError(source);
      }
      throw error;
    }
  }

  private async download(url: string): Promise<Buffer> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.remoteTimeoutMs);

    try {
      const response = await this.fetcher(url, { signal: controller.signal });
      if (!response.ok) {
        throw new InvalidSourceImageError(url, `Remote server answered ${response.status}`);
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!IMAGE_CONTENT_TYPE.test(contentType)) {
        throw new InvalidSourceImageError(url, `Unexpected content type \`${contentType}\``);
      }

      const declaredLength = Number(response.headers.get('content-length') ?? 0);
      if (declaredLength > this.options.remoteMaxBytes) {
        throw new InvalidSourceImageError(url, `Image exceeds ${this.options.remoteMaxBytes} bytes`);
      }

      const body = Buffer.from(await response.arrayBuffer());
      if (body.length > this.options.remoteMaxBytes) {
        throw new InvalidSourceImageError(url, `Image exceeds ${this.options.remoteMaxBytes} bytes`);
      }

      logger.debug('Downloaded remote image', { url, bytes: body.length });
      return body;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new InvalidSourceImageError(url, errorMessage(error));
    } finally {
      clearTimeout(timer);
    }
  }
}
