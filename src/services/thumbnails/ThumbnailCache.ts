import { constants as fsConstants, promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  OperationDescriptor,
  ThumbnailArtifact,
  ThumbnailExtension,
  ThumbnailOperation,
  ThumbnailParams
} from '../../models/thumbnail';
import { DirectoryNotWritableError, errorMessage, isErrnoException } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { thumbnailParamsSchema, validate } from '../../utils/validation';
import { computeCacheKey } from './cacheKey';
import { DEFAULT_FORMAT, DEFAULT_QUALITY, normalizeFormat } from './formats';
import { SharpTransformer, ThumbnailTransformer } from './SharpTransformer';
import { SourceResolver } from './SourceResolver';
import { OPERATION_HANDLERS, ThumbnailCreator, ThumbnailStore } from './ThumbnailCreator';

export interface ThumbnailCacheOptions {
  targetDir: string;
  sources: SourceResolver;
  transformer?: ThumbnailTransformer;
}

interface ThumbnailLocation {
  cacheKey: string;
  filePath: string;
  extension: ThumbnailExtension;
  quality: number;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function assertWritableDirectory(directory: string): Promise<void> {
  try {
    const stats = await fs.stat(directory);
    if (stats.isDirectory()) {
      await fs.access(directory, fsConstants.W_OK);
      return;
    }
  } catch (error) {
    if (!isErrnoException(error)) {
      throw error;
    }
  }
  throw new DirectoryNotWritableError(directory);
}

/**
 * Names, finds and creates thumbnail files in the target directory.
 *
 * A thumbnail is written once: a second request with the same normalized
 * source, operation and encoding finds the file and returns it without
 * decoding anything. New files are written under a unique temporary name and
 * renamed into place, so readers never see a partial file.
 */
export class ThumbnailCache implements ThumbnailStore {
  readonly targetDir: string;
  private readonly sources: SourceResolver;
  private readonly transformer: ThumbnailTransformer;

  constructor(options: ThumbnailCacheOptions) {
    this.targetDir = path.resolve(options.targetDir);
    this.sources = options.sources;
    this.transformer = options.transformer ?? new SharpTransformer();
  }

  creator(sourceRef: string): ThumbnailCreator {
    return new ThumbnailCreator(sourceRef, this);
  }

  /**
   * Selects `operation` on a new creator and saves it.
   * @param params Dimensions, operation extras, `format`, `quality` and `target`
   */
  async resolve(sourceRef: string, operation: ThumbnailOperation, params: ThumbnailParams = {}): Promise<ThumbnailArtifact> {
    const valid = validate(thumbnailParamsSchema, params);
    const creator = OPERATION_HANDLERS[operation](this.creator(sourceRef), valid);
    return creator.save(valid);
  }

  async store(sourceRef: string, descriptor: OperationDescriptor, params: ThumbnailParams): Promise<ThumbnailArtifact> {
    const source = this.sources.normalize(sourceRef);
    const location = this.locate(source, descriptor, validate(thumbnailParamsSchema, params));
    const { cacheKey, filePath, extension, quality } = location;

    await assertWritableDirectory(path.dirname(filePath));

    if (await fileExists(filePath)) {
      logger.debug('Thumbnail cache hit', { source, filePath });
      return { cacheKey, filePath, extension, existed: true };
    }

    await this.write(filePath, async () => {
      const data = await this.sources.load(source);
      return this.transformer.render({ ref: source, data }, descriptor, { extension, quality });
    });

    logger.info('Thumbnail created', { source, operation: descriptor.operation, filePath });
    return { cacheKey, filePath, extension, existed: false };
  }

  private locate(source: string, descriptor: OperationDescriptor, params: ThumbnailParams): ThumbnailLocation {
    const quality = params.quality ?? DEFAULT_QUALITY;
    const format = params.format ?? DEFAULT_FORMAT;

    if (params.target) {
      const filePath = path.isAbsolute(params.target)
        ? path.normalize(params.target)
        : path.resolve(this.targetDir, params.target);
      const targetExtension = path.extname(filePath);
      return {
        cacheKey: path.basename(filePath, targetExtension),
        filePath,
        extension: normalizeFormat(targetExtension.slice(1) || format),
        quality
      };
    }

    const extension = normalizeFormat(format);
    const cacheKey = computeCacheKey(source, descriptor, { extension, quality });
    return {
      cacheKey,
      filePath: path.join(this.targetDir, `${cacheKey}.${extension}`),
      extension,
      quality
    };
  }

  private async write(filePath: string, produce: () => Promise<Buffer>): Promise<void> {
    const tempPath = `${filePath}.${uuidv4()}.tmp`;
    try {
      const data = await produce();
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Unable to remove temporary thumbnail', { tempPath, error: errorMessage(cleanupError) });
      });
      throw error;
    }
  }
}
