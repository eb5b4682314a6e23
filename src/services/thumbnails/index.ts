import { ThumbnailConfig } from '../../config';
import { HtmlImageRenderer } from './HtmlImageRenderer';
import { PublicUrlBuilder } from './PublicUrlBuilder';
import { ThumbnailTransformer } from './SharpTransformer';
import { ImageFetcher, SourceResolver } from './SourceResolver';
import { ThumbnailCache } from './ThumbnailCache';
import { ThumbnailHelper } from './ThumbnailHelper';
import { ThumbnailManager } from './ThumbnailManager';

export * from './cacheKey';
export * from './formats';
export * from './HtmlImageRenderer';
export * from './PublicUrlBuilder';
export * from './SharpTransformer';
export * from './SourceResolver';
export * from './ThumbnailCache';
export * from './ThumbnailCreator';
export * from './ThumbnailHelper';
export * from './ThumbnailManager';

export interface ThumbnailServices {
  sources: SourceResolver;
  cache: ThumbnailCache;
  helper: ThumbnailHelper;
  manager: ThumbnailManager;
}

export interface ThumbnailServiceOverrides {
  fetcher?: ImageFetcher;
  transformer?: ThumbnailTransformer;
}

/**
 * Wires the thumbnail services for one configuration.
 */
export function createThumbnailServices(
  config: ThumbnailConfig,
  overrides: ThumbnailServiceOverrides = {}
): ThumbnailServices {
  const sources = new SourceResolver({
    imageRoot: config.imageRoot,
    remoteTimeoutMs: config.remoteTimeoutMs,
    remoteMaxBytes: config.remoteMaxBytes,
    fetcher: overrides.fetcher
  });
  const cache = new ThumbnailCache({
    targetDir: config.targetDir,
    sources,
    transformer: overrides.transformer
  });
  const helper = new ThumbnailHelper(
    cache,
    new PublicUrlBuilder({
      targetDir: config.targetDir,
      publicPath: config.publicPath,
      fullBaseUrl: config.fullBaseUrl
    }),
    new HtmlImageRenderer()
  );

  return {
    sources,
    cache,
    helper,
    manager: new ThumbnailManager(config.targetDir, sources)
  };
}
