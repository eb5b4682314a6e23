import {
  ThumbnailArtifact,
  ThumbnailOperation,
  ThumbnailOptions,
  ThumbnailParams,
  ThumbnailRequest
} from '../../models/thumbnail';
import { ArgumentError, UnsupportedOperationError } from '../../utils/errors';
import { DEFAULT_FORMAT } from './formats';
import { MarkupRenderer } from './HtmlImageRenderer';
import { UrlBuilder } from './PublicUrlBuilder';
import { isThumbnailOperation } from './ThumbnailCreator';

export interface ThumbnailResolver {
  resolve(sourceRef: string, operation: ThumbnailOperation, params: ThumbnailParams): Promise<ThumbnailArtifact>;
}

/** `[path, params, options]` as passed to every helper method */
export type ThumbnailHelperArgs = [sourceRef?: string | null, params?: ThumbnailParams, options?: ThumbnailOptions];

type HelperMethod = (sourceRef: string, params?: ThumbnailParams, options?: ThumbnailOptions) => Promise<string>;

/**
 * Splits a helper method name into the operation and whether only the url is
 * wanted: `cropUrl` is `{ operation: 'crop', urlOnly: true }`.
 */
export function parseMethodName(name: string): { operation: string; urlOnly: boolean } {
  return name.endsWith('Url')
    ? { operation: name.slice(0, -3), urlOnly: true }
    : { operation: name, urlOnly: false };
}

/**
 * Thumb helper for views.
 *
 * Each method takes the path of the source image (relative to the image root,
 * absolute, or a remote url), the parameters for creating the thumbnail and
 * the HTML attributes of the `img` element. Methods ending in `Url` return the
 * thumbnail url, the others an `img` tag:
 *
 *     <%- await thumb.fit('photo.jpg', { width: 150 }, { class: 'avatar' }) %>
 *     <%= await thumb.resizeUrl('photo.jpg', { width: 800 }, { fullBase: false }) %>
 */
export class ThumbnailHelper {
  constructor(
    private readonly resolver: ThumbnailResolver,
    private readonly urls: UrlBuilder,
    private readonly markup: MarkupRenderer
  ) {}

  /** Cuts out a rectangular part of the image */
  readonly crop: HelperMethod = (...args) => this.invoke('crop', args);
  readonly cropUrl: HelperMethod = (...args) => this.invoke('cropUrl', args);

  /** Crops to the best fitting aspect ratio, then resizes */
  readonly fit: HelperMethod = (...args) => this.invoke('fit', args);
  readonly fitUrl: HelperMethod = (...args) => this.invoke('fitUrl', args);

  readonly resize: HelperMethod = (...args) => this.invoke('resize', args);
  readonly resizeUrl: HelperMethod = (...args) => this.invoke('resizeUrl', args);

  /** Resizes the boundaries of the image, filling the emerging area with `bgcolor` */
  readonly resizeCanvas: HelperMethod = (...args) => this.invoke('resizeCanvas', args);
  readonly resizeCanvasUrl: HelperMethod = (...args) => this.invoke('resizeCanvasUrl', args);

  /**
   * Builds the request of one helper call, with the defaults filled in.
   * @throws ArgumentError when the path is missing
   * @throws UnsupportedOperationError when `name` is not a thumbnail method
   */
  parse(name: string, args: ThumbnailHelperArgs): ThumbnailRequest {
    const [sourceRef, params = {}, options = {}] = args;
    if (typeof sourceRef !== 'string' || sourceRef.trim() === '') {
      throw new ArgumentError('Thumbnail path is missing');
    }

    const { operation, urlOnly } = parseMethodName(name);
    if (!isThumbnailOperation(operation)) {
      throw new UnsupportedOperationError(operation);
    }

    return {
      sourceRef,
      operation,
      urlOnly,
      params: {
        ...params,
        format: params.format ?? DEFAULT_FORMAT,
        width: params.width ?? null,
        height: params.height ?? null
      },
      options
    };
  }

  /** Runs the helper method `name` */
  async invoke(name: string, args: ThumbnailHelperArgs): Promise<string> {
    const request = this.parse(name, args);
    const { fullBase = true, ...attributes } = request.options;

    const artifact = await this.resolver.resolve(request.sourceRef, request.operation, request.params);
    const url = this.urls.build(artifact.filePath, fullBase);

    return request.urlOnly ? url : this.markup.image(url, attributes);
  }
}
