export const THUMBNAIL_OPERATIONS = ['crop', 'fit', 'resize', 'resizeCanvas'] as const;

export type ThumbnailOperation = typeof THUMBNAIL_OPERATIONS[number];

export const ANCHORS = [
  'top-left',
  'top',
  'top-right',
  'left',
  'center',
  'right',
  'bottom-left',
  'bottom',
  'bottom-right'
] as const;

export type Anchor = typeof ANCHORS[number];

/**
 * Parameters for creating a thumbnail.
 *
 * `width` and `height` left out (or `null`) mean the dimension is not
 * constrained. The remaining keys only apply to some operations and are
 * ignored by the others.
 */
export interface ThumbnailParams {
  width?: number | null;
  height?: number | null;
  format?: string;
  /** Encoding quality, 1-100 */
  quality?: number;
  /** File name (inside the thumbnail directory) or absolute path to write to */
  target?: string;
  // crop
  x?: number | null;
  y?: number | null;
  // fit
  position?: Anchor;
  // fit, resize
  upsize?: boolean;
  // resize
  aspectRatio?: boolean;
  // resizeCanvas
  anchor?: Anchor;
  relative?: boolean;
  bgcolor?: string;
}

export type HtmlAttributeValue = string | number | boolean | null | undefined;

export interface HtmlAttributes {
  [attribute: string]: HtmlAttributeValue;
}

/**
 * Options for a helper call: `fullBase` picks absolute or relative urls, every
 * other entry becomes an attribute of the `img` element.
 */
export interface ThumbnailOptions extends HtmlAttributes {
  fullBase?: boolean;
}

export interface ThumbnailRequest {
  sourceRef: string;
  operation: ThumbnailOperation;
  urlOnly: boolean;
  params: ThumbnailParams;
  options: ThumbnailOptions;
}
