import Joi from 'joi';
import { ANCHORS, ThumbnailParams } from '../models/thumbnail';
import { ArgumentError } from './errors';

export interface ValidationIssue {
  field: string;
  message: string;
}

const dimensionSchema = Joi.number().integer().allow(null);
const anchorSchema = Joi.string().valid(...ANCHORS);

const thumbnailParamKeys = {
  width: dimensionSchema,
  height: dimensionSchema,
  format: Joi.string().trim().min(1),
  quality: Joi.number().integer().min(1).max(100),
  target: Joi.string().trim().min(1),
  x: Joi.number().integer().allow(null),
  y: Joi.number().integer().allow(null),
  position: anchorSchema,
  upsize: Joi.boolean(),
  aspectRatio: Joi.boolean(),
  anchor: anchorSchema,
  relative: Joi.boolean(),
  bgcolor: Joi.string().trim().pattern(/^#?([0-9a-f]{3}|[0-9a-f]{6})$/i)
};

export const thumbnailParamsSchema = Joi.object<ThumbnailParams>(thumbnailParamKeys);

export interface ThumbnailQuery extends ThumbnailParams {
  path?: string;
  fullBase?: boolean;
  alt?: string;
  class?: string;
  title?: string;
}

// Query string of `GET /api/thumbnails/:method`
export const thumbnailQuerySchema = Joi.object<ThumbnailQuery>({
  ...thumbnailParamKeys,
  path: Joi.string().allow(''),
  fullBase: Joi.boolean(),
  alt: Joi.string().allow(''),
  class: Joi.string(),
  title: Joi.string()
});

export function toValidationIssues(details: Joi.ValidationErrorItem[]): ValidationIssue[] {
  return details.map((detail) => ({
    field: detail.path.join('.'),
    message: detail.message
  }));
}

/**
 * Validates `input` against `schema`, returning the converted value. Unknown
 * keys are dropped.
 */
export function validate<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const { error, value } = schema.validate(input, {
    abortEarly: false,
    convert: true,
    stripUnknown: true
  });
  if (error) {
    throw new ArgumentError(error.message, toValidationIssues(error.details));
  }
  return value;
}
