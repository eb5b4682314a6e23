import Joi from 'joi';
import path from 'path';
import { ConfigurationError } from '../utils/errors';
import { toValidationIssues } from '../utils/validation';

export interface ThumbnailConfig {
  /** Directory holding the generated thumbnails */
  targetDir: string;
  /** Base directory for relative source paths */
  imageRoot: string;
  /** Url path the target directory is served under */
  publicPath: string;
  /** Origin prepended to urls built with `fullBase` */
  fullBaseUrl: string;
  remoteTimeoutMs: number;
  remoteMaxBytes: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  thumbnails: ThumbnailConfig;
}

interface EnvVars {
  PORT: number;
  NODE_ENV: string;
  THUMBNAIL_TARGET_DIR: string;
  THUMBNAIL_IMAGE_ROOT: string;
  THUMBNAIL_PUBLIC_PATH: string;
  APP_FULL_BASE_URL: string;
  THUMBNAIL_REMOTE_TIMEOUT_MS: number;
  THUMBNAIL_REMOTE_MAX_BYTES: number;
}

const envSchema = Joi.object<EnvVars>({
  PORT: Joi.number().port().default(3000),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  THUMBNAIL_TARGET_DIR: Joi.string().default('tmp/thumbs'),
  THUMBNAIL_IMAGE_ROOT: Joi.string().default('public/img'),
  THUMBNAIL_PUBLIC_PATH: Joi.string().pattern(/^\//).default('/thumbs'),
  APP_FULL_BASE_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('http://localhost:3000'),
  THUMBNAIL_REMOTE_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
  THUMBNAIL_REMOTE_MAX_BYTES: Joi.number().integer().min(1).default(15 * 1024 * 1024) // 15MB
}).unknown(true);

/**
 * Reads the application configuration from environment variables. Relative
 * directories are resolved against the current working directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });
  if (error) {
    throw new ConfigurationError('Invalid configuration', toValidationIssues(error.details));
  }

  return {
    port: value.PORT,
    nodeEnv: value.NODE_ENV,
    thumbnails: {
      targetDir: path.resolve(value.THUMBNAIL_TARGET_DIR),
      imageRoot: path.resolve(value.THUMBNAIL_IMAGE_ROOT),
      publicPath: value.THUMBNAIL_PUBLIC_PATH.replace(/\/+$/, '') || '/',
      fullBaseUrl: value.APP_FULL_BASE_URL.replace(/\/+$/, ''),
      remoteTimeoutMs: value.THUMBNAIL_REMOTE_TIMEOUT_MS,
      remoteMaxBytes: value.THUMBNAIL_REMOTE_MAX_BYTES
    }
  };
}
