import path from 'path';
import { ConfigurationError } from '../utils/errors';
import { loadConfig } from './index';

describe('loadConfig', () => {
  it('should apply the defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      nodeEnv: 'development',
      thumbnails: {
        targetDir: path.resolve('tmp/thumbs'),
        imageRoot: path.resolve('public/img'),
        publicPath: '/thumbs',
        fullBaseUrl: 'http://localhost:3000',
        remoteTimeoutMs: 10000,
        remoteMaxBytes: 15 * 1024 * 1024
      }
    });
  });

  it('should read the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      THUMBNAIL_TARGET_DIR: '/var/cache/thumbs',
      THUMBNAIL_IMAGE_ROOT: '/var/www/img',
      THUMBNAIL_PUBLIC_PATH: '/media/thumbs/',
      APP_FULL_BASE_URL: 'https://cdn.example.com/',
      THUMBNAIL_REMOTE_TIMEOUT_MS: '2500',
      THUMBNAIL_REMOTE_MAX_BYTES: '1048576'
    });

    expect(config).toEqual({
      port: 8080,
      nodeEnv: 'production',
      thumbnails: {
        targetDir: path.resolve('/var/cache/thumbs'),
        imageRoot: path.resolve('/var/www/img'),
        publicPath: '/media/thumbs',
        fullBaseUrl: 'https://cdn.example.com',
        remoteTimeoutMs: 2500,
        remoteMaxBytes: 1048576
      }
    });
  });

  it('should ignore unrelated variables', () => {
    expect(loadConfig({ HOME: '/root', PATH: '/usr/bin' }).port).toBe(3000);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'http' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ THUMBNAIL_PUBLIC_PATH: 'thumbs' })).toThrow('Invalid configuration');
  });

  it('should list every invalid value', () => {
    let caught: unknown;
    try {
      loadConfig({ APP_FULL_BASE_URL: 'ftp://example.com', THUMBNAIL_REMOTE_TIMEOUT_MS: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      details: [
        { field: 'APP_FULL_BASE_URL', message: expect.any(String) },
        { field: 'THUMBNAIL_REMOTE_TIMEOUT_MS', message: expect.any(String) }
      ]
    });
  });
});
