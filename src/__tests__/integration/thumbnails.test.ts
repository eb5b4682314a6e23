import { promises as fs } from 'fs';
import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../app';
import { FetchedResponse, ImageFetcher } from '../../services/thumbnails';
import {
  TestDirectories,
  createPng,
  createTestDirectories,
  removeTestDirectories,
  testAppConfig,
  writePng
} from '../helpers/fixtures';

const THUMBNAIL_URL = /^http:\/\/localhost:3000\/thumbs\/[a-f0-9]{32}_[a-f0-9]{32}\.jpg$/;

describe('Thumbnail API Integration Tests', () => {
  let dirs: TestDirectories;
  let app: Application;

  beforeEach(async () => {
    dirs = await createTestDirectories();
    await writePng(dirs.imageRoot, '400x400.png', 400, 400);
    app = createApp({ config: testAppConfig(dirs) });
  });

  afterEach(async () => {
    await removeTestDirectories(dirs);
  });

  describe('GET /api/thumbnails/:method', () => {
    test('should return the url of a new thumbnail', async () => {
      const response = await request(app)
        .get('/api/thumbnails/resizeUrl')
        .query({ path: '400x400.png', width: 200 })
        .expect(200);

      expect(response.body).toEqual({
        success: true,
        data: { method: 'resizeUrl', result: expect.stringMatching(THUMBNAIL_URL) }
      });
      expect(await fs.readdir(dirs.targetDir)).toHaveLength(1);
    });

    test('should serve the thumbnail under its url', async () => {
      const created = await request(app)
        .get('/api/thumbnails/fitUrl')
        .query({ path: '400x400.png', width: 100, height: 50, fullBase: false })
        .expect(200);
      const url: string = created.body.data.result;

      expect(url).toMatch(/^\/thumbs\/[a-f0-9]{32}_[a-f0-9]{32}\.jpg$/);

      const image = await request(app).get(url).expect(200);

      expect(image.headers['content-type']).toBe('image/jpeg');
    });

    test('should return the same url for the same request', async () => {
      const query = { path: '400x400.png', width: 200, format: 'png' };

      const first = await request(app).get('/api/thumbnails/cropUrl').query(query).expect(200);
      const second = await request(app).get('/api/thumbnails/cropUrl').query(query).expect(200);

      expect(second.body.data.result).toBe(first.body.data.result);
      expect(await fs.readdir(dirs.targetDir)).toHaveLength(1);
    });

    test('should render an img element', async () => {
      const response = await request(app)
        .get('/api/thumbnails/resize')
        .query({ path: '400x400.png', width: 200, fullBase: false, alt: 'Photo', class: 'thumb' })
        .expect(200);

      expect(response.body.data.result).toMatch(
        /^<img src="\/thumbs\/[a-f0-9]{32}_[a-f0-9]{32}\.jpg" alt="Photo" class="thumb"\/>$/
      );
    });

    test('should resize the canvas', async () => {
      const response = await request(app)
        .get('/api/thumbnails/resizeCanvasUrl')
        .query({ path: '400x400.png', width: 500, height: 300, bgcolor: '#000000', format: 'png', fullBase: false })
        .expect(200);

      expect(response.body.data.result).toMatch(/\.png$/);
    });

    test('should reject methods that are not thumbnail operations', async () => {
      const response = await request(app)
        .get('/api/thumbnails/rotate')
        .query({ path: '400x400.png', width: 200 })
        .expect(400);

      expect(response.body.error).toMatchObject({
        code: 'UNSUPPORTED_OPERATION',
        message: 'Method `rotate()` is not a thumbnail operation'
      });
    });

    test('should reject a missing path', async () => {
      const response = await request(app)
        .get('/api/thumbnails/resize')
        .query({ width: 200 })
        .expect(400);

      expect(response.body.error).toMatchObject({
        code: 'ARGUMENT_ERROR',
        message: 'Thumbnail path is missing'
      });
    });

    test('should reject an unsupported format', async () => {
      const response = await request(app)
        .get('/api/thumbnails/resize')
        .query({ path: '400x400.png', width: 200, format: 'txt' })
        .expect(400);

      expect(response.body.error).toMatchObject({
        code: 'UNSUPPORTED_FORMAT',
        message: 'Format `txt` is not supported',
        details: { format: 'txt' }
      });
    });

    test('should reject invalid params', async () => {
      const response = await request(app)
        .get('/api/thumbnails/resize')
        .query({ path: '400x400.png', width: 200, quality: 101 })
        .expect(400);

      expect(response.body.error.code).toBe('ARGUMENT_ERROR');
      expect(response.body.error.details).toEqual([
        { field: 'quality', message: '"quality" must be less than or equal to 100' }
      ]);
    });

    test('should answer 404 for a missing source', async () => {
      const response = await request(app)
        .get('/api/thumbnails/resize')
        .query({ path: 'missing.png', width: 200 })
        .expect(404);

      expect(response.body.error.code).toBe('SOURCE_NOT_FOUND');
    });

    test('should answer 422 for a source that is not an image', async () => {
      await fs.writeFile(`${dirs.imageRoot}/notes.txt`, 'plain text');

      const response = await request(app)
        .get('/api/thumbnails/resize')
        .query({ path: 'notes.txt', width: 200 })
        .expect(422);

      expect(response.body.error).toMatchObject({
        code: 'INVALID_SOURCE_IMAGE',
        message: `Unable to read image from \`${dirs.imageRoot}/notes.txt\``
      });
    });

    test('should create thumbnails of remote images', async () => {
      const image = await createPng(40, 40);
      const fetcher: ImageFetcher = async (): Promise<FetchedResponse> => ({
        ok: true,
        status: 200,
        headers: { get: (name: string) => (name.toLowerCase() === 'content-type' ? 'image/png' : null) },
        arrayBuffer: async () => {
          const copy = new ArrayBuffer(image.length);
          new Uint8Array(copy).set(image);
          return copy;
        }
      });
      const remoteApp = createApp({ config: testAppConfig(dirs), fetcher });

      const response = await request(remoteApp)
        .get('/api/thumbnails/fitUrl')
        .query({ path: 'https://example.com/avatar.png', width: 20 })
        .expect(200);

      expect(response.body.data.result).toMatch(THUMBNAIL_URL);
    });
  });

  describe('DELETE /api/thumbnails', () => {
    test('should delete every thumbnail', async () => {
      await request(app).get('/api/thumbnails/resizeUrl').query({ path: '400x400.png', width: 200 }).expect(200);
      await request(app).get('/api/thumbnails/cropUrl').query({ path: '400x400.png', width: 100 }).expect(200);

      const response = await request(app).delete('/api/thumbnails').expect(200);

      expect(response.body).toEqual({ success: true, data: { deleted: 2 } });
      expect(await fs.readdir(dirs.targetDir)).toEqual([]);
    });
  });

  describe('Infrastructure', () => {
    test('should report health', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toMatchObject({ status: 'healthy', timestamp: expect.any(String) });
    });

    test('should answer 404 for unknown routes', async () => {
      const response = await request(app).get('/nope').expect(404);

      expect(response.body.error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'Route GET /nope not found',
        path: '/nope'
      });
    });

    test('should echo the request id', async () => {
      const response = await request(app)
        .get('/health')
        .set('x-request-id', 'test-request-id')
        .expect(200);

      expect(response.headers['x-request-id']).toBe('test-request-id');
      expect(response.headers['x-correlation-id']).toBe('test-request-id');
    });

    test('should use the request id in error responses', async () => {
      const response = await request(app)
        .get('/api/thumbnails/rotate')
        .query({ path: '400x400.png' })
        .set('x-request-id', 'test-request-id')
        .expect(400);

      expect(response.body.error.requestId).toBe('test-request-id');
    });
  });
});
