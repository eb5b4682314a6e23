import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { AppConfig, ThumbnailConfig } from '../../config';

export interface TestDirectories {
  root: string;
  imageRoot: string;
  targetDir: string;
}

export async function createTestDirectories(): Promise<TestDirectories> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'thumbs-test-'));
  const imageRoot = path.join(root, 'img');
  const targetDir = path.join(root, 'thumbs');
  await fs.mkdir(imageRoot);
  await fs.mkdir(targetDir);
  return { root, imageRoot, targetDir };
}

export async function removeTestDirectories(dirs: TestDirectories): Promise<void> {
  await fs.rm(dirs.root, { recursive: true, force: true });
}

export function createPng(width: number, height: number, background: string = '#3366cc'): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();
}

export async function writePng(dir: string, name: string, width: number, height: number): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, await createPng(width, height));
  return filePath;
}

export function testThumbnailConfig(dirs: TestDirectories): ThumbnailConfig {
  return {
    targetDir: dirs.targetDir,
    imageRoot: dirs.imageRoot,
    publicPath: '/thumbs',
    fullBaseUrl: 'http://localhost:3000',
    remoteTimeoutMs: 1000,
    remoteMaxBytes: 1024 * 1024
  };
}

export function testAppConfig(dirs: TestDirectories): AppConfig {
  return { port: 0, nodeEnv: 'test', thumbnails: testThumbnailConfig(dirs) };
}

export async function imageSize(filePath: string): Promise<{ width?: number; height?: number; format?: string }> {
  const { width, height, format } = await sharp(filePath).metadata();
  return { width, height, format };
}
