export { ThumbnailController } from './ThumbnailController';
