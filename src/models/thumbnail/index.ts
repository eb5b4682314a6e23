// Thumbnail models
export * from './ThumbnailRequest';
export * from './ThumbnailArtifact';
