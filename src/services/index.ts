// Export all service classes
export * from './thumbnails';
