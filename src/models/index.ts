// Export all model interfaces and types
export * from './thumbnail';
