export * from './fs.js';
export * from './size.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export * from './progress.js';
export * from './delete.js';
export * from './disk-usage.js';
