export * from './record.js';
export * from './match.js';
export * from './config.js';
export * from './errors.js';
