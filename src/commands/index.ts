export * from './extract.js';
export * from './templates.js';
export * from './config.js';
