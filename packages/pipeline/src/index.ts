// packages/pipeline/src/index.ts
export * from './config.js';
export * from './report.js';
export * from './scan.js';
export * from './snapshot.js';
