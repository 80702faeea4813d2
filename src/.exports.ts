export * from './bumpers/.exports.js';
export * from './config/BumpConfig.js';
export * from './deps/.exports.js';
export * from './requirements/.exports.js';
export * from './services/BumpLog.js';
