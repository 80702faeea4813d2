export * from './ChangelogParser.js';
export * from './PyPIVersionResolver.js';
export * from './VersionComparator.js';
export * from './VersionProvider.js';
