export * from './Bumper.js';
export * from './BumperDriver.js';
export * from './BumperRegistry.js';
export * from './BumpErrors.js';
export * from './BumpSummary.js';
export * from './BumpTypes.js';
export * from './PinnedBumper.js';
export * from './RequirementsBumper.js';
