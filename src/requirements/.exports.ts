export * from './RequirementParser.js';
export * from './RequirementsDocument.js';
export * from './RequirementsReader.js';
export * from './RequirementSpec.js';
