export { extractJson, findFencedBlock } from './json-extractor.js';
export type { ExtractionResult, ExtractionStrategy } from './json-extractor.js';
export { parseAnnotation, validateAnnotation } from './validator.js';
export type { ParseOutcome, ValidationOutcome } from './validator.js';
export { parseSchemaDefinition, describeSchema } from './schema-definition.js';
