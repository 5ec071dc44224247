export { PipelineCoordinator } from './coordinator.js';
export type { CoordinatorOptions } from './coordinator.js';
export { arraySource, drainSource } from './sources.js';
export type { AcquisitionSource } from './sources.js';
export { assertStageTransition, isFinalStage } from './stages.js';
