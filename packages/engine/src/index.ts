/**
 * @tabflow/engine
 */

export {
  OperationRegistry,
  type RegisterOptions,
  type RegisteredOperation,
  type BoundOperation,
} from './registry.js';
export { ProcessingEngine, type ProcessingEngineOptions, type PipelineStep } from './engine.js';
export { createDefaultRegistry } from './defaults.js';
