export { PipelineEngine, type PipelineEngineDependencies, type RunHooks } from './pipeline.engine.js';
export { BatchProcessor, type BatchOutcome, type RunState, type RecognizedPage } from './pipeline/batch.processor.js';
export { createBatches } from './pipeline/batch.planner.js';
export { resolveRunPlan } from './pipeline/run-request.js';
