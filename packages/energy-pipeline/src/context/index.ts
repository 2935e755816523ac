export { runPipeline, type DatasetSnapshot, type PipelineOptions } from './pipeline.js';
export { EnergyPipelineContext, type ContextOptions } from './pipeline-context.js';
