// Main facade
export { PredictionPipeline } from './PredictionPipeline.js';
export type { PredictionPipelineConfig } from './PredictionPipeline.js';

// Use cases
export { PipelineContext, Dependency } from './PipelineContext.js';
export type { PipelinePorts, PipelineRuntimeOptions } from './PipelineContext.js';
export { Coordinator } from './Coordinator.js';
export type { BatchStatusView, ShardReportResult, DeadlineAction, DeadlineCheckResult } from './Coordinator.js';
export { Consolidator } from './Consolidator.js';
export type { ConsolidationOutcome, ConsolidationResult } from './Consolidator.js';
export { ProcessShard } from './ProcessShard.js';
export type { ShardProcessResult, ShardProcessStatus } from './ProcessShard.js';
export { GradingEngine } from './GradingEngine.js';
export type { GradingOutcome, GradingResult } from './GradingEngine.js';
