/**
 * Pipeline Module - Public API
 */

// Types
export type {
  FieldCodes,
  Pipeline,
  PipelineDeps,
  PipelineOptions,
  PipelineOutcome,
  PipelineState,
  SignalPublisher,
} from "./schema.js";

// Service functions
export { createPipeline, INITIAL_PIPELINE_STATE, runPipeline } from "./service.js";
