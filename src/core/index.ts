/**
 * Core orchestration module.
 * Extractor → Translator → FrequencyAnalyzer pipeline, and the matrix
 * orchestrator that runs it once per capability, concurrently.
 */

export {
  NavigationError,
  ExtractionError,
  TranslationServiceError,
  ProvisioningError,
  PipelineError,
  TIMEOUT_REASON,
} from './errors.js';
export { extract } from './extractor.js';
export type { ExtractOptions } from './extractor.js';
export { translate } from './translator.js';
export { analyze, tokenize, repeatedWords } from './frequency.js';
export { runPipeline } from './pipeline.js';
export type { PipelineOptions, PipelineResult } from './pipeline.js';
export { runMatrix } from './orchestrator.js';
export type { OrchestratorConfig, MatrixPipelineOptions } from './orchestrator.js';
export { createRunReport } from './runReport.js';
export type { RunReport } from './runReport.js';
