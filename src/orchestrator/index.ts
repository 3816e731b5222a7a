/**
 * Orchestrator Module
 *
 * @module orchestrator
 */

export { MatchOrchestrator, type OrchestratorDependencies, type StageRetryOptions } from './orchestrator.js';
export {
  AnalysisError,
  isAnalysisError,
  describeCause,
  type AnalysisErrorKind,
  type AnalysisErrorOptions,
} from './errors.js';
export {
  ANALYSIS_STAGES,
  type AnalysisStage,
  type AnalysisRequest,
  type AnalysisResult,
  type AnalysisOutcome,
  type AnalyzeOptions,
  type AnalysisCallbacks,
  type PersistencePolicy,
} from './types.js';
export {
  createMatchService,
  type MatchService,
  type OrchestratorOverrides,
} from './factory.js';
