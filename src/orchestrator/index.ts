/**
 * Operation planning, sequencing and reporting.
 *
 * @packageDocumentation
 */

export { Orchestrator, orchestratorSettingsFromConfig } from './orchestrator.js';
export type { OrchestratorDependencies, OrchestratorSettings } from './orchestrator.js';
export {
  BASE_STEPS,
  OPERATION_KINDS,
  StepOverflowError,
  StepTracker,
  computePlan,
  operationTitle,
} from './plan.js';
export type { OperationKind, OperationPlan, OperationRequest } from './plan.js';
export { presentReport, restoreSuggestions } from './report.js';
export type { OperationReport } from './report.js';
