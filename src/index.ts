/**
 * nodeswap
 *
 * Replaces failed control plane nodes, expands the control plane and adds
 * worker nodes on bare-metal OpenShift clusters.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export { Orchestrator, computePlan, operationTitle, presentReport } from './orchestrator/index.js';
export type {
  OperationKind,
  OperationPlan,
  OperationReport,
  OperationRequest,
  OrchestratorDependencies,
} from './orchestrator/index.js';

export { QuorumManager, ENABLE_GUARD_COMMAND } from './quorum/index.js';
export type { QuorumOperations } from './quorum/index.js';

export { ProvisioningMonitor, PROVISIONING_PHASES } from './provisioning/index.js';
export type { ProvisioningOutcome, ProvisioningPhase } from './provisioning/index.js';

export { ClaimCache, ConflictResolver, ResourceManager } from './resources/index.js';
export type { MacConflict } from './resources/index.js';

export { NodeMaterializer, prepareWorkspace } from './materialize/index.js';
export type { NodeParameters, NodeRole } from './materialize/index.js';

export { OcExecutor } from './executor/index.js';
export type { CommandExecutor } from './executor/index.js';

export { parseConfig, applyEnvOverrides, validateConfig } from './config/index.js';
export type { Config } from './config/index.js';

export type { Reporter, Suggestion } from './reporting/types.js';
export { SystemClock, type Clock } from './utils/clock.js';
export { Logger, createLogger } from './utils/logger.js';

export { createDependencies, loadConfig } from './cli/app.js';
export { main } from './cli/main.js';
