/**
 * Node configuration files: workspace, templates and per-node rewrites.
 *
 * @packageDocumentation
 */

export { NodeMaterializer, pickMachineTemplate, pickTemplateHost } from './materializer.js';
export type { HostRole, MaterializerOptions, NodeConfigRequest, TemplateSource } from './materializer.js';
export {
  ETCD_PRE_DRAIN_HOOK,
  configureNode,
  credentialSecretName,
  machineNameFor,
  machineNamePrefix,
  networkSecretName,
  normalizeRole,
  rewriteBmcAddress,
  updateClaim,
  updateCredentialSecret,
  updateMachine,
  updateNetworkSecret,
  updateNmstateIp,
} from './node-configurator.js';
export type {
  ClaimTemplate,
  ConfigureResult,
  MaterializeResult,
  MaterializedNode,
  NodeConfiguration,
  NodeParameters,
  NodeRole,
  TemplateResult,
} from './types.js';
export { UNKNOWN_CLUSTER, prepareWorkspace } from './workspace.js';
export type { Workspace, WorkspaceOptions } from './workspace.js';
