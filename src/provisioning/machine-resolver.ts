/**
 * Identifies the Machine backing a newly provisioned BareMetalHost.
 *
 * @packageDocumentation
 */

import type { JsonObject } from '../cluster/json.js';
import {
  MACHINE_HOST_ANNOTATION,
  embeddedNumber,
  hostConsumerMachine,
  resourceAnnotations,
  resourceName,
} from '../cluster/resources.js';
import type { MachineResolution } from './types.js';

/**
 * Machine named by the host's `spec.consumerRef`.
 */
export function resolveFromClaim(host: unknown): MachineResolution | undefined {
  const name = hostConsumerMachine(host);
  return name === undefined ? undefined : { resolvedVia: 'ConsumerRef', name };
}

/**
 * Fallback match for control-plane nodes whose host has no consumerRef yet.
 *
 * Prefers a machine whose host annotation contains the node name, then one
 * whose name or host annotation contains the node's first number.
 *
 * @param nodeName - Host and node name, e.g. `master-2`.
 * @param machines - Machines in the machine API namespace.
 */
export function resolveByHeuristic(
  nodeName: string,
  machines: readonly JsonObject[]
): MachineResolution | undefined {
  const named = machines
    .map((machine): { name: string | undefined; host: string | undefined } => ({
      name: resourceName(machine),
      host: resourceAnnotations(machine)[MACHINE_HOST_ANNOTATION],
    }))
    .filter((entry): entry is { name: string; host: string | undefined } => entry.name !== undefined);

  const byAnnotation = named.find((entry) => entry.host?.includes(nodeName) === true);
  if (byAnnotation !== undefined) {
    return { resolvedVia: 'NumericHeuristic', name: byAnnotation.name };
  }

  const number = embeddedNumber(nodeName);
  if (number === undefined) {
    return undefined;
  }
  const byNumber = named.find(
    (entry) => entry.name.includes(number) || entry.host?.includes(number) === true
  );
  return byNumber === undefined ? undefined : { resolvedVia: 'NumericHeuristic', name: byNumber.name };
}
