/**
 * Runtime Invariant Checker
 * Verifies node state coherence after every committed tick
 */

import { assertGeneBounds, type MutationRateBounds } from "./gene";
import type { EdgeNode } from "./nodeRegistry";

const EPS = 1e-9;

export function checkNodeInvariants(nodes: readonly EdgeNode[], bounds: MutationRateBounds): void {
  const seenIds = new Set<number>();
  const seenSlots = new Set<number>();

  for (const node of nodes) {
    const { capacityWh, currentWh, status } = node.battery;

    // A. Charge within [0, capacity]
    if (!(currentWh >= 0) || currentWh > capacityWh + EPS) {
      throw new Error(
        `[Invariant A] Node ${node.id} charge ${currentWh} outside [0, ${capacityWh}]`
      );
    }

    // B. Dead exactly when empty
    if ((status === "Dead") !== (currentWh === 0)) {
      throw new Error(
        `[Invariant B] Node ${node.id} status ${status} with charge ${currentWh}`
      );
    }

    // C. Unique ids and grid cells
    if (seenIds.has(node.id)) {
      throw new Error(`[Invariant C] Duplicate node id ${node.id}`);
    }
    if (seenSlots.has(node.position.slot)) {
      throw new Error(`[Invariant C] Two nodes in grid slot ${node.position.slot}`);
    }
    seenIds.add(node.id);
    seenSlots.add(node.position.slot);

    // D. Gene bounds (throws InvalidGeneBoundsError)
    assertGeneBounds(node.gene, bounds);

    // E. Model reference agrees with gene
    if (node.model.identifier !== node.gene.modelId) {
      throw new Error(
        `[Invariant E] Node ${node.id} runs ${node.model.identifier} but gene selects ${node.gene.modelId}`
      );
    }
  }
}
