/**
 * Edge Node Registry
 * Arena of node records addressed by stable integer ids. Ids are never reused,
 * including across generations. Positions come from the grid slot a node was
 * born into and never change.
 */

import type { Gene } from "./gene";
import type { ResolvedModelProfile } from "./hybridResolver";
import { HARDWARE_TIERS, type HardwareTierId } from "./hardwareTiers";
import { clamp01 } from "../utils/sanitize";

export type NodeStatus = "Alive" | "Dead";

export interface BatteryState {
  capacityWh: number;
  currentWh: number;
  status: NodeStatus;
}

export interface GridLayout {
  width: number;
  height: number;
  spacing: number;
}

export interface NodePosition {
  slot: number;
  cellX: number;
  cellY: number;
  // World coordinates, grid centred on the origin
  x: number;
  y: number;
}

export interface EdgeNode {
  id: number;
  position: NodePosition;
  battery: BatteryState;
  gene: Gene;
  model: ResolvedModelProfile;
  hardwareTier: HardwareTierId | null;
  maxHarvestW: number | null; // panel rating cap, null = uncapped
  ageTicks: number;
  survivalS: number;
  usefulWork: number;
  inferences: number;
  energyConsumedWh: number;
  energyHarvestedWh: number;
  generation: number;
  parentId: number | null;
}

export interface RegistryOptions {
  layout: GridLayout;
  capacityWh: number;
  initialChargeFraction: number;
  hardwareTier: HardwareTierId | null;
}

export interface SpawnRequest {
  slot: number;
  gene: Gene;
  model: ResolvedModelProfile;
  generation: number;
  parentId: number | null;
}

/**
 * Read-only view handed to the renderer.
 */
export interface NodeSnapshot {
  id: number;
  position: NodePosition;
  currentWh: number;
  capacityWh: number;
  chargeRatio: number;
  status: NodeStatus;
  modelId: string;
}

export function gridPosition(slot: number, layout: GridLayout): NodePosition {
  if (!Number.isInteger(slot) || slot < 0 || slot >= layout.width * layout.height) {
    throw new RangeError(`Slot ${slot} outside ${layout.width}x${layout.height} grid`);
  }
  const cellX = slot % layout.width;
  const cellY = Math.floor(slot / layout.width);
  const offsetX = (layout.width * layout.spacing) / 2;
  const offsetY = (layout.height * layout.spacing) / 2;
  return {
    slot,
    cellX,
    cellY,
    x: cellX * layout.spacing - offsetX,
    y: cellY * layout.spacing - offsetY,
  };
}

export function isAlive(node: EdgeNode): boolean {
  return node.battery.status === "Alive";
}

export function toSnapshot(node: EdgeNode): NodeSnapshot {
  const { capacityWh, currentWh, status } = node.battery;
  return {
    id: node.id,
    position: node.position,
    currentWh,
    capacityWh,
    chargeRatio: capacityWh > 0 ? clamp01(currentWh / capacityWh) : 0,
    status,
    modelId: node.model.identifier,
  };
}

export class EdgeNodeRegistry {
  private readonly nodes = new Map<number, EdgeNode>();
  private nextId = 1;
  private readonly capacityWh: number;
  private readonly maxHarvestW: number | null;

  constructor(private readonly options: RegistryOptions) {
    const tier = options.hardwareTier === null ? null : HARDWARE_TIERS[options.hardwareTier];
    this.capacityWh = tier ? tier.battery_capacity_wh : options.capacityWh;
    this.maxHarvestW = tier ? tier.max_solar_input_w : null;
  }

  get layout(): GridLayout {
    return this.options.layout;
  }

  get size(): number {
    return this.nodes.size;
  }

  spawn(request: SpawnRequest): EdgeNode {
    const node: EdgeNode = {
      id: this.nextId++,
      position: gridPosition(request.slot, this.options.layout),
      battery: {
        capacityWh: this.capacityWh,
        currentWh: this.capacityWh * clamp01(this.options.initialChargeFraction),
        status: "Alive",
      },
      gene: request.gene,
      model: request.model,
      hardwareTier: this.options.hardwareTier,
      maxHarvestW: this.maxHarvestW,
      ageTicks: 0,
      survivalS: 0,
      usefulWork: 0,
      inferences: 0,
      energyConsumedWh: 0,
      energyHarvestedWh: 0,
      generation: request.generation,
      parentId: request.parentId,
    };
    // A node born with an empty battery is dead on arrival
    if (node.battery.currentWh <= 0) {
      node.battery = { ...node.battery, currentWh: 0, status: "Dead" };
    }
    this.nodes.set(node.id, node);
    return node;
  }

  get(id: number): EdgeNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * Replace a node record with an updated copy. The id must already exist.
   */
  update(node: EdgeNode): void {
    if (!this.nodes.has(node.id)) {
      throw new RangeError(`Node ${node.id} is not registered`);
    }
    this.nodes.set(node.id, node);
  }

  remove(id: number): EdgeNode | undefined {
    const node = this.nodes.get(id);
    this.nodes.delete(id);
    return node;
  }

  /** Nodes in id order */
  list(): EdgeNode[] {
    return [...this.nodes.values()].sort((a, b) => a.id - b.id);
  }

  alive(): EdgeNode[] {
    return this.list().filter(isAlive);
  }

  dead(): EdgeNode[] {
    return this.list().filter((n) => !isAlive(n));
  }

  /**
   * Drop every node and spawn the given generation. Returns the removed nodes.
   */
  replaceAll(requests: SpawnRequest[]): EdgeNode[] {
    const previous = this.list();
    this.nodes.clear();
    for (const request of requests) {
      this.spawn(request);
    }
    return previous;
  }

  snapshot(): NodeSnapshot[] {
    return this.list().map(toSnapshot);
  }
}
