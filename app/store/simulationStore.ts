import { createStore } from "zustand/vanilla";
import type { NodeSnapshot } from "../lib/edgeSim/nodeRegistry";
import type { ClockState } from "../lib/edgeSim/simulationClock";
import { createRunTotals, type GenerationStats, type RunTotals } from "../lib/edgeSim/simulationMetrics";
import type { RunStatus, SimulationRunner, SimulationSnapshot } from "../lib/edgeSim/simulationRunner";
import type { MalformedOverride } from "../lib/edgeSim/errors";

// Read-only view for a renderer. The simulation writes, subscribers only read.

export type StoreStatus = "idle" | "running" | RunStatus | "error";

export interface SimulationStoreState {
  nodes: NodeSnapshot[];
  clock: ClockState | null;
  totals: RunTotals;
  generations: GenerationStats[];
  issues: MalformedOverride[];
  status: StoreStatus;
  error: string | null;
  publish: (snapshot: SimulationSnapshot) => void;
  recordGeneration: (stats: GenerationStats, snapshot: SimulationSnapshot) => void;
  setIssues: (issues: MalformedOverride[]) => void;
  setStatus: (status: StoreStatus) => void;
  setError: (error: string | null) => void;
  reset: () => void;
}

export const createSimulationStore = () =>
  createStore<SimulationStoreState>()((set) => ({
    nodes: [],
    clock: null,
    totals: createRunTotals(),
    generations: [],
    issues: [],
    status: "idle",
    error: null,
    publish: (snapshot) => set({ nodes: snapshot.nodes, clock: snapshot.clock, totals: snapshot.totals }),
    recordGeneration: (stats, snapshot) =>
      set((state) => ({
        nodes: snapshot.nodes,
        clock: snapshot.clock,
        totals: snapshot.totals,
        generations: [...state.generations, stats],
      })),
    setIssues: (issues) => set({ issues }),
    setStatus: (status) => set({ status }),
    setError: (error) => set({ error, status: error === null ? "idle" : "error" }),
    reset: () =>
      set({
        nodes: [],
        clock: null,
        totals: createRunTotals(),
        generations: [],
        issues: [],
        status: "idle",
        error: null,
      }),
  }));

export type SimulationStore = ReturnType<typeof createSimulationStore>;

/**
 * Publish runner state into the store every `everyTicks` ticks and at every
 * generation boundary. Returns the unsubscribe function.
 */
export function connectRunner(store: SimulationStore, runner: SimulationRunner, everyTicks: number = 1): () => void {
  const interval = Math.max(1, Math.floor(everyTicks));
  const { publish, recordGeneration } = store.getState();

  publish(runner.snapshot());
  return runner.addListener({
    onTick: (report) => {
      if (report.tick % interval === 0) publish(runner.snapshot());
    },
    onGeneration: (stats) => recordGeneration(stats, runner.snapshot()),
  });
}
