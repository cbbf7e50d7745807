import { assertIntegrity, HandleResolver, type HierarchyMutator } from "@fxrack/core";
import type { FxHost, StableId } from "@fxrack/interface";

export const WORKLOAD_NAMES = ["nested-racks", "chain-fanout", "convert-roundtrip"] as const;
export type WorkloadName = (typeof WORKLOAD_NAMES)[number];

export const DEFAULT_BENCH_SIZES = [10, 100, 500] as const;
/** Chains per rack in `chain-fanout` unless overridden. */
export const DEFAULT_CHAINS_PER_RACK = 8;

export function isWorkloadName(value: string): value is WorkloadName {
  return WORKLOAD_NAMES.some((name) => name === value);
}

export type BenchmarkContext = {
  host: FxHost;
  mutator: HierarchyMutator;
};

/** Track shape after a run, read back from the host. */
export type TrackShape = {
  topLevel: number;
  nodes: number;
};

export type BenchmarkWorkload = {
  name: string;
  /** Hierarchy operations the run performs. */
  totalOps: number;
  run: (ctx: BenchmarkContext) => TrackShape;
};

export type WorkloadOptions = {
  /** Chains per rack for `chain-fanout`. */
  perRack?: number;
};

const SAMPLE_PLUGINS = ["VST: ReaComp (Cockos)", "VST: ReaEQ (Cockos)", "VST: ReaDelay (Cockos)"] as const;

const samplePlugin = (i: number): string => SAMPLE_PLUGINS[i % SAMPLE_PLUGINS.length] ?? SAMPLE_PLUGINS[0];

/** Integrity-check the host after a run and report its shape. */
function settle(host: FxHost): TrackShape {
  assertIntegrity(host);
  return { topLevel: host.count(), nodes: new HandleResolver(host).scan().entries.length };
}

function required<T>(value: T | null, what: string): T {
  if (value === null) throw new Error(`${what} was not created`);
  return value;
}

// Top-level racks, each holding one nested rack in a fresh chain.
export function makeNestedRacksWorkload(count: number): BenchmarkWorkload {
  return {
    name: `nested-racks-${count}`,
    totalOps: count * 2,
    run: ({ host, mutator }) => {
      for (let i = 0; i < count; i++) {
        const rack = required(mutator.addRack(), `rack ${i}`);
        required(mutator.addNestedRackToRack(rack.id), `nested rack ${i}`);
      }
      return settle(host);
    },
  };
}

// Chains with one device each, spread over racks of `perRack` chains.
export function makeChainFanoutWorkload(count: number, perRack = DEFAULT_CHAINS_PER_RACK): BenchmarkWorkload {
  if (!Number.isSafeInteger(perRack) || perRack <= 0) throw new Error(`invalid perRack: ${perRack}`);
  return {
    name: `chain-fanout-${count}`,
    totalOps: count + Math.ceil(count / perRack),
    run: ({ host, mutator }) => {
      let rack: StableId | null = null;
      for (let i = 0; i < count; i++) {
        if (rack === null || i % perRack === 0) rack = required(mutator.addRack(), `rack for chain ${i}`).id;
        required(mutator.addChainToRack(rack, samplePlugin(i)), `chain ${i}`);
      }
      return settle(host);
    },
  };
}

// Standalone device → rack → back to a standalone device.
export function makeConvertRoundtripWorkload(count: number): BenchmarkWorkload {
  return {
    name: `convert-roundtrip-${count}`,
    totalOps: count * 3,
    run: ({ host, mutator }) => {
      for (let i = 0; i < count; i++) {
        const device = required(mutator.addDevice(samplePlugin(i)), `device ${i}`);
        const rack = required(mutator.convertDeviceToRack(device.id), `rack around device ${i}`);
        const chain = required(mutator.tree(rack.id).find((node) => node.kind === "chain") ?? null, `chain of rack ${i}`);
        if (mutator.convertChainToDevices(chain.id).length !== 1) throw new Error(`device ${i} did not come back`);
      }
      return settle(host);
    },
  };
}

export function makeWorkload(name: WorkloadName, count: number, opts: WorkloadOptions = {}): BenchmarkWorkload {
  if (name === "chain-fanout") return makeChainFanoutWorkload(count, opts.perRack);
  if (name === "convert-roundtrip") return makeConvertRoundtripWorkload(count);
  return makeNestedRacksWorkload(count);
}
