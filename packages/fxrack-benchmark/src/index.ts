import { HierarchyMutator, type HierarchyMutatorOptions } from "@fxrack/core";
import { createInMemoryFxHost } from "@fxrack/host-memory";

import { makeWorkload, type BenchmarkContext, type TrackShape, type WorkloadName, type WorkloadOptions } from "./workloads.js";

export * from "./workloads.js";

export type BenchmarkReport = {
  workload: string;
  totalOps: number;
  iterations: number;
  warmupIterations: number;
  medianMs: number;
  p95Ms: number;
  opsPerSec: number;
  shape: TrackShape;
};

export type MeasureOptions = WorkloadOptions & {
  iterations?: number;
  warmupIterations?: number;
  /** Fresh host and mutator per run; an in-memory host by default. */
  context?: () => BenchmarkContext;
};

/** A fresh in-memory host with a quiet mutator on top. */
export function memoryContext(opts: HierarchyMutatorOptions = {}): BenchmarkContext {
  const host = createInMemoryFxHost();
  return { host, mutator: new HierarchyMutator(host, opts) };
}

/** Linear-interpolated quantile of run durations. */
export function durationQuantile(durations: readonly number[], q: number): number {
  if (durations.length === 0) throw new Error("no durations");
  if (!(q >= 0 && q <= 1)) throw new Error(`q must be in [0,1], got: ${q}`);
  const sorted = [...durations].sort((a, b) => a - b);
  const idx = (sorted.length - 1) * q;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  const below = sorted[lo] ?? 0;
  const above = sorted[hi] ?? below;
  return below + (above - below) * (idx - lo);
}

/**
 * Run one workload `warmupIterations + iterations` times, each on a fresh
 * context, and report the timed runs.
 */
export function measureWorkload(name: WorkloadName, size: number, opts: MeasureOptions = {}): BenchmarkReport {
  const iterations = opts.iterations ?? 1;
  const warmupIterations = opts.warmupIterations ?? (iterations > 1 ? 1 : 0);
  if (!Number.isSafeInteger(iterations) || iterations <= 0) throw new Error(`invalid iterations: ${iterations}`);
  if (!Number.isSafeInteger(warmupIterations) || warmupIterations < 0) {
    throw new Error(`invalid warmupIterations: ${warmupIterations}`);
  }
  const context = opts.context ?? (() => memoryContext());

  let shape: TrackShape = { topLevel: 0, nodes: 0 };
  const durations: number[] = [];
  for (let i = 0; i < warmupIterations + iterations; i++) {
    const workload = makeWorkload(name, size, opts);
    const ctx = context();
    const start = performance.now();
    shape = workload.run(ctx);
    const elapsed = performance.now() - start;
    if (i >= warmupIterations) durations.push(elapsed);
  }

  const workload = makeWorkload(name, size, opts);
  const medianMs = durationQuantile(durations, 0.5);
  return {
    workload: workload.name,
    totalOps: workload.totalOps,
    iterations,
    warmupIterations,
    medianMs,
    p95Ms: durationQuantile(durations, 0.95),
    opsPerSec: medianMs > 0 ? (workload.totalOps / medianMs) * 1000 : Infinity,
    shape,
  };
}
