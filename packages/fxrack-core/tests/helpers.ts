import type { StableId } from "@fxrack/interface";
import { stableIdFromCounter } from "@fxrack/interface/ids";
import { createInMemoryFxHost, type HostTreeRow, type InMemoryFxHostOptions } from "@fxrack/host-memory";

import { HierarchyError } from "../src/errors.js";
import { ExpansionState } from "../src/expansion.js";
import { HierarchyMutator, type HierarchyMutatorOptions } from "../src/mutator.js";

/** The n-th id the fixture host hands out. */
export const id = (n: number): StableId => stableIdFromCounter(n);

export function counterIds() {
  let n = 0;
  return () => stableIdFromCounter(++n);
}

export function setup(opts: { host?: InMemoryFxHostOptions; mutator?: HierarchyMutatorOptions } = {}) {
  const host = createInMemoryFxHost({ generateId: counterIds(), ...opts.host });
  const expansion = new ExpansionState();
  const mutator = new HierarchyMutator(host, { expansion, ...opts.mutator });
  return { host, expansion, mutator };
}

/** Indented names, two spaces per level. Reads the host directly, so it never consumes stale reads. */
export function outline(rows: HostTreeRow[], depth = 0): string[] {
  return rows.flatMap((row) => [`${"  ".repeat(depth)}${row.name}`, ...outline(row.children, depth + 1)]);
}

export function catchHierarchyError(fn: () => unknown): HierarchyError {
  try {
    fn();
  } catch (err) {
    if (err instanceof HierarchyError) return err;
    throw err;
  }
  throw new Error("expected a HierarchyError");
}
