import type { FxHost, StableId } from "@fxrack/interface";

import { HandleResolver } from "./resolver.js";

export type StructureSnapshot = {
  /** Top-level FX count. */
  count: number;
  /** Every readable id in the track, depth-first. */
  ids: StableId[];
};

export type StructureChange = {
  changed: boolean;
  /** Ids present in the previous snapshot that are gone now. */
  vanished: StableId[];
};

export type StructureWatcher = {
  snapshot: () => StructureSnapshot;
  /** Compare the host against the last snapshot, then take a new one. */
  poll: () => StructureChange;
};

/**
 * Per-frame change detection over the flat list. The caller uses `vanished`
 * to drop state keyed by ids that no longer exist (see `ExpansionState.retain`).
 */
export function createStructureWatcher(host: FxHost, resolver: HandleResolver = new HandleResolver(host)): StructureWatcher {
  const take = (): StructureSnapshot => ({
    count: host.count(),
    ids: resolver.scan().entries.map((e) => e.id),
  });

  let last = take();

  return {
    snapshot: () => ({ count: last.count, ids: [...last.ids] }),
    poll() {
      const next = take();
      const changed =
        next.count !== last.count || next.ids.length !== last.ids.length || next.ids.some((id, i) => id !== last.ids[i]);
      const present = new Set(next.ids);
      const vanished = last.ids.filter((id) => !present.has(id));
      last = next;
      return { changed, vanished };
    },
  };
}
