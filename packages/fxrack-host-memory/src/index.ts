import { randomUUID } from "node:crypto";

import type { FxHandle, FxHost, StableId } from "@fxrack/interface";
import { normalizeStableId } from "@fxrack/interface/ids";

import { decodeAddress, encodeAddress } from "./address.js";

export { CONTAINER_ADDRESS_BASE, decodeAddress, encodeAddress } from "./address.js";

export type HostWriteOp = "insertFx" | "moveToContainer" | "moveToTopLevel" | "remove" | "rename";

export type InMemoryFxHostOptions = {
  /** Plugin name that creates a container (default `Container`). */
  containerPlugin?: string;
  /** Reject moves that would give a container more children than this. */
  maxContainerChildren?: number;
  /**
   * After each structural write, this many `stableId` reads return `null`,
   * imitating a host whose list is still settling.
   */
  staleReadsAfterWrite?: number;
  generateId?: () => StableId;
};

export type HostTreeRow = {
  id: StableId;
  name: string;
  plugin: string;
  isContainer: boolean;
  children: HostTreeRow[];
};

type FxRecord = {
  id: StableId;
  plugin: string;
  renamed: string | null;
  isContainer: boolean;
  parent: FxRecord | null;
  children: FxRecord[];
};

export type InMemoryFxHost = FxHost & {
  /** Fail the next `times` calls of `op` as a host refusal. */
  failNext: (op: HostWriteOp, times?: number) => void;
  /** Snapshot of the whole tree, top level first. */
  dump: () => HostTreeRow[];
  /** Labels passed to `endUndoBlock`, oldest first. */
  undoLabels: () => string[];
  openUndoBlocks: () => number;
  uiRefreshDepth: () => number;
  /** Structural writes performed so far. */
  writeCount: () => number;
};

export function createInMemoryFxHost(opts: InMemoryFxHostOptions = {}): InMemoryFxHost {
  const containerPlugin = opts.containerPlugin ?? "Container";
  const maxContainerChildren = opts.maxContainerChildren ?? Number.POSITIVE_INFINITY;
  const staleReadsAfterWrite = opts.staleReadsAfterWrite ?? 0;
  const generateId = opts.generateId ?? (() => normalizeStableId(randomUUID()));

  if (!Number.isInteger(staleReadsAfterWrite) || staleReadsAfterWrite < 0) {
    throw new Error(`invalid staleReadsAfterWrite: ${opts.staleReadsAfterWrite}`);
  }

  const top: FxRecord[] = [];
  const faults = new Map<HostWriteOp, number>();
  const undoLabels: string[] = [];
  let openUndo = 0;
  let uiRefreshDepth = 0;
  let pendingStaleReads = 0;
  let writes = 0;

  const lookup = (fx: FxHandle): FxRecord | null => decodeAddress(fx, top);

  const siblingsOf = (rec: FxRecord): FxRecord[] => (rec.parent ? rec.parent.children : top);

  const handleOf = (rec: FxRecord): FxHandle => {
    const positions: number[] = [];
    const counts: number[] = [];
    let cur: FxRecord | null = rec;
    while (cur) {
      const siblings = siblingsOf(cur);
      positions.unshift(siblings.indexOf(cur));
      counts.unshift(siblings.length);
      cur = cur.parent;
    }
    return encodeAddress(positions, counts);
  };

  const consumeFault = (op: HostWriteOp): boolean => {
    const remaining = faults.get(op) ?? 0;
    if (remaining <= 0) return false;
    if (remaining === 1) faults.delete(op);
    else faults.set(op, remaining - 1);
    return true;
  };

  const committed = () => {
    writes += 1;
    pendingStaleReads = staleReadsAfterWrite;
  };

  const detach = (rec: FxRecord) => {
    const siblings = siblingsOf(rec);
    const idx = siblings.indexOf(rec);
    if (idx >= 0) siblings.splice(idx, 1);
    rec.parent = null;
  };

  const clampPosition = (position: number | undefined, length: number): number => {
    if (position === undefined || !Number.isFinite(position) || position >= length) return length;
    return Math.max(0, Math.floor(position));
  };

  const isAncestorOf = (maybeAncestor: FxRecord, rec: FxRecord): boolean => {
    for (let cur: FxRecord | null = rec; cur; cur = cur.parent) {
      if (cur === maybeAncestor) return true;
    }
    return false;
  };

  const toRow = (rec: FxRecord): HostTreeRow => ({
    id: rec.id,
    name: rec.renamed ?? rec.plugin,
    plugin: rec.plugin,
    isContainer: rec.isContainer,
    children: rec.children.map(toRow),
  });

  return {
    count: () => top.length,
    topLevelAt: (position) => (Number.isInteger(position) && top[position] ? position : null),

    stableId(fx) {
      if (pendingStaleReads > 0) {
        pendingStaleReads -= 1;
        return null;
      }
      return lookup(fx)?.id ?? null;
    },
    name(fx) {
      const rec = lookup(fx);
      return rec ? rec.renamed ?? rec.plugin : null;
    },
    rename(fx, name) {
      const rec = lookup(fx);
      if (!rec || consumeFault("rename")) return false;
      rec.renamed = name;
      return true;
    },
    isContainer: (fx) => lookup(fx)?.isContainer ?? false,
    parentOf(fx) {
      const rec = lookup(fx);
      return rec?.parent ? handleOf(rec.parent) : null;
    },
    childCount(container) {
      const rec = lookup(container);
      return rec?.isContainer ? rec.children.length : 0;
    },
    childAt(container, position) {
      const rec = lookup(container);
      const child = rec?.isContainer ? rec.children[position] : undefined;
      return child ? handleOf(child) : null;
    },

    insertFx(pluginName, position) {
      if (consumeFault("insertFx")) return null;
      const rec: FxRecord = {
        id: generateId(),
        plugin: pluginName,
        renamed: null,
        isContainer: pluginName === containerPlugin,
        parent: null,
        children: [],
      };
      const at = clampPosition(position, top.length);
      top.splice(at, 0, rec);
      committed();
      return handleOf(rec);
    },
    moveToContainer(fx, container, position) {
      const rec = lookup(fx);
      const target = lookup(container);
      if (!rec || !target || !target.isContainer) return false;
      if (isAncestorOf(rec, target)) return false;
      const growth = rec.parent === target ? 0 : 1;
      if (target.children.length + growth > maxContainerChildren) return false;
      if (consumeFault("moveToContainer")) return false;
      detach(rec);
      target.children.splice(clampPosition(position, target.children.length), 0, rec);
      rec.parent = target;
      committed();
      return true;
    },
    moveToTopLevel(fx, position) {
      const rec = lookup(fx);
      if (!rec || consumeFault("moveToTopLevel")) return false;
      detach(rec);
      top.splice(clampPosition(position, top.length), 0, rec);
      committed();
      return true;
    },
    remove(fx) {
      const rec = lookup(fx);
      if (!rec || consumeFault("remove")) return false;
      detach(rec);
      committed();
      return true;
    },

    beginUndoBlock() {
      openUndo += 1;
    },
    endUndoBlock(label) {
      if (openUndo === 0) throw new Error(`endUndoBlock without begin: ${label}`);
      openUndo -= 1;
      undoLabels.push(label);
    },
    preventUiRefresh(delta) {
      uiRefreshDepth += delta;
    },

    failNext(op, times = 1) {
      if (!Number.isInteger(times) || times <= 0) throw new Error(`invalid times: ${times}`);
      faults.set(op, (faults.get(op) ?? 0) + times);
    },
    dump: () => top.map(toRow),
    undoLabels: () => [...undoLabels],
    openUndoBlocks: () => openUndo,
    uiRefreshDepth: () => uiRefreshDepth,
    writeCount: () => writes,
  };
}
