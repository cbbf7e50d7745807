import type { AncestorEntry, FxHandle, FxHost, StableId } from "@fxrack/interface";
import { decodeStableId } from "@fxrack/interface/ids";

import { DEFAULT_MAX_DEPTH, DEFAULT_RESOLVE_ATTEMPTS, type HierarchyManagerOptions } from "./config.js";

export type TrackEntry = {
  handle: FxHandle;
  id: StableId;
  parent: FxHandle | null;
  /** 0-based position in the parent's (or the top level's) child list. */
  position: number;
  depth: number;
};

export type TrackScan = {
  entries: TrackEntry[];
  /** Entries the host could not read during this scan. */
  unreadable: number;
};

export type HandleResolverOptions = Pick<HierarchyManagerOptions, "resolveAttempts" | "maxDepth" | "debug" | "log">;

/**
 * Turns StableIds into handles and handles into logical positions.
 *
 * Every handle this class returns is valid only until the next structural
 * edit anywhere in the track; callers re-resolve by StableId after each one.
 * Nothing is cached between calls.
 */
export class HandleResolver {
  private readonly attempts: number;
  private readonly maxDepth: number;
  private readonly debug: boolean;
  private readonly log: (line: string) => void;

  constructor(
    private readonly host: FxHost,
    opts: HandleResolverOptions = {}
  ) {
    this.attempts = opts.resolveAttempts ?? DEFAULT_RESOLVE_ATTEMPTS;
    this.maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.debug = Boolean(opts.debug);
    this.log = opts.log ?? ((line) => console.debug(line));
    if (!Number.isSafeInteger(this.attempts) || this.attempts <= 0) {
      throw new Error(`invalid resolveAttempts: ${opts.resolveAttempts}`);
    }
    if (!Number.isSafeInteger(this.maxDepth) || this.maxDepth <= 0) throw new Error(`invalid maxDepth: ${opts.maxDepth}`);
  }

  readId(fx: FxHandle): StableId | null {
    const raw = this.host.stableId(fx);
    return raw === null ? null : decodeStableId(raw);
  }

  topLevelHandles(): FxHandle[] {
    const out: FxHandle[] = [];
    const count = this.host.count();
    for (let i = 0; i < count; i++) {
      const fx = this.host.topLevelAt(i);
      if (fx !== null) out.push(fx);
    }
    return out;
  }

  childHandles(container: FxHandle): FxHandle[] {
    const out: FxHandle[] = [];
    const count = this.host.childCount(container);
    for (let i = 0; i < count; i++) {
      const fx = this.host.childAt(container, i);
      if (fx !== null) out.push(fx);
    }
    return out;
  }

  /**
   * Depth-first, left-to-right read of the list (or of `root`'s subtree,
   * excluding `root` itself).
   */
  scan(root: FxHandle | null = null): TrackScan {
    const entries: TrackEntry[] = [];
    let unreadable = 0;

    const visitList = (parent: FxHandle | null, depth: number) => {
      if (depth > this.maxDepth) return;
      const count = parent === null ? this.host.count() : this.host.childCount(parent);
      for (let position = 0; position < count; position++) {
        const handle = parent === null ? this.host.topLevelAt(position) : this.host.childAt(parent, position);
        const id = handle === null ? null : this.readId(handle);
        if (handle === null || id === null) {
          unreadable += 1;
          continue;
        }
        entries.push({ handle, id, parent, position, depth });
        if (this.host.isContainer(handle)) visitList(handle, depth + 1);
      }
    };

    visitList(root, 0);
    return { entries, unreadable };
  }

  /**
   * Fresh handle for `id`, or `null` if it no longer exists. With
   * `searchRoot`, only that node's subtree is searched.
   *
   * A scan that hit unreadable entries is repeated (up to `resolveAttempts`
   * scans in total) since the host may still be settling after a write.
   */
  resolve(id: StableId, searchRoot?: StableId): FxHandle | null {
    const found = this.resolveAll([id], searchRoot);
    return found.get(decodeStableId(id)) ?? null;
  }

  /** Resolve several ids against one read of the list. Missing ids are absent from the map. */
  resolveAll(ids: Iterable<StableId>, searchRoot?: StableId): Map<StableId, FxHandle> {
    const wanted = new Set<StableId>();
    for (const id of ids) wanted.add(decodeStableId(id));
    const found = new Map<StableId, FxHandle>();
    if (wanted.size === 0) return found;

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      let root: FxHandle | null = null;
      if (searchRoot !== undefined) {
        root = this.resolve(searchRoot);
        if (root === null) return found;
      }

      found.clear();
      const { entries, unreadable } = this.scan(root);
      for (const entry of entries) {
        if (wanted.has(entry.id) && !found.has(entry.id)) found.set(entry.id, entry.handle);
      }
      if (found.size === wanted.size || unreadable === 0) return found;
      if (this.debug) {
        this.log(`[fxrack:resolver] attempt ${attempt}: ${wanted.size - found.size} id(s) missing, ${unreadable} unreadable`);
      }
    }
    return found;
  }

  /** Handles from the outermost ancestor down to `fx` itself; `null` on a cycle. */
  ancestorHandles(fx: FxHandle): FxHandle[] | null {
    const chain: FxHandle[] = [fx];
    let cur = fx;
    for (;;) {
      const parent = this.host.parentOf(cur);
      if (parent === null) return chain;
      if (chain.length > this.maxDepth) return null;
      chain.unshift(parent);
      cur = parent;
    }
  }

  /**
   * Walk outward from `fx` to the top level, recording each node's id and
   * its 0-based position in its parent's current child list. The first entry
   * is `fx` itself, the last is its top-level ancestor. Returns `null` if any
   * level cannot be read.
   */
  ancestorPath(fx: FxHandle): AncestorEntry[] | null {
    const handles = this.ancestorHandles(fx);
    if (!handles) return null;

    const out: AncestorEntry[] = [];
    for (let i = handles.length - 1; i >= 0; i--) {
      const id = this.readId(handles[i]!);
      if (id === null) return null;
      const parent = i > 0 ? handles[i - 1]! : null;
      const siblings = parent === null ? this.topLevelHandles() : this.childHandles(parent);
      const position = siblings.findIndex((s) => this.readId(s) === id);
      if (position < 0) return null;
      out.push({ id, position });
    }
    return out;
  }

  /** Parent's id, `null` at top level, `undefined` if `id` does not resolve. */
  parentIdOf(id: StableId): StableId | null | undefined {
    const fx = this.resolve(id);
    if (fx === null) return undefined;
    const parent = this.host.parentOf(fx);
    if (parent === null) return null;
    return this.readId(parent) ?? undefined;
  }
}
