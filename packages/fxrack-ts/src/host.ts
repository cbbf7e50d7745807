import type { FxHandle, StableId } from "./index.js";

/**
 * The host application's per-track effect list.
 *
 * Flat, ordered and mutable; containers are FX whose children are addressed
 * through the same handle space. Every call is synchronous. No ordering or
 * atomicity is guaranteed across calls, and no handle survives a structural
 * edit (insert, move, remove) anywhere in the track.
 *
 * Read accessors return `null` (or `false`/`0`) for a handle the host cannot
 * resolve; a stale handle may also resolve to a different FX without error.
 */
export interface FxHost {
  /** Number of FX at the top level of the track. */
  count(): number;
  topLevelAt(position: number): FxHandle | null;

  stableId(fx: FxHandle): StableId | null;
  name(fx: FxHandle): string | null;
  rename(fx: FxHandle, name: string): boolean;
  isContainer(fx: FxHandle): boolean;
  /** Containing FX, or `null` at top level. */
  parentOf(fx: FxHandle): FxHandle | null;
  childCount(container: FxHandle): number;
  childAt(container: FxHandle, position: number): FxHandle | null;

  /**
   * Insert a plugin at the top level (`position` defaults to the end).
   * The host's container plugin creates an empty container.
   */
  insertFx(pluginName: string, position?: number): FxHandle | null;
  /**
   * Move `fx` into `container` at `position` (counted after `fx` is detached
   * from its current parent). Returns `false` when the host refuses.
   */
  moveToContainer(fx: FxHandle, container: FxHandle, position: number): boolean;
  /** Move `fx` to the top level (`position` defaults to the end). */
  moveToTopLevel(fx: FxHandle, position?: number): boolean;
  /** Delete `fx`; containers take all their descendants with them. */
  remove(fx: FxHandle): boolean;

  beginUndoBlock?(): void;
  endUndoBlock?(label: string): void;
  preventUiRefresh?(delta: 1 | -1): void;
}

export type HostFactory<TConfig = void> = (config: TConfig) => FxHost;
