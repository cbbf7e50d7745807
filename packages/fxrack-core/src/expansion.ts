import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";

import type { StableId } from "@fxrack/interface";
import { isStableId } from "@fxrack/interface/ids";

const EXPANSION_STATE_V1_TAG = "fxrack/expansion/v1";

/**
 * Per-session UI state keyed by StableId: which containers are expanded, the
 * selected chain of each rack, and the breadcrumb of the current selection
 * (outermost first).
 *
 * Entries are independent of each other. Expanding or collapsing one rack
 * never touches another rack's entry, nested or not. Nothing is evicted
 * automatically; the owner calls `retain` when the host reports a structural
 * change and `clear` on teardown.
 */
export class ExpansionState {
  private readonly expanded = new Set<StableId>();
  private readonly selectedChains = new Map<StableId, StableId>();
  private path: StableId[] = [];

  setExpanded(id: StableId, expanded: boolean): void {
    if (expanded) this.expanded.add(id);
    else this.expanded.delete(id);
  }

  isExpanded(id: StableId): boolean {
    return this.expanded.has(id);
  }

  /** Flip `id` and return its new state. */
  toggleExpanded(id: StableId): boolean {
    const next = !this.isExpanded(id);
    this.setExpanded(id, next);
    return next;
  }

  setSelectedChain(rack: StableId, chain: StableId | null): void {
    if (chain === null) this.selectedChains.delete(rack);
    else this.selectedChains.set(rack, chain);
  }

  getSelectedChain(rack: StableId): StableId | null {
    return this.selectedChains.get(rack) ?? null;
  }

  selectionPath(): readonly StableId[] {
    return [...this.path];
  }

  /**
   * Select `id` at breadcrumb `depth` (0-based). Selecting the id already
   * there collapses it and everything below. Returns whether `id` ends up
   * selected.
   */
  toggleContainer(id: StableId, depth: number): boolean {
    assertDepth(depth);
    const wasSelected = this.path[depth] === id;
    this.path = this.path.slice(0, depth);
    if (wasSelected) return false;
    this.path.push(id);
    return true;
  }

  collapseFromDepth(depth: number): void {
    assertDepth(depth);
    this.path = this.path.slice(0, depth);
  }

  selectRack(rack: StableId, depth = 0): void {
    this.collapseFromDepth(depth);
    this.path.push(rack);
    this.expanded.add(rack);
  }

  /** Select `chain` inside `rack`; the breadcrumb is cut just below `rack` when it is on it. */
  selectChain(rack: StableId, chain: StableId): void {
    this.selectedChains.set(rack, chain);
    const at = this.path.indexOf(rack);
    if (at < 0) return;
    this.path = this.path.slice(0, at + 1);
    this.path.push(chain);
  }

  selectDevice(device: StableId, depth: number): void {
    this.collapseFromDepth(depth);
    this.path.push(device);
  }

  clearSelection(): void {
    this.path = [];
  }

  /**
   * Drop every entry that mentions an id outside `liveIds`. The breadcrumb is
   * cut at its first dead id. Returns the number of entries dropped.
   */
  retain(liveIds: Iterable<StableId>): number {
    const live = new Set(liveIds);
    let evicted = 0;
    for (const id of [...this.expanded]) {
      if (live.has(id)) continue;
      this.expanded.delete(id);
      evicted += 1;
    }
    for (const [rack, chain] of [...this.selectedChains]) {
      if (live.has(rack) && live.has(chain)) continue;
      this.selectedChains.delete(rack);
      evicted += 1;
    }
    const firstDead = this.path.findIndex((id) => !live.has(id));
    if (firstDead >= 0) {
      evicted += this.path.length - firstDead;
      this.path = this.path.slice(0, firstDead);
    }
    return evicted;
  }

  clear(): void {
    this.expanded.clear();
    this.selectedChains.clear();
    this.path = [];
  }

  /** @internal used by the snapshot codec */
  entries(): { expanded: StableId[]; selectedChains: [StableId, StableId][]; path: StableId[] } {
    return {
      expanded: [...this.expanded],
      selectedChains: [...this.selectedChains],
      path: [...this.path],
    };
  }
}

function assertDepth(depth: number) {
  if (!Number.isSafeInteger(depth) || depth < 0) throw new Error(`invalid depth: ${depth}`);
}

function assertPayloadMap(payload: unknown, ctx: string): Map<unknown, unknown> {
  if (!(payload instanceof Map)) throw new Error(`${ctx} payload must be a CBOR map`);
  return payload;
}

function assertIdList(val: unknown, field: string): StableId[] {
  if (!Array.isArray(val)) throw new Error(`${field} must be an array`);
  return val.map((id, i) => {
    if (!isStableId(id)) throw new Error(`${field}[${i}] must be a StableId`);
    return id;
  });
}

function assertPairList(val: unknown, field: string): [StableId, StableId][] {
  if (!Array.isArray(val)) throw new Error(`${field} must be an array`);
  return val.map((pair, i) => {
    const ids = assertIdList(pair, `${field}[${i}]`);
    const [rack, chain] = ids;
    if (ids.length !== 2 || rack === undefined || chain === undefined) {
      throw new Error(`${field}[${i}] must be a [rack, chain] pair`);
    }
    return [rack, chain];
  });
}

export function encodeExpansionState(state: ExpansionState): Uint8Array {
  const { expanded, selectedChains, path } = state.entries();
  const payload = new Map<unknown, unknown>();
  payload.set("t", EXPANSION_STATE_V1_TAG);
  payload.set("expanded", expanded);
  payload.set("selected", selectedChains);
  payload.set("path", path);
  return cborEncode(payload, rfc8949EncodeOptions);
}

export function decodeExpansionState(bytes: Uint8Array): ExpansionState {
  const payload = assertPayloadMap(cborDecode(bytes, { useMaps: true }), "ExpansionStateV1");
  if (payload.get("t") !== EXPANSION_STATE_V1_TAG) throw new Error("ExpansionStateV1.t mismatch");

  const state = new ExpansionState();
  for (const id of assertIdList(payload.get("expanded"), "ExpansionStateV1.expanded")) state.setExpanded(id, true);
  for (const [rack, chain] of assertPairList(payload.get("selected"), "ExpansionStateV1.selected")) {
    state.setSelectedChain(rack, chain);
  }
  const path = assertIdList(payload.get("path"), "ExpansionStateV1.path");
  path.forEach((id, depth) => state.toggleContainer(id, depth));
  return state;
}
