import type { FxHandle, FxHost, HierarchyPath, NodeKind, PluginRef, StableId } from "@fxrack/interface";
import { decodeStableId } from "@fxrack/interface/ids";

import { classifyHandle } from "./classify.js";
import { resolveManagerOptions, type HierarchyManagerOptions, type ResolvedManagerOptions } from "./config.js";
import { HierarchyError, type HierarchyErrorCode } from "./errors.js";
import type { ExpansionState } from "./expansion.js";
import {
  chainIndexOf,
  decodeName,
  deviceIndexOf,
  encodeName,
  isChainName,
  isMixerName,
  modulatorIndexOf,
  nextFreeIndex,
  rackIndexOf,
  shortPluginName,
  type DecodedName,
} from "./naming.js";
import { renumberLevel, rewriteDevicePath, type RenumberLevel } from "./renumber.js";
import { HandleResolver } from "./resolver.js";
import { describeNode, readTree, type NodeRef, type NodeView } from "./tree.js";

export type HierarchyMutatorOptions = HierarchyManagerOptions & {
  /**
   * When set, new racks are expanded and new chains selected, the way the
   * rack view expects after each edit.
   */
  expansion?: ExpansionState;
};

export type PluginInput = string | PluginRef;

type OpContext = {
  label: string;
  /** Nodes this operation has committed so far. */
  created: StableId[];
};

/** Where a moved node lands among the container's other children. */
type Placement = number | "end" | "beforeMixer" | { before: StableId };

type Target = {
  id: StableId;
  fx: FxHandle;
  decoded: DecodedName | null;
};

/** A node stopped resolving mid-operation; the transaction turns this into the not-found result. */
class NodeVanished extends Error {
  constructor(readonly id: StableId) {
    super(`${id} no longer resolves`);
  }
}

function toPluginRef(plugin: PluginInput): PluginRef {
  const ref = typeof plugin === "string" ? { fullName: plugin } : plugin;
  if (ref.fullName.trim().length === 0) throw new Error("invalid plugin: name must not be empty");
  return ref;
}

function pluginLabel(plugin: PluginRef): string | undefined {
  const label = plugin.label ?? shortPluginName(plugin.fullName);
  return label.length > 0 ? label : undefined;
}

/**
 * Structural edits on the rack/chain/device hierarchy.
 *
 * Every public operation takes StableIds and follows the same skeleton:
 * resolve what it needs, issue one host write, re-resolve by StableId, repeat,
 * then validate placement before returning. No handle is reused across a
 * write. Operations run inside the host's undo block with UI refresh held.
 *
 * A target that does not resolve, or resolves to the wrong kind, makes the
 * operation return `null` (or `[]`/`false`) without touching the host. A host
 * refusal throws a {@link HierarchyError}; writes already issued stay
 * committed and are listed in `created`.
 */
export class HierarchyMutator {
  readonly resolver: HandleResolver;
  readonly options: ResolvedManagerOptions;
  private readonly expansion: ExpansionState | null;

  constructor(
    private readonly host: FxHost,
    opts: HierarchyMutatorOptions = {}
  ) {
    this.options = resolveManagerOptions(opts);
    this.resolver = new HandleResolver(host, this.options);
    this.expansion = opts.expansion ?? null;
  }

  // ---------------------------------------------------------------------------
  // Racks

  /** New rack at the top level, or inside `parent` when that is a chain. */
  addRack(parent: StableId | null = null, position?: number): NodeRef | null {
    if (parent !== null) return this.addRackToChain(parent, position);
    return this.transaction("Add rack", null, (ctx) => {
      const rackId = this.createRack(ctx, null, position);
      this.expansion?.setExpanded(rackId, true);
      return this.describe(rackId);
    });
  }

  /** New rack appended to `chain`, after any devices already there. */
  addRackToChain(chain: StableId, position?: number): NodeRef | null {
    const target = this.expect(chain, "chain", "addRackToChain");
    if (!target) return null;
    return this.transaction("Add rack to chain", null, (ctx) => {
      const chainParent = this.resolver.parentIdOf(target.id);
      const rackId = this.createRack(ctx, target.id, position);
      const parentNow = this.resolver.parentIdOf(target.id);
      if (parentNow === undefined) throw new NodeVanished(target.id);
      if (parentNow !== chainParent) {
        throw this.error(ctx, "ChildMoveFailed", `chain ${target.id} moved away from ${chainParent ?? "the top level"}`);
      }
      this.expansion?.setExpanded(rackId, true);
      return this.describe(rackId);
    });
  }

  /**
   * Rack nested in `parentRack` through a new chain. Returns the inner rack.
   * The outer rack, the new chain and the inner rack are all re-resolved and
   * their parent links checked before returning.
   */
  addNestedRackToRack(parentRack: StableId): NodeRef | null {
    const target = this.expect(parentRack, "rack", "addNestedRackToRack");
    if (!target) return null;
    return this.transaction("Add nested rack", null, (ctx) => {
      const outerParent = this.resolver.parentIdOf(target.id);
      const chain = this.createChain(ctx, target.id);
      const innerId = this.createRack(ctx, chain.id);

      const live = this.resolver.resolveAll([target.id, chain.id, innerId]);
      const missing = [target.id, chain.id, innerId].find((id) => !live.has(id));
      if (missing !== undefined) throw new NodeVanished(missing);
      const expected: [StableId, StableId | null | undefined][] = [
        [innerId, chain.id],
        [chain.id, target.id],
        [target.id, outerParent],
      ];
      for (const [id, parent] of expected) {
        const actual = this.resolver.parentIdOf(id);
        if (actual === undefined) throw new NodeVanished(id);
        if (actual !== parent) {
          throw this.error(ctx, "ChildMoveFailed", `${id} is no longer under ${parent ?? "the top level"}`);
        }
      }

      this.expansion?.setExpanded(innerId, true);
      this.expansion?.setExpanded(target.id, true);
      this.expansion?.setSelectedChain(target.id, chain.id);
      return this.describe(innerId);
    });
  }

  // ---------------------------------------------------------------------------
  // Chains

  /** New chain in `rack`, just before its mixer. With `plugin`, the chain starts with that device. */
  addChainToRack(rack: StableId, plugin?: PluginInput): NodeRef | null {
    const target = this.expect(rack, "rack", "addChainToRack");
    if (!target) return null;
    const ref = plugin === undefined ? null : toPluginRef(plugin);
    return this.transaction(ref ? "Add chain" : "Add empty chain", null, (ctx) => {
      const chain = this.createChain(ctx, target.id);
      if (ref) this.createDevice(ctx, ref, { ...chain.path, deviceIdx: 1 }, chain.id, "end");
      this.expansion?.setExpanded(target.id, true);
      this.expansion?.setSelectedChain(target.id, chain.id);
      return this.describe(chain.id);
    });
  }

  addEmptyChainToRack(rack: StableId): NodeRef | null {
    return this.addChainToRack(rack);
  }

  /**
   * Move `chain` in front of `before` (another chain of the same rack), or to
   * the end of the chains when `before` is omitted, then renumber the rack's
   * chains.
   */
  reorderChainInRack(rack: StableId, chain: StableId, before?: StableId | null): boolean {
    const rackTarget = this.expect(rack, "rack", "reorderChainInRack");
    const chainTarget = this.expect(chain, "chain", "reorderChainInRack");
    if (!rackTarget || !chainTarget) return false;
    if (this.resolver.parentIdOf(chainTarget.id) !== rackTarget.id) return false;

    let placement: Placement = "beforeMixer";
    if (before !== undefined && before !== null) {
      const beforeTarget = this.expect(before, "chain", "reorderChainInRack");
      if (!beforeTarget || this.resolver.parentIdOf(beforeTarget.id) !== rackTarget.id) return false;
      if (beforeTarget.id === chainTarget.id) return true;
      placement = { before: beforeTarget.id };
    }

    return this.transaction<boolean>("Reorder chain", false, (ctx) => {
      this.moveInto(ctx, chainTarget.id, rackTarget.id, placement);
      this.withCreated(ctx, () => renumberLevel(this.host, this.resolver, { type: "chains", rack: rackTarget.id }));
      return true;
    });
  }

  /**
   * Flatten `chain`: its children move, in order, to the level that holds the
   * chain's rack (right after that rack), or to the chain's own place when the
   * chain sits at the top level. Devices are renamed for where they land;
   * nested racks and plain FX move unchanged. The chain is then deleted, and
   * its rack too when only the mixer is left. Returns the moved devices.
   */
  convertChainToDevices(chain: StableId): NodeRef[] {
    const target = this.expect(chain, "chain", "convertChainToDevices");
    if (!target) return [];
    const rack = this.resolver.parentIdOf(target.id);
    if (rack === undefined) return [];
    const landing = rack === null ? null : this.resolver.parentIdOf(rack);
    if (landing === undefined) return [];

    return this.transaction<NodeRef[]>("Convert chain to devices", [], (ctx) => {
      const landingPath = landing === null ? null : this.chainPathOf(landing);
      const anchor = rack ?? target.id;

      const children = this.childIds(target.id);
      if (children === null) throw new NodeVanished(target.id);

      const devices: StableId[] = [];
      for (const [i, childId] of children.entries()) {
        const anchorPos = this.positionOf(anchor);
        if (anchorPos === null) throw new NodeVanished(anchor);
        const isDevice = this.kindOf(childId) === "device";

        const position = rack === null ? anchorPos : anchorPos + 1 + i;
        const deviceIdx = isDevice ? nextFreeIndex(this.landingNames(landing), deviceIndexOf) : 0;
        if (landing === null) this.moveToTop(ctx, childId, position);
        else this.moveInto(ctx, childId, landing, position);

        if (!isDevice) continue;
        this.rewriteDevice(ctx, childId, landingPath ? { ...landingPath, deviceIdx } : { deviceIdx });
        devices.push(childId);
      }

      this.removeNode(ctx, target.id);
      if (rack !== null) {
        if (this.expansion?.getSelectedChain(rack) === target.id) this.expansion.setSelectedChain(rack, null);
        const rackFx = this.resolver.resolve(rack);
        const remaining = rackFx === null ? [] : this.childNames(rackFx);
        if (rackFx !== null && remaining.every((name) => isMixerName(name))) {
          this.debugLog(`rack ${rack} left with its mixer only, removing`);
          this.removeNode(ctx, rack);
        }
      }

      return devices.flatMap((id) => {
        const ref = this.describe(id);
        return ref ? [ref] : [];
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Devices

  /** Device holding `plugin`, appended to `chain` (or inserted at `position`). */
  addDeviceToChain(chain: StableId, plugin: PluginInput, position?: number): NodeRef | null {
    const target = this.expect(chain, "chain", "addDeviceToChain");
    if (!target) return null;
    const ref = toPluginRef(plugin);
    const chainPath: HierarchyPath = target.decoded?.path ?? {};
    return this.transaction("Add device", null, (ctx) => {
      const deviceIdx = nextFreeIndex(this.childNames(target.fx), deviceIndexOf);
      const path = { rackIdx: chainPath.rackIdx, chainIdx: chainPath.chainIdx, deviceIdx };
      const deviceId = this.createDevice(ctx, ref, path, target.id, position ?? "end");
      return this.describe(deviceId);
    });
  }

  /** Standalone top-level device `D{k}` holding `plugin`. */
  addDevice(plugin: PluginInput, position?: number): NodeRef | null {
    const ref = toPluginRef(plugin);
    return this.transaction("Add device", null, (ctx) => {
      const deviceIdx = nextFreeIndex(this.landingNames(null), deviceIndexOf);
      const deviceId = this.createDevice(ctx, ref, { deviceIdx }, null, position ?? "end");
      return this.describe(deviceId);
    });
  }

  /** Append a modulator (`…_M{j}`) to `device`. */
  addModulatorToDevice(device: StableId, plugin?: PluginInput): NodeRef | null {
    const target = this.expect(device, "device", "addModulatorToDevice");
    if (!target?.decoded) return null;
    const devicePath = target.decoded.path;
    const ref = toPluginRef(plugin ?? this.options.modulatorPlugin);
    const label = plugin === undefined ? undefined : pluginLabel(ref);
    return this.transaction("Add modulator", null, (ctx) => {
      const index = nextFreeIndex(this.childNames(target.fx), modulatorIndexOf);
      const name = encodeName(devicePath, { type: "modulator", index }, label);
      const id = this.insert(ctx, ref.fullName);
      this.rename(ctx, id, name);
      this.moveInto(ctx, id, target.id, "end");
      return this.describe(id);
    });
  }

  /**
   * Wrap a standalone device into a new rack at the device's place:
   * `R{n}` → `R{n}_C1` → `R{n}_C1_D1: <label>`. Returns the rack.
   */
  convertDeviceToRack(device: StableId): NodeRef | null {
    const target = this.expect(device, "device", "convertDeviceToRack");
    if (!target) return null;
    if (this.host.parentOf(target.fx) !== null) {
      this.debugLog(`convertDeviceToRack: ${target.id} is not a standalone device`);
      return null;
    }
    const position = this.positionOf(target.id);
    if (position === null) return null;
    return this.transaction("Convert device to rack", null, (ctx) => {
      const rackId = this.createRack(ctx, null, position);
      const chain = this.createChain(ctx, rackId);
      this.moveInto(ctx, target.id, chain.id, "end");
      this.rewriteDevice(ctx, target.id, { ...chain.path, deviceIdx: 1 });
      this.expansion?.setExpanded(rackId, true);
      this.expansion?.setSelectedChain(rackId, chain.id);
      return this.describe(rackId);
    });
  }

  // ---------------------------------------------------------------------------
  // Housekeeping

  /** Rewrite one sibling set's indices to run 1..n. Returns the number of names changed. */
  renumber(level: RenumberLevel): number {
    return this.transaction("Renumber", 0, (ctx) =>
      this.withCreated(ctx, () => renumberLevel(this.host, this.resolver, level))
    );
  }

  /** Delete `id` and, through the host, everything below it. */
  deleteNode(id: StableId): boolean {
    const key = decodeStableId(id);
    if (this.resolver.resolve(key) === null) return false;
    return this.transaction<boolean>("Delete", false, (ctx) => {
      this.removeNode(ctx, key);
      return true;
    });
  }

  describe(id: StableId): NodeRef | null {
    return describeNode(this.host, this.resolver, id);
  }

  tree(root?: StableId): NodeView[] {
    return readTree(this.host, this.resolver, root);
  }

  // ---------------------------------------------------------------------------
  // Compound steps

  private createRack(ctx: OpContext, parentChain: StableId | null, position?: number): StableId {
    const rackIdx = nextFreeIndex(this.trackNames(), rackIndexOf);
    const rackName = encodeName({ rackIdx }, { type: "rack" }, this.options.defaultRackLabel);
    const mixerName = encodeName({ rackIdx }, { type: "mixer" });
    const rackId = this.insert(ctx, this.options.containerPlugin, parentChain === null ? position : undefined);
    this.rename(ctx, rackId, rackName);
    const mixerId = this.insert(ctx, this.options.mixerPlugin);
    this.rename(ctx, mixerId, mixerName);
    this.moveInto(ctx, mixerId, rackId, 0);
    if (parentChain !== null) this.moveInto(ctx, rackId, parentChain, position ?? "end");
    this.debugLog(`created rack R${rackIdx} ${rackId}${parentChain ? ` in ${parentChain}` : ""}`);
    return rackId;
  }

  private createChain(ctx: OpContext, rackId: StableId): { id: StableId; path: HierarchyPath } {
    const rack = this.resolver.resolve(rackId);
    if (rack === null) throw new NodeVanished(rackId);
    const rackIdx = decodeName(this.host.name(rack))?.path.rackIdx;
    if (rackIdx === undefined) throw this.error(ctx, "ContainerCreateFailed", `${rackId} is no longer named as a rack`);
    const names = this.childNames(rack);
    const chains = names.filter((name) => isChainName(name)).length;
    if (chains >= this.options.maxChainsPerRack) {
      throw this.error(ctx, "ChainLimitExceeded", `rack ${rackId} already holds ${chains} chains`);
    }

    const path = { rackIdx, chainIdx: nextFreeIndex(names, chainIndexOf) };
    const chainName = encodeName(path, { type: "chain" });
    const chainId = this.insert(ctx, this.options.containerPlugin);
    this.rename(ctx, chainId, chainName);
    this.moveInto(ctx, chainId, rackId, "beforeMixer");
    this.debugLog(`created chain R${path.rackIdx}_C${path.chainIdx} ${chainId}`);
    return { id: chainId, path };
  }

  /** Device container holding the plugin (`_FX`, position 0) and the utility (`_Util`, position 1). */
  private createDevice(
    ctx: OpContext,
    plugin: PluginRef,
    path: HierarchyPath,
    container: StableId | null,
    placement: Placement
  ): StableId {
    const label = pluginLabel(plugin);
    const deviceName = encodeName(path, { type: "device" }, label);
    const fxName = encodeName(path, { type: "fx" }, label);
    const utilName = encodeName(path, { type: "util" });
    const topPosition = container === null && typeof placement === "number" ? placement : undefined;
    const deviceId = this.insert(ctx, this.options.containerPlugin, topPosition);
    this.rename(ctx, deviceId, deviceName);

    const fxId = this.insert(ctx, plugin.fullName);
    this.rename(ctx, fxId, fxName);
    this.moveInto(ctx, fxId, deviceId, 0);

    const utilId = this.insert(ctx, this.options.utilityPlugin);
    this.rename(ctx, utilId, utilName);
    this.moveInto(ctx, utilId, deviceId, 1);

    if (container !== null) this.moveInto(ctx, deviceId, container, placement);
    this.debugLog(`created device ${deviceName} ${deviceId}`);
    return deviceId;
  }

  private rewriteDevice(ctx: OpContext, id: StableId, path: HierarchyPath): void {
    const fx = this.resolver.resolve(id);
    if (fx === null) throw new NodeVanished(id);
    this.withCreated(ctx, () => rewriteDevicePath(this.host, this.resolver, fx, path));
  }

  // ---------------------------------------------------------------------------
  // Single host writes

  private insert(ctx: OpContext, plugin: string, position?: number): StableId {
    const code = plugin === this.options.containerPlugin ? "ContainerCreateFailed" : "PluginInsertFailed";
    const fx = this.host.insertFx(plugin, position);
    if (fx === null) throw this.error(ctx, code, `host refused to insert ${plugin}`);
    const id = this.readIdAfterWrite(fx);
    if (id === null) throw this.error(ctx, code, `inserted ${plugin} did not report a stable id`);
    ctx.created.push(id);
    return id;
  }

  private rename(ctx: OpContext, id: StableId, name: string): void {
    const fx = this.resolver.resolve(id);
    if (fx === null) throw new NodeVanished(id);
    if (!this.host.rename(fx, name)) {
      throw this.error(ctx, "RenameFailed", `host refused to rename ${id} to ${JSON.stringify(name)}`);
    }
  }

  /** Move `id` into `containerId`, then confirm by fresh lookup that it landed there. */
  private moveInto(ctx: OpContext, id: StableId, containerId: StableId, placement: Placement): void {
    const handles = this.resolver.resolveAll([id, containerId]);
    const fx = handles.get(id);
    const container = handles.get(containerId);
    if (fx === undefined) throw new NodeVanished(id);
    if (container === undefined) throw new NodeVanished(containerId);
    const siblings = this.resolver.childHandles(container).filter((h) => this.resolver.readId(h) !== id);
    const position = this.placementIndex(siblings, placement);
    if (!this.host.moveToContainer(fx, container, position)) {
      throw this.error(ctx, "ChildMoveFailed", `host refused to move ${id} into ${containerId}`);
    }
    const parent = this.resolver.parentIdOf(id);
    if (parent === undefined) throw new NodeVanished(id);
    if (parent !== containerId) throw this.error(ctx, "ChildMoveFailed", `${id} did not land in ${containerId}`);
  }

  private moveToTop(ctx: OpContext, id: StableId, position: number): void {
    const fx = this.resolver.resolve(id);
    if (fx === null) throw new NodeVanished(id);
    if (!this.host.moveToTopLevel(fx, position)) {
      throw this.error(ctx, "ChildMoveFailed", `host refused to move ${id} to the top level`);
    }
    const parent = this.resolver.parentIdOf(id);
    if (parent === undefined) throw new NodeVanished(id);
    if (parent !== null) throw this.error(ctx, "ChildMoveFailed", `${id} did not land at the top level`);
  }

  private removeNode(ctx: OpContext, id: StableId): void {
    const fx = this.resolver.resolve(id);
    if (fx === null) throw new NodeVanished(id);
    if (!this.host.remove(fx)) throw this.error(ctx, "RemoveFailed", `host refused to remove ${id}`);
  }

  // ---------------------------------------------------------------------------
  // Reads

  private expect(id: StableId, kind: NodeKind, op: string): Target | null {
    const key = decodeStableId(id);
    const fx = this.resolver.resolve(key);
    if (fx === null) {
      this.debugLog(`${op}: ${key} not found`);
      return null;
    }
    const actual = classifyHandle(this.host, this.resolver, fx);
    if (actual !== kind) {
      this.debugLog(`${op}: ${key} is a ${actual}, expected a ${kind}`);
      return null;
    }
    return { id: key, fx, decoded: decodeName(this.host.name(fx)) };
  }

  private kindOf(id: StableId): NodeKind | null {
    const fx = this.resolver.resolve(id);
    return fx === null ? null : classifyHandle(this.host, this.resolver, fx);
  }

  /** Path of a chain container, or `null` when `id` is not chain-named. */
  private chainPathOf(id: StableId): HierarchyPath | null {
    const fx = this.resolver.resolve(id);
    const decoded = fx === null ? null : decodeName(this.host.name(fx));
    if (decoded?.role.type !== "chain") return null;
    return { rackIdx: decoded.path.rackIdx, chainIdx: decoded.path.chainIdx };
  }

  /** The host may still be settling right after a write; re-read a few times. */
  private readIdAfterWrite(fx: FxHandle): StableId | null {
    for (let attempt = 0; attempt < this.options.resolveAttempts; attempt++) {
      const id = this.resolver.readId(fx);
      if (id !== null) return id;
    }
    return null;
  }

  private positionOf(id: StableId): number | null {
    const fx = this.resolver.resolve(id);
    if (fx === null) return null;
    return this.resolver.ancestorPath(fx)?.[0]?.position ?? null;
  }

  private childIds(id: StableId): StableId[] | null {
    for (let attempt = 0; attempt < this.options.resolveAttempts; attempt++) {
      const fx = this.resolver.resolve(id);
      if (fx === null) return null;
      const ids = this.resolver.childHandles(fx).map((h) => this.resolver.readId(h));
      if (ids.every((x): x is StableId => x !== null)) return ids;
    }
    return null;
  }

  private childNames(container: FxHandle): (string | null)[] {
    return this.resolver.childHandles(container).map((h) => this.host.name(h));
  }

  /** Names at the top level (`null`) or in a chain. */
  private landingNames(container: StableId | null): (string | null)[] {
    if (container === null) return this.resolver.topLevelHandles().map((h) => this.host.name(h));
    const fx = this.resolver.resolve(container);
    return fx === null ? [] : this.childNames(fx);
  }

  /** Every name in the track; rack indices are allocated track-wide. */
  private trackNames(): string[] {
    const names: string[] = [];
    const visit = (handles: FxHandle[], depth: number) => {
      if (depth > this.options.maxDepth) return;
      for (const fx of handles) {
        const name = this.host.name(fx);
        if (name !== null) names.push(name);
        if (this.host.isContainer(fx)) visit(this.resolver.childHandles(fx), depth + 1);
      }
    };
    visit(this.resolver.topLevelHandles(), 0);
    return names;
  }

  private placementIndex(siblings: FxHandle[], placement: Placement): number {
    if (placement === "end") return siblings.length;
    if (placement === "beforeMixer") {
      const mixer = siblings.findIndex((h) => isMixerName(this.host.name(h)));
      return mixer < 0 ? siblings.length : mixer;
    }
    if (typeof placement === "number") return Math.min(Math.max(0, placement), siblings.length);
    const at = siblings.findIndex((h) => this.resolver.readId(h) === placement.before);
    return at < 0 ? siblings.length : at;
  }

  // ---------------------------------------------------------------------------
  // Plumbing

  /**
   * Run `fn` inside one undo block with UI refresh held. A node that stops
   * resolving midway ends the operation with `missing`; writes already issued
   * stay committed and the block is closed as failed.
   */
  private transaction<T>(label: string, missing: T, fn: (ctx: OpContext) => T): T {
    const ctx: OpContext = { label, created: [] };
    this.host.preventUiRefresh?.(1);
    this.host.beginUndoBlock?.();
    let ok = false;
    let vanished = false;
    try {
      const out = fn(ctx);
      ok = true;
      return out;
    } catch (err) {
      if (!(err instanceof NodeVanished)) throw err;
      vanished = true;
      this.debugLog(`${label}: ${err.id} no longer resolves, stopping (created: ${ctx.created.join(", ") || "none"})`);
      return missing;
    } finally {
      this.host.endUndoBlock?.(ok ? label : `${label} (failed)`);
      this.host.preventUiRefresh?.(-1);
      if (!ok && !vanished) this.debugLog(`${label} failed after creating ${ctx.created.length} node(s)`);
    }
  }

  /** Run a shared helper, re-labelling its host errors with this operation's `created`. */
  private withCreated<T>(ctx: OpContext, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof HierarchyError) throw err.withCreated(ctx.created);
      throw err;
    }
  }

  private error(ctx: OpContext, code: HierarchyErrorCode, detail: string): HierarchyError {
    return new HierarchyError(code, `${ctx.label}: ${detail}`, ctx.created);
  }

  private debugLog(line: string) {
    if (this.options.debug) this.options.log(`[fxrack:mutator] ${line}`);
  }
}
