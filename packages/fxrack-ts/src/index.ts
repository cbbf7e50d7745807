// Host-assigned identity of one FX (GUID-equivalent), canonical form `{XXXXXXXX-...}`.
export type StableId = string;

/**
 * Transient address of an FX in the host's flat list.
 *
 * Valid for one batch of host calls only: any structural edit may silently
 * re-point it at another FX. Re-derive it from a {@link StableId} instead of
 * storing it.
 */
export type FxHandle = number;

export type NodeKind = "rack" | "chain" | "device" | "mixer" | "plain";

/**
 * Logical location of a node, as encoded in its display name.
 *
 * `rackIdx` alone is a rack (or its mixer), `rackIdx + chainIdx` a chain, all
 * three a nested device. `deviceIdx` alone is a standalone device.
 */
export type HierarchyPath = {
  rackIdx?: number;
  chainIdx?: number;
  deviceIdx?: number;
};

/**
 * What a name says about its FX. `fx`, `util` and `modulator` are the internal
 * sub-parts of a device, addressed by the device's path.
 */
export type NameRole =
  | { type: "rack" }
  | { type: "chain" }
  | { type: "device" }
  | { type: "mixer" }
  | { type: "fx" }
  | { type: "util" }
  | { type: "modulator"; index: number };

export type PluginRef = {
  /** Host plugin identifier, e.g. `VST3: ReaComp (Cockos)`. */
  fullName: string;
  /** Display label; defaults to the short plugin name. */
  label?: string;
};

/** One level of the ancestor walk: the node, and its 0-based position in its parent. */
export type AncestorEntry = {
  id: StableId;
  position: number;
};

export type ParentKind = NodeKind | "root";

export * from "./host.js";
export * from "./ids.js";
