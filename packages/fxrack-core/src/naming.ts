import type { HierarchyPath, NameRole } from "@fxrack/interface";

export type NameKind = "rack" | "chain" | "device" | "mixer" | "none";

export type DecodedName = {
  role: NameRole;
  path: HierarchyPath;
  /** Text after the `": "` separator, or `null` for label-less names. */
  label: string | null;
};

const IDX = "([1-9][0-9]*)";
const LABEL = ": (.*)";

type GrammarRow = {
  re: RegExp;
  decode: (m: RegExpExecArray) => DecodedName;
};

const int = (raw: string | undefined): number => Number(raw);

const nested = (m: RegExpExecArray): HierarchyPath => ({
  rackIdx: int(m[1]),
  chainIdx: int(m[2]),
  deviceIdx: int(m[3]),
});

// First match wins; longer prefixes come before the shorter ones they extend.
const GRAMMAR: readonly GrammarRow[] = [
  {
    re: new RegExp(`^_R${IDX}_M$`),
    decode: (m) => ({ role: { type: "mixer" }, path: { rackIdx: int(m[1]) }, label: null }),
  },
  {
    re: new RegExp(`^R${IDX}_C${IDX}_D${IDX}_Util$`),
    decode: (m) => ({ role: { type: "util" }, path: nested(m), label: null }),
  },
  {
    re: new RegExp(`^R${IDX}_C${IDX}_D${IDX}_M${IDX}${LABEL}$`, "s"),
    decode: (m) => ({ role: { type: "modulator", index: int(m[4]) }, path: nested(m), label: m[5] ?? "" }),
  },
  {
    re: new RegExp(`^R${IDX}_C${IDX}_D${IDX}_FX${LABEL}$`, "s"),
    decode: (m) => ({ role: { type: "fx" }, path: nested(m), label: m[4] ?? "" }),
  },
  {
    re: new RegExp(`^R${IDX}_C${IDX}_D${IDX}${LABEL}$`, "s"),
    decode: (m) => ({ role: { type: "device" }, path: nested(m), label: m[4] ?? "" }),
  },
  {
    re: new RegExp(`^R${IDX}_C${IDX}(?:${LABEL})?$`, "s"),
    decode: (m) => ({
      role: { type: "chain" },
      path: { rackIdx: int(m[1]), chainIdx: int(m[2]) },
      label: m[3] ?? null,
    }),
  },
  {
    re: new RegExp(`^R${IDX}${LABEL}$`, "s"),
    decode: (m) => ({ role: { type: "rack" }, path: { rackIdx: int(m[1]) }, label: m[2] ?? "" }),
  },
  {
    re: new RegExp(`^D${IDX}_Util$`),
    decode: (m) => ({ role: { type: "util" }, path: { deviceIdx: int(m[1]) }, label: null }),
  },
  {
    re: new RegExp(`^D${IDX}_M${IDX}${LABEL}$`, "s"),
    decode: (m) => ({
      role: { type: "modulator", index: int(m[2]) },
      path: { deviceIdx: int(m[1]) },
      label: m[3] ?? "",
    }),
  },
  {
    re: new RegExp(`^D${IDX}_FX${LABEL}$`, "s"),
    decode: (m) => ({ role: { type: "fx" }, path: { deviceIdx: int(m[1]) }, label: m[2] ?? "" }),
  },
  {
    re: new RegExp(`^D${IDX}${LABEL}$`, "s"),
    decode: (m) => ({ role: { type: "device" }, path: { deviceIdx: int(m[1]) }, label: m[2] ?? "" }),
  },
];

/** Indices past `Number.MAX_SAFE_INTEGER` would not survive a re-encode. */
function hasSafeIndices(decoded: DecodedName): boolean {
  const { rackIdx, chainIdx, deviceIdx } = decoded.path;
  const indices = [rackIdx, chainIdx, deviceIdx, decoded.role.type === "modulator" ? decoded.role.index : undefined];
  return indices.every((idx) => idx === undefined || Number.isSafeInteger(idx));
}

export function decodeName(name: string | null | undefined): DecodedName | null {
  if (!name) return null;
  for (const row of GRAMMAR) {
    const m = row.re.exec(name);
    if (!m) continue;
    const decoded = row.decode(m);
    return hasSafeIndices(decoded) ? decoded : null;
  }
  return null;
}

export function decodePath(name: string | null | undefined): HierarchyPath | null {
  return decodeName(name)?.path ?? null;
}

export function classifyName(name: string | null | undefined): NameKind {
  const decoded = decodeName(name);
  if (!decoded) return "none";
  switch (decoded.role.type) {
    case "rack":
    case "chain":
    case "device":
    case "mixer":
      return decoded.role.type;
    default:
      return "none";
  }
}

export const isRackName = (name: string | null | undefined): boolean => classifyName(name) === "rack";
export const isChainName = (name: string | null | undefined): boolean => classifyName(name) === "chain";
export const isDeviceName = (name: string | null | undefined): boolean => classifyName(name) === "device";
export const isMixerName = (name: string | null | undefined): boolean => classifyName(name) === "mixer";

export function isStandalonePath(path: HierarchyPath): boolean {
  return path.deviceIdx !== undefined && path.rackIdx === undefined && path.chainIdx === undefined;
}

function assertIndex(value: number | undefined, field: string): number {
  if (value === undefined || !Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${field} must be a positive integer, got: ${value}`);
  }
  return value;
}

/** Structural prefix of a path: `R1`, `R1_C2`, `R1_C2_D3` or `D3`. */
export function pathPrefix(path: HierarchyPath): string {
  const { rackIdx, chainIdx, deviceIdx } = path;
  if (rackIdx === undefined) {
    if (chainIdx !== undefined) throw new Error("chainIdx requires rackIdx");
    return `D${assertIndex(deviceIdx, "deviceIdx")}`;
  }
  const rack = `R${assertIndex(rackIdx, "rackIdx")}`;
  if (chainIdx === undefined) {
    if (deviceIdx !== undefined) throw new Error("deviceIdx inside a rack requires chainIdx");
    return rack;
  }
  const chain = `${rack}_C${assertIndex(chainIdx, "chainIdx")}`;
  return deviceIdx === undefined ? chain : `${chain}_D${assertIndex(deviceIdx, "deviceIdx")}`;
}

function pathShape(path: HierarchyPath): "rack" | "chain" | "device" {
  if (path.deviceIdx !== undefined) return "device";
  if (path.chainIdx !== undefined) return "chain";
  return "rack";
}

/**
 * Build the display name for a node at `path`.
 *
 * Racks, devices and device sub-parts always carry a label (defaulting to
 * `Rack`, `Device`, `FX`, `Modulator`); chains only when one is given; mixers
 * and utilities never.
 */
export function encodeName(path: HierarchyPath, role: NameRole, label?: string | null): string {
  const prefix = pathPrefix(path);
  const shape = pathShape(path);
  const expect = (wanted: "rack" | "chain" | "device") => {
    if (shape !== wanted) throw new Error(`${role.type} name needs a ${wanted} path, got: ${prefix}`);
  };

  switch (role.type) {
    case "rack":
      expect("rack");
      return `${prefix}: ${label ?? "Rack"}`;
    case "mixer":
      expect("rack");
      return `_${prefix}_M`;
    case "chain":
      expect("chain");
      return label === undefined || label === null ? prefix : `${prefix}: ${label}`;
    case "device":
      expect("device");
      return `${prefix}: ${label ?? "Device"}`;
    case "fx":
      expect("device");
      return `${prefix}_FX: ${label ?? "FX"}`;
    case "util":
      expect("device");
      return `${prefix}_Util`;
    case "modulator":
      expect("device");
      return `${prefix}_M${assertIndex(role.index, "modulator index")}: ${label ?? "Modulator"}`;
  }
}

export type IndexExtractor = (name: string) => number | null | undefined;

/** `max + 1` over the indices `extractor` finds in `names`, or 1 when there are none. */
export function nextFreeIndex(names: Iterable<string | null | undefined>, extractor: IndexExtractor): number {
  let max = 0;
  for (const name of names) {
    if (!name) continue;
    const idx = extractor(name);
    if (typeof idx === "number" && Number.isFinite(idx) && idx > max) max = idx;
  }
  return max + 1;
}

export const rackIndexOf: IndexExtractor = (name) => {
  const d = decodeName(name);
  return d?.role.type === "rack" ? d.path.rackIdx : null;
};

export const chainIndexOf: IndexExtractor = (name) => {
  const d = decodeName(name);
  return d?.role.type === "chain" ? d.path.chainIdx : null;
};

export const deviceIndexOf: IndexExtractor = (name) => {
  const d = decodeName(name);
  return d?.role.type === "device" ? d.path.deviceIdx : null;
};

export const modulatorIndexOf: IndexExtractor = (name) => {
  const d = decodeName(name);
  return d?.role.type === "modulator" ? d.role.index : null;
};

const PLUGIN_TYPE_PREFIXES = [/^VST3?i?: /, /^AUi?: /, /^JS: /, /^CLAPi?: /];

/**
 * Short plugin name for labels: `VST3: ReaComp (Cockos)` → `ReaComp`.
 * Prefix matching is case-sensitive; anything unrecognized is returned as is.
 */
export function shortPluginName(fullName: string | null | undefined): string {
  if (!fullName) return "";
  let name = fullName;
  for (const re of PLUGIN_TYPE_PREFIXES) name = name.replace(re, "");
  name = name.replace(/^.+\//, "");
  name = name.replace(/\s*\([^)]+\)\s*$/, "");
  return name;
}

/** `R1_C2_D3: ReaComp` → `ReaComp`. Names without a structural label come back unchanged. */
export function stripStructuralPrefix(name: string | null | undefined): string {
  if (!name) return "";
  return decodeName(name)?.label ?? name;
}

export function displayLabel(name: string | null | undefined): string {
  return shortPluginName(stripStructuralPrefix(name));
}

export function truncateLabel(label: string, maxLength: number): string {
  if (!Number.isInteger(maxLength) || maxLength < 3) throw new Error(`invalid maxLength: ${maxLength}`);
  if (label.length <= maxLength) return label;
  return `${label.slice(0, maxLength - 2)}..`;
}
