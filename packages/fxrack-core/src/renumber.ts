import type { FxHandle, FxHost, HierarchyPath, StableId } from "@fxrack/interface";

import { HierarchyError } from "./errors.js";
import { decodeName, encodeName, isRackName } from "./naming.js";
import type { HandleResolver } from "./resolver.js";

export type RenumberLevel =
  | { type: "top" }
  | { type: "chains"; rack: StableId }
  | { type: "devices"; chain: StableId };

function renameIfChanged(host: FxHost, fx: FxHandle, name: string): boolean {
  const current = host.name(fx);
  if (current === name) return false;
  if (!host.rename(fx, name)) {
    throw new HierarchyError("RenameFailed", `host refused to rename ${JSON.stringify(current)} to ${JSON.stringify(name)}`);
  }
  return true;
}

/**
 * Rename a device container and its `_FX` / `_Util` / `_M{j}` parts to
 * `path`, keeping every label. Returns the number of names changed.
 *
 * Renames are not structural edits, so `device` stays valid throughout.
 */
export function rewriteDevicePath(
  host: FxHost,
  resolver: HandleResolver,
  device: FxHandle,
  path: HierarchyPath
): number {
  const decoded = decodeName(host.name(device));
  let renamed = renameIfChanged(host, device, encodeName(path, { type: "device" }, decoded?.label)) ? 1 : 0;
  for (const part of resolver.childHandles(device)) {
    const sub = decodeName(host.name(part));
    if (!sub || (sub.role.type !== "fx" && sub.role.type !== "util" && sub.role.type !== "modulator")) continue;
    if (renameIfChanged(host, part, encodeName(path, sub.role, sub.label))) renamed += 1;
  }
  return renamed;
}

/** Re-prefix every device in `chain` with the chain's new path, keeping device indices. */
function rewriteChainContents(
  host: FxHost,
  resolver: HandleResolver,
  chain: FxHandle,
  chainPath: HierarchyPath
): number {
  let renamed = 0;
  for (const child of resolver.childHandles(chain)) {
    const name = host.name(child);
    if (isRackName(name)) continue;
    const decoded = decodeName(name);
    if (decoded?.role.type !== "device" || !host.isContainer(child)) continue;
    renamed += rewriteDevicePath(host, resolver, child, { ...chainPath, deviceIdx: decoded.path.deviceIdx });
  }
  return renamed;
}

/**
 * Rewrite the indices of one sibling set so they run 1..n in list order.
 *
 * - `top`: standalone devices at the top level become `D1..Dn`.
 * - `chains`: the chains of `rack` become `R{r}_C1..R{r}_Cn`, and the devices
 *   inside each renamed chain follow.
 * - `devices`: the devices of `chain` become `…_D1..…_Dn`.
 *
 * Rack-named containers are always skipped, whatever level is renumbered.
 * Mixers and other non-matching siblings keep their names and do not consume
 * an index. Returns the number of names changed; `0` when the level's owner
 * does not resolve.
 */
export function renumberLevel(host: FxHost, resolver: HandleResolver, level: RenumberLevel): number {
  switch (level.type) {
    case "top": {
      let next = 1;
      let renamed = 0;
      for (const fx of resolver.topLevelHandles()) {
        const name = host.name(fx);
        if (isRackName(name)) continue;
        if (decodeName(name)?.role.type !== "device" || !host.isContainer(fx)) continue;
        renamed += rewriteDevicePath(host, resolver, fx, { deviceIdx: next });
        next += 1;
      }
      return renamed;
    }
    case "chains": {
      const rack = resolver.resolve(level.rack);
      const rackPath = rack === null ? null : decodeName(host.name(rack));
      if (rack === null || rackPath?.role.type !== "rack") return 0;
      const rackIdx = rackPath.path.rackIdx;

      let next = 1;
      let renamed = 0;
      for (const fx of resolver.childHandles(rack)) {
        const name = host.name(fx);
        if (isRackName(name)) continue;
        const decoded = decodeName(name);
        if (decoded?.role.type !== "chain" || !host.isContainer(fx)) continue;
        const chainPath = { rackIdx, chainIdx: next };
        if (renameIfChanged(host, fx, encodeName(chainPath, { type: "chain" }, decoded.label))) renamed += 1;
        renamed += rewriteChainContents(host, resolver, fx, chainPath);
        next += 1;
      }
      return renamed;
    }
    case "devices": {
      const chain = resolver.resolve(level.chain);
      const chainName = chain === null ? null : decodeName(host.name(chain));
      if (chain === null || chainName?.role.type !== "chain") return 0;
      const { rackIdx, chainIdx } = chainName.path;

      let next = 1;
      let renamed = 0;
      for (const fx of resolver.childHandles(chain)) {
        const name = host.name(fx);
        if (isRackName(name)) continue;
        if (decodeName(name)?.role.type !== "device" || !host.isContainer(fx)) continue;
        renamed += rewriteDevicePath(host, resolver, fx, { rackIdx, chainIdx, deviceIdx: next });
        next += 1;
      }
      return renamed;
    }
  }
}
