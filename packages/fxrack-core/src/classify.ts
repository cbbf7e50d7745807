import type { FxHandle, FxHost, NodeKind, ParentKind } from "@fxrack/interface";

import { classifyName } from "./naming.js";
import type { HandleResolver } from "./resolver.js";

const ALLOWED_PARENTS: Record<"rack" | "chain" | "device", readonly ParentKind[]> = {
  rack: ["root", "chain"],
  chain: ["root", "rack"],
  device: ["root", "chain"],
};

/**
 * Kind of a node from its name and where it sits.
 *
 * Mixers are recognized by name alone. Racks, chains and devices must be
 * containers under an allowed parent (racks live at the top level or in a
 * chain, chains in a rack or at the top level, devices at the top level or in
 * a chain); anything else is `plain`.
 */
export function classifyInContext(
  name: string | null | undefined,
  isContainer: boolean,
  parentKind: ParentKind
): NodeKind {
  const byName = classifyName(name);
  if (byName === "mixer") return "mixer";
  if (byName === "none" || !isContainer) return "plain";
  return ALLOWED_PARENTS[byName].includes(parentKind) ? byName : "plain";
}

/** Classify `fx` by walking its ancestors from the top level down. */
export function classifyHandle(host: FxHost, resolver: HandleResolver, fx: FxHandle): NodeKind {
  const handles = resolver.ancestorHandles(fx);
  if (!handles) return "plain";
  let kind: ParentKind = "root";
  for (const h of handles) {
    kind = classifyInContext(host.name(h), host.isContainer(h), kind);
  }
  return kind === "root" ? "plain" : kind;
}
