import type { FxHandle, FxHost, HierarchyPath, NameRole, NodeKind, ParentKind, StableId } from "@fxrack/interface";

import { classifyHandle, classifyInContext } from "./classify.js";
import { decodeName } from "./naming.js";
import type { HandleResolver } from "./resolver.js";

/** Point-in-time view of one node. Recomputed on every read, never cached. */
export type NodeRef = {
  id: StableId;
  kind: NodeKind;
  name: string;
  role: NameRole | null;
  path: HierarchyPath | null;
  label: string | null;
};

export type NodeView = NodeRef & { children: NodeView[] };

function toRef(id: StableId, name: string, kind: NodeKind): NodeRef {
  const decoded = decodeName(name);
  return {
    id,
    kind,
    name,
    role: decoded?.role ?? null,
    path: decoded?.path ?? null,
    label: decoded?.label ?? null,
  };
}

export function describeHandle(host: FxHost, resolver: HandleResolver, fx: FxHandle): NodeRef | null {
  const id = resolver.readId(fx);
  const name = host.name(fx);
  if (id === null || name === null) return null;
  return toRef(id, name, classifyHandle(host, resolver, fx));
}

export function describeNode(host: FxHost, resolver: HandleResolver, id: StableId): NodeRef | null {
  const fx = resolver.resolve(id);
  return fx === null ? null : describeHandle(host, resolver, fx);
}

/** The whole track (or `root`'s subtree) as a freshly read tree. */
export function readTree(host: FxHost, resolver: HandleResolver, root?: StableId): NodeView[] {
  const build = (handles: FxHandle[], parentKind: ParentKind): NodeView[] => {
    const out: NodeView[] = [];
    for (const fx of handles) {
      const id = resolver.readId(fx);
      const name = host.name(fx);
      if (id === null || name === null) continue;
      const isContainer = host.isContainer(fx);
      const kind = classifyInContext(name, isContainer, parentKind);
      const children = isContainer ? build(resolver.childHandles(fx), kind) : [];
      out.push({ ...toRef(id, name, kind), children });
    }
    return out;
  };

  if (root === undefined) return build(resolver.topLevelHandles(), "root");
  const fx = resolver.resolve(root);
  if (fx === null) return [];
  const self = describeHandle(host, resolver, fx);
  return self ? build(resolver.childHandles(fx), self.kind) : [];
}
