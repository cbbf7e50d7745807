import type { FxHandle, FxHost, StableId } from "@fxrack/interface";
import { decodeStableId } from "@fxrack/interface/ids";

import { DEFAULT_MAX_DEPTH } from "./config.js";
import { IntegrityViolationError, type IntegrityResult } from "./errors.js";

export type VerifyIntegrityOptions = {
  maxDepth?: number;
};

/**
 * Depth-first walk of the whole track checking that every node is visited
 * once, reports the container it was reached through as its parent, and sits
 * no deeper than `maxDepth`. Stops at the first violation.
 */
export function verifyIntegrity(host: FxHost, opts: VerifyIntegrityOptions = {}): IntegrityResult {
  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isSafeInteger(maxDepth) || maxDepth <= 0) throw new Error(`invalid maxDepth: ${opts.maxDepth}`);

  const visited = new Set<StableId>();
  const readId = (fx: FxHandle): StableId | null => {
    const raw = host.stableId(fx);
    return raw === null ? null : decodeStableId(raw);
  };

  const walk = (container: FxHandle | null, containerId: StableId | null, depth: number): IntegrityResult => {
    const count = container === null ? host.count() : host.childCount(container);
    if (depth > maxDepth && count > 0) {
      return { ok: false, error: { kind: "MaxDepthExceeded", id: containerId, expectedParent: containerId, depth } };
    }
    for (let position = 0; position < count; position++) {
      const fx = container === null ? host.topLevelAt(position) : host.childAt(container, position);
      const id = fx === null ? null : readId(fx);
      if (fx === null || id === null) {
        return { ok: false, error: { kind: "UnreadableNode", id: null, expectedParent: containerId, depth } };
      }
      if (visited.has(id)) {
        return { ok: false, error: { kind: "CircularReference", id, expectedParent: containerId, depth } };
      }
      visited.add(id);

      const parent = host.parentOf(fx);
      const actualParent = parent === null ? null : readId(parent);
      if (actualParent !== containerId) {
        return { ok: false, error: { kind: "ParentMismatch", id, expectedParent: containerId, actualParent, depth } };
      }

      if (!host.isContainer(fx)) continue;
      const nested = walk(fx, id, depth + 1);
      if (!nested.ok) return nested;
    }
    return { ok: true };
  };

  return walk(null, null, 0);
}

export function assertIntegrity(host: FxHost, opts: VerifyIntegrityOptions = {}): void {
  const result = verifyIntegrity(host, opts);
  if (!result.ok) throw new IntegrityViolationError(result.error);
}
