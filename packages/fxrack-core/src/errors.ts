import type { StableId } from "@fxrack/interface";

export type HierarchyErrorCode =
  | "ContainerCreateFailed"
  | "PluginInsertFailed"
  | "ChildMoveFailed"
  | "RenameFailed"
  | "RemoveFailed"
  | "ChainLimitExceeded";

/**
 * The host refused a mutation, or a compound operation hit a limit.
 *
 * Host edits issued before the failure stay committed; `created` lists the
 * nodes the operation had already added.
 */
export class HierarchyError extends Error {
  readonly code: HierarchyErrorCode;
  readonly detail: string;
  readonly created: StableId[];

  constructor(code: HierarchyErrorCode, detail: string, created: StableId[] = []) {
    super(`${code}: ${detail}`);
    this.name = "HierarchyError";
    this.code = code;
    this.detail = detail;
    this.created = [...created];
  }

  withCreated(created: StableId[]): HierarchyError {
    return new HierarchyError(this.code, this.detail, created);
  }
}

export type IntegrityErrorKind = "CircularReference" | "ParentMismatch" | "MaxDepthExceeded" | "UnreadableNode";

export type IntegrityError = {
  kind: IntegrityErrorKind;
  /** Node the walk stopped at (`null` when its id could not be read). */
  id: StableId | null;
  /** Container the walk reached the node through (`null` at top level). */
  expectedParent: StableId | null;
  /** Parent the host reports for the node. */
  actualParent?: StableId | null;
  depth: number;
};

export type IntegrityResult = { ok: true } | { ok: false; error: IntegrityError };

export class IntegrityViolationError extends Error {
  readonly error: IntegrityError;

  constructor(error: IntegrityError) {
    super(`integrity violation: ${error.kind} at ${error.id ?? "<unreadable>"} (depth ${error.depth})`);
    this.name = "IntegrityViolationError";
    this.error = error;
  }
}
