import type { FxHandle } from "@fxrack/interface";

/** Handles at or above this value address FX nested inside containers. */
export const CONTAINER_ADDRESS_BASE = 0x2000000;

export type AddressableNode<T> = {
  isContainer: boolean;
  children: T[];
};

/**
 * Encode the address of a nested FX.
 *
 * `positions` are 0-based, outermost first; `counts[i]` is the child count of
 * the list `positions[i]` indexes into (`counts[0]` is the top-level count).
 * Each level is a digit in a mixed-radix number whose radix is that level's
 * count + 1, so any change to an ancestor's count re-points the address.
 */
export function encodeAddress(positions: number[], counts: number[]): FxHandle {
  if (positions.length === 0) throw new Error("address must have at least one level");
  if (positions.length !== counts.length) {
    throw new Error(`positions/counts length mismatch: ${positions.length} != ${counts.length}`);
  }
  if (positions.length === 1) return positions[0]!;

  let addr = 0;
  let scale = 1;
  for (let i = 0; i < positions.length; i++) {
    const pos = positions[i]!;
    const count = counts[i]!;
    if (!Number.isInteger(pos) || pos < 0 || pos >= count) {
      throw new Error(`invalid position ${pos} at depth ${i} (count ${count})`);
    }
    addr += (pos + 1) * scale;
    scale *= count + 1;
  }
  if (!Number.isSafeInteger(CONTAINER_ADDRESS_BASE + addr)) throw new Error("address overflow");
  return CONTAINER_ADDRESS_BASE + addr;
}

/**
 * Walk `top` following an encoded address. Returns `null` for an address that
 * does not land on an FX under the current structure.
 */
export function decodeAddress<T extends AddressableNode<T>>(handle: FxHandle, top: T[]): T | null {
  if (!Number.isInteger(handle) || handle < 0) return null;
  if (handle < CONTAINER_ADDRESS_BASE) return top[handle] ?? null;

  let rem = handle - CONTAINER_ADDRESS_BASE;
  let list = top;
  let node: T | null = null;
  while (rem > 0) {
    if (node && !node.isContainer) return null;
    const radix = list.length + 1;
    const digit = rem % radix;
    rem = Math.floor(rem / radix);
    if (digit === 0) return null;
    node = list[digit - 1] ?? null;
    if (!node) return null;
    list = node.children;
  }
  return node;
}
