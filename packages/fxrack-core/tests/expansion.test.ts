import { encode, rfc8949EncodeOptions } from "cborg";
import { expect, test } from "vitest";

import { decodeExpansionState, encodeExpansionState, ExpansionState } from "../src/expansion.js";
import { id } from "./helpers.js";

const outer = id(1);
const outerChain = id(3);
const inner = id(4);
const sibling = id(10);
const siblingChain = id(11);

test("expanding one rack never touches another, nested or sibling", () => {
  const state = new ExpansionState();
  state.setExpanded(outer, true);
  expect(state.isExpanded(inner)).toBe(false);
  expect(state.isExpanded(sibling)).toBe(false);

  state.setExpanded(inner, true);
  expect(state.toggleExpanded(outer)).toBe(false);
  expect(state.isExpanded(inner)).toBe(true);
  expect(state.isExpanded(outer)).toBe(false);

  state.setSelectedChain(outer, outerChain);
  state.setSelectedChain(sibling, siblingChain);
  state.setSelectedChain(outer, null);
  expect(state.getSelectedChain(outer)).toBeNull();
  expect(state.getSelectedChain(sibling)).toBe(siblingChain);
  expect(state.getSelectedChain(inner)).toBeNull();
});

test("the breadcrumb selects, toggles and collapses by depth", () => {
  const state = new ExpansionState();
  expect(state.toggleContainer(outer, 0)).toBe(true);
  expect(state.toggleContainer(outerChain, 1)).toBe(true);
  expect(state.toggleContainer(inner, 2)).toBe(true);
  expect(state.selectionPath()).toEqual([outer, outerChain, inner]);

  expect(state.toggleContainer(outerChain, 1)).toBe(false);
  expect(state.selectionPath()).toEqual([outer]);

  state.selectChain(outer, outerChain);
  expect(state.selectionPath()).toEqual([outer, outerChain]);
  expect(state.getSelectedChain(outer)).toBe(outerChain);

  state.selectRack(inner, 2);
  state.selectDevice(id(20), 3);
  expect(state.selectionPath()).toEqual([outer, outerChain, inner, id(20)]);
  expect(state.isExpanded(inner)).toBe(true);

  state.collapseFromDepth(1);
  expect(state.selectionPath()).toEqual([outer]);
  state.clearSelection();
  expect(state.selectionPath()).toEqual([]);
  expect(() => state.collapseFromDepth(-1)).toThrow("invalid depth: -1");
});

test("retain drops entries that mention dead ids", () => {
  const state = new ExpansionState();
  state.setExpanded(outer, true);
  state.setExpanded(inner, true);
  state.setSelectedChain(outer, outerChain);
  state.setSelectedChain(sibling, siblingChain);
  state.selectRack(outer);
  state.selectChain(outer, outerChain);
  state.selectRack(inner, 2);

  // inner and siblingChain are gone
  expect(state.retain([outer, outerChain, sibling])).toBe(3);
  expect(state.isExpanded(outer)).toBe(true);
  expect(state.isExpanded(inner)).toBe(false);
  expect(state.getSelectedChain(outer)).toBe(outerChain);
  expect(state.getSelectedChain(sibling)).toBeNull();
  expect(state.selectionPath()).toEqual([outer, outerChain]);

  state.clear();
  expect(state.isExpanded(outer)).toBe(false);
  expect(state.selectionPath()).toEqual([]);
});

test("snapshots round-trip through CBOR", () => {
  const state = new ExpansionState();
  state.setExpanded(outer, true);
  state.setSelectedChain(outer, outerChain);
  state.selectRack(outer);
  state.selectChain(outer, outerChain);

  const restored = decodeExpansionState(encodeExpansionState(state));
  expect(restored.isExpanded(outer)).toBe(true);
  expect(restored.isExpanded(inner)).toBe(false);
  expect(restored.getSelectedChain(outer)).toBe(outerChain);
  expect(restored.selectionPath()).toEqual([outer, outerChain]);
});

test("malformed snapshots are rejected", () => {
  const bytes = (entries: [string, unknown][]) => encode(new Map(entries), rfc8949EncodeOptions);
  expect(() => decodeExpansionState(encode([1, 2], rfc8949EncodeOptions))).toThrow(
    "ExpansionStateV1 payload must be a CBOR map"
  );
  expect(() => decodeExpansionState(bytes([["t", "other"]]))).toThrow("ExpansionStateV1.t mismatch");
  expect(() =>
    decodeExpansionState(
      bytes([
        ["t", "fxrack/expansion/v1"],
        ["expanded", ["nope"]],
        ["selected", []],
        ["path", []],
      ])
    )
  ).toThrow("ExpansionStateV1.expanded[0] must be a StableId");
  expect(() =>
    decodeExpansionState(
      bytes([
        ["t", "fxrack/expansion/v1"],
        ["expanded", []],
        ["selected", [[outer]]],
        ["path", []],
      ])
    )
  ).toThrow("ExpansionStateV1.selected[0] must be a [rack, chain] pair");
});
