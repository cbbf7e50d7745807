import { expect, test } from "vitest";

import { createStructureWatcher } from "../src/watcher.js";
import { id, setup } from "./helpers.js";

test("poll reports structural changes and vanished ids", () => {
  const { host, mutator, expansion } = setup();
  const watcher = createStructureWatcher(host, mutator.resolver);
  expect(watcher.poll()).toEqual({ changed: false, vanished: [] });

  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  expect(watcher.poll()).toEqual({ changed: true, vanished: [] });
  expect(watcher.snapshot()).toEqual({ count: 1, ids: [id(1), id(2)] });

  expect(host.rename(0, "R1: Drums")).toBe(true);
  expect(watcher.poll()).toEqual({ changed: false, vanished: [] });

  mutator.deleteNode(rack.id);
  const change = watcher.poll();
  expect(change).toEqual({ changed: true, vanished: [id(1), id(2)] });
  expect(expansion.isExpanded(rack.id)).toBe(true);
  expect(expansion.retain(watcher.snapshot().ids)).toBe(1);
  expect(expansion.isExpanded(rack.id)).toBe(false);
});

test("a reorder with the same count is still a change", () => {
  const { host, mutator } = setup();
  mutator.addDevice("VST: ReaComp (Cockos)");
  mutator.addDevice("VST: ReaEQ (Cockos)");
  const watcher = createStructureWatcher(host);
  expect(host.moveToTopLevel(1, 0)).toBe(true);
  expect(watcher.poll()).toEqual({ changed: true, vanished: [] });
});
