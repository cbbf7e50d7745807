import { expect, test } from "vitest";

import { createInMemoryFxHost } from "@fxrack/host-memory";
import type { FxHost } from "@fxrack/interface";

import { verifyIntegrity } from "../src/integrity.js";
import { HierarchyMutator } from "../src/mutator.js";
import { catchHierarchyError, counterIds, id, outline, setup } from "./helpers.js";

test("rack, chains, nested rack and an empty chain conversion", () => {
  const { host, mutator, expansion } = setup();

  const rack = mutator.addRack();
  expect(rack).toEqual({
    id: id(1),
    kind: "rack",
    name: "R1: Rack",
    role: { type: "rack" },
    path: { rackIdx: 1 },
    label: "Rack",
  });
  if (!rack) throw new Error("rack not created");

  const c1 = mutator.addChainToRack(rack.id, "VST: ReaComp (Cockos)");
  expect(c1?.name).toBe("R1_C1");
  expect(c1?.kind).toBe("chain");
  expect(c1?.label).toBeNull();
  expect(outline(host.dump())).toEqual([
    "R1: Rack",
    "  R1_C1",
    "    R1_C1_D1: ReaComp",
    "      R1_C1_D1_FX: ReaComp",
    "      R1_C1_D1_Util",
    "  _R1_M",
  ]);
  const afterFirst = mutator.tree()[0];
  expect(afterFirst?.children.filter((c) => c.kind !== "mixer")).toHaveLength(1);
  expect(afterFirst?.children.map((c) => c.kind)).toEqual(["chain", "mixer"]);

  const c2 = mutator.addChainToRack(rack.id, "VST: ReaEQ (Cockos)");
  expect(c2?.name).toBe("R1_C2");
  expect(mutator.tree()[0]?.children.filter((c) => c.kind === "chain")).toHaveLength(2);

  if (!c1) throw new Error("chain not created");
  const inner = mutator.addRack(c1.id);
  expect(inner?.name).toBe("R2: Rack");
  expect(inner?.kind).toBe("rack");
  if (!inner) throw new Error("nested rack not created");
  expect(mutator.resolver.parentIdOf(inner.id)).toBe(c1.id);
  expect(mutator.tree().map((n) => n.id)).toEqual([rack.id]);
  expect(mutator.tree()[0]?.children.filter((c) => c.kind === "chain")).toHaveLength(2);

  const empty = mutator.addEmptyChainToRack(rack.id);
  expect(empty?.name).toBe("R1_C3");
  if (!empty) throw new Error("empty chain not created");
  expect(mutator.convertChainToDevices(empty.id)).toEqual([]);
  expect(mutator.resolver.resolve(empty.id)).toBeNull();

  expect(outline(host.dump())).toEqual([
    "R1: Rack",
    "  R1_C1",
    "    R1_C1_D1: ReaComp",
    "      R1_C1_D1_FX: ReaComp",
    "      R1_C1_D1_Util",
    "    R2: Rack",
    "      _R2_M",
    "  R1_C2",
    "    R1_C2_D1: ReaEQ",
    "      R1_C2_D1_FX: ReaEQ",
    "      R1_C2_D1_Util",
    "  _R1_M",
  ]);
  expect(verifyIntegrity(host)).toEqual({ ok: true });

  expect(host.undoLabels()).toEqual([
    "Add rack",
    "Add chain",
    "Add chain",
    "Add rack to chain",
    "Add empty chain",
    "Convert chain to devices",
  ]);
  expect(host.openUndoBlocks()).toBe(0);
  expect(host.uiRefreshDepth()).toBe(0);

  expect(expansion.isExpanded(rack.id)).toBe(true);
  expect(expansion.isExpanded(inner.id)).toBe(true);
  expect(expansion.getSelectedChain(rack.id)).toBeNull();
});

test("ancestors keep their parents through edits five levels deep", () => {
  const { host, mutator } = setup();
  const r1 = mutator.addRack();
  if (!r1) throw new Error("rack not created");
  const r2 = mutator.addNestedRackToRack(r1.id);
  if (!r2) throw new Error("nested rack not created");
  const r3 = mutator.addNestedRackToRack(r2.id);
  if (!r3) throw new Error("nested rack not created");
  expect([r1.name, r2.name, r3.name]).toEqual(["R1: Rack", "R2: Rack", "R3: Rack"]);

  const outerChain = mutator.resolver.parentIdOf(r2.id);
  const midChain = mutator.resolver.parentIdOf(r3.id);
  expect(outerChain).toBe(id(3));
  expect(midChain).toBe(id(6));
  if (!outerChain || !midChain) throw new Error("chains missing");

  const deep = mutator.addChainToRack(r3.id, "VST: ReaComp (Cockos)");
  if (!deep) throw new Error("deep chain not created");
  expect(mutator.addDeviceToChain(deep.id, "VST: ReaEQ (Cockos)")?.name).toBe("R3_C1_D2: ReaEQ");
  expect(mutator.addRackToChain(deep.id)?.name).toBe("R4: Rack");

  const expected: [string, string | null][] = [
    [deep.id, r3.id],
    [r3.id, midChain],
    [midChain, r2.id],
    [r2.id, outerChain],
    [outerChain, r1.id],
    [r1.id, null],
  ];
  for (const [child, parent] of expected) {
    expect(mutator.resolver.parentIdOf(child)).toBe(parent);
  }
  expect(verifyIntegrity(host)).toEqual({ ok: true });
});

test("chain indices follow creation order", () => {
  const { mutator } = setup();
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  const names = [1, 2, 3, 4, 5].map(() => mutator.addEmptyChainToRack(rack.id)?.name);
  expect(names).toEqual(["R1_C1", "R1_C2", "R1_C3", "R1_C4", "R1_C5"]);
  expect(mutator.tree()[0]?.children.map((c) => c.name)).toEqual([...names, "_R1_M"]);
});

test("chain limit is enforced before any write", () => {
  const { host, mutator } = setup({ mutator: { maxChainsPerRack: 2 } });
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  mutator.addEmptyChainToRack(rack.id);
  mutator.addEmptyChainToRack(rack.id);
  const writes = host.writeCount();

  const err = catchHierarchyError(() => mutator.addEmptyChainToRack(rack.id));
  expect(err.code).toBe("ChainLimitExceeded");
  expect(err.created).toEqual([]);
  expect(host.writeCount()).toBe(writes);
  expect(host.undoLabels().at(-1)).toBe("Add empty chain (failed)");
});

test("converting a chain lands its devices after the rack and removes an emptied rack", () => {
  const { host, mutator } = setup();
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  const c1 = mutator.addChainToRack(rack.id, "VST: ReaComp (Cockos)");
  if (!c1) throw new Error("chain not created");
  mutator.addDeviceToChain(c1.id, "VST: ReaEQ (Cockos)");
  const c2 = mutator.addChainToRack(rack.id, "VST: ReaDelay (Cockos)");
  if (!c2) throw new Error("chain not created");

  const moved = mutator.convertChainToDevices(c1.id);
  expect(moved.map((d) => [d.name, d.kind])).toEqual([
    ["D1: ReaComp", "device"],
    ["D2: ReaEQ", "device"],
  ]);
  expect(outline(host.dump())).toEqual([
    "R1: Rack",
    "  R1_C2",
    "    R1_C2_D1: ReaDelay",
    "      R1_C2_D1_FX: ReaDelay",
    "      R1_C2_D1_Util",
    "  _R1_M",
    "D1: ReaComp",
    "  D1_FX: ReaComp",
    "  D1_Util",
    "D2: ReaEQ",
    "  D2_FX: ReaEQ",
    "  D2_Util",
  ]);

  expect(mutator.convertChainToDevices(c2.id).map((d) => d.name)).toEqual(["D3: ReaDelay"]);
  expect(mutator.resolver.resolve(rack.id)).toBeNull();
  expect(host.dump().map((row) => row.name)).toEqual(["D3: ReaDelay", "D1: ReaComp", "D2: ReaEQ"]);
});

test("converting a chain of a nested rack lands in the outer chain", () => {
  const { host, mutator } = setup();
  const outer = mutator.addRack();
  if (!outer) throw new Error("rack not created");
  const inner = mutator.addNestedRackToRack(outer.id);
  if (!inner) throw new Error("nested rack not created");
  const chain = mutator.addChainToRack(inner.id, "VST: ReaComp (Cockos)");
  expect(chain?.name).toBe("R2_C1");
  if (!chain) throw new Error("chain not created");

  expect(mutator.convertChainToDevices(chain.id).map((d) => d.name)).toEqual(["R1_C1_D1: ReaComp"]);
  expect(mutator.resolver.resolve(inner.id)).toBeNull();
  expect(outline(host.dump())).toEqual([
    "R1: Rack",
    "  R1_C1",
    "    R1_C1_D1: ReaComp",
    "      R1_C1_D1_FX: ReaComp",
    "      R1_C1_D1_Util",
    "  _R1_M",
  ]);
});

test("convertChainToDevices and convertDeviceToRack ignore the wrong kind", () => {
  const { host, mutator } = setup();
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  const chain = mutator.addChainToRack(rack.id, "VST: ReaComp (Cockos)");
  if (!chain) throw new Error("chain not created");
  const nested = mutator.tree()[0]?.children[0]?.children[0];
  expect(nested?.name).toBe("R1_C1_D1: ReaComp");
  if (!nested) throw new Error("device missing");

  const writes = host.writeCount();
  const labels = host.undoLabels().length;
  expect(mutator.convertChainToDevices(rack.id)).toEqual([]);
  expect(mutator.convertDeviceToRack(rack.id)).toBeNull();
  expect(mutator.convertDeviceToRack(nested.id)).toBeNull();
  expect(mutator.addChainToRack(chain.id)).toBeNull();
  expect(mutator.addChainToRack(id(999))).toBeNull();
  expect(host.writeCount()).toBe(writes);
  expect(host.undoLabels()).toHaveLength(labels);
});

test("a standalone device converts into rack, chain and device", () => {
  const { host, mutator, expansion } = setup();
  const device = mutator.addDevice({ fullName: "VST: ReaComp (Cockos)" });
  expect(device?.name).toBe("D1: ReaComp");
  mutator.addDevice("VST: ReaEQ (Cockos)");
  if (!device) throw new Error("device not created");

  const rack = mutator.convertDeviceToRack(device.id);
  expect(rack?.name).toBe("R1: Rack");
  if (!rack) throw new Error("rack not created");
  expect(outline(host.dump())).toEqual([
    "R1: Rack",
    "  R1_C1",
    "    R1_C1_D1: ReaComp",
    "      R1_C1_D1_FX: ReaComp",
    "      R1_C1_D1_Util",
    "  _R1_M",
    "D2: ReaEQ",
    "  D2_FX: ReaEQ",
    "  D2_Util",
  ]);
  expect(mutator.describe(device.id)?.kind).toBe("device");
  expect(expansion.getSelectedChain(rack.id)).toBe(mutator.resolver.parentIdOf(device.id));
});

test("modulators take the next free index inside a device", () => {
  const { mutator } = setup();
  const device = mutator.addDevice({ fullName: "VST: ReaComp (Cockos)", label: "Comp" });
  if (!device) throw new Error("device not created");
  expect(device.name).toBe("D1: Comp");
  expect(mutator.addModulatorToDevice(device.id)?.name).toBe("D1_M1: Modulator");
  expect(mutator.addModulatorToDevice(device.id, "JS: fxrack/lfo")?.name).toBe("D1_M2: lfo");
  expect(mutator.tree(device.id).map((n) => n.name)).toEqual([
    "D1_FX: Comp",
    "D1_Util",
    "D1_M1: Modulator",
    "D1_M2: lfo",
  ]);
});

test("renumbering devices never relabels a rack", () => {
  const { mutator } = setup();
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  const chain = mutator.addEmptyChainToRack(rack.id);
  if (!chain) throw new Error("chain not created");
  const d1 = mutator.addDeviceToChain(chain.id, "VST: ReaComp (Cockos)");
  const nested = mutator.addRackToChain(chain.id);
  const d2 = mutator.addDeviceToChain(chain.id, "VST: ReaEQ (Cockos)");
  expect([d1?.name, nested?.name, d2?.name]).toEqual(["R1_C1_D1: ReaComp", "R2: Rack", "R1_C1_D2: ReaEQ"]);
  if (!d1 || !d2) throw new Error("devices not created");

  expect(mutator.deleteNode(d1.id)).toBe(true);
  expect(mutator.renumber({ type: "devices", chain: chain.id })).toBe(3);
  expect(mutator.tree(chain.id).map((n) => [n.name, n.kind])).toEqual([
    ["R2: Rack", "rack"],
    ["R1_C1_D1: ReaEQ", "device"],
  ]);
  expect(mutator.tree(d2.id).map((n) => n.name)).toEqual(["R1_C1_D1_FX: ReaEQ", "R1_C1_D1_Util"]);
  expect(mutator.renumber({ type: "devices", chain: chain.id })).toBe(0);
});

test("reordering chains renumbers them and their devices", () => {
  const { mutator } = setup();
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  const a = mutator.addChainToRack(rack.id, "VST: ReaComp (Cockos)");
  const b = mutator.addChainToRack(rack.id, "VST: ReaEQ (Cockos)");
  if (!a || !b) throw new Error("chains not created");

  expect(mutator.reorderChainInRack(rack.id, b.id, a.id)).toBe(true);
  const tree = mutator.tree(rack.id);
  expect(tree.map((n) => [n.id, n.name])).toEqual([
    [b.id, "R1_C1"],
    [a.id, "R1_C2"],
    [tree[2]?.id, "_R1_M"],
  ]);
  expect(tree[0]?.children.map((n) => n.name)).toEqual(["R1_C1_D1: ReaEQ"]);
  expect(tree[1]?.children.map((n) => n.name)).toEqual(["R1_C2_D1: ReaComp"]);

  expect(mutator.reorderChainInRack(rack.id, b.id)).toBe(true);
  expect(mutator.tree(rack.id).map((n) => n.name)).toEqual(["R1_C1", "R1_C2", "_R1_M"]);
  expect(mutator.describe(a.id)?.name).toBe("R1_C1");
});

test("deleteNode cascades and reports unknown ids", () => {
  const { host, mutator } = setup();
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  mutator.addChainToRack(rack.id, "VST: ReaComp (Cockos)");
  expect(mutator.deleteNode(rack.id)).toBe(true);
  expect(host.dump()).toEqual([]);
  expect(mutator.deleteNode(rack.id)).toBe(false);
});

test("a refused move reports what was already created", () => {
  const { host, mutator } = setup();
  host.failNext("moveToContainer");
  const err = catchHierarchyError(() => mutator.addRack());
  expect(err.code).toBe("ChildMoveFailed");
  expect(err.message).toBe(`ChildMoveFailed: Add rack: host refused to move ${id(2)} into ${id(1)}`);
  expect(err.created).toEqual([id(1), id(2)]);
  expect(outline(host.dump())).toEqual(["R1: Rack", "_R1_M"]);
  expect(host.undoLabels()).toEqual(["Add rack (failed)"]);
  expect(host.uiRefreshDepth()).toBe(0);
});

test("a refused insert fails container creation", () => {
  const { host, mutator } = setup();
  host.failNext("insertFx");
  const err = catchHierarchyError(() => mutator.addRack());
  expect(err.code).toBe("ContainerCreateFailed");
  expect(err.created).toEqual([]);
  expect(host.count()).toBe(0);
});

test("a refused rename during renumbering carries the operation's created list", () => {
  const { host, mutator } = setup();
  mutator.addDevice("VST: ReaComp (Cockos)");
  const second = mutator.addDevice("VST: ReaEQ (Cockos)");
  if (!second) throw new Error("device not created");
  const first = mutator.tree()[0];
  if (!first) throw new Error("device missing");
  mutator.deleteNode(first.id);

  host.failNext("rename");
  const err = catchHierarchyError(() => mutator.renumber({ type: "top" }));
  expect(err.code).toBe("RenameFailed");
  expect(err.created).toEqual([]);
  expect(mutator.renumber({ type: "top" })).toBe(3);
  expect(mutator.describe(second.id)?.name).toBe("D1: ReaEQ");
});

test("operations tolerate a host that settles after each write", () => {
  const { host, mutator } = setup({ host: { staleReadsAfterWrite: 1 } });
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  const chain = mutator.addChainToRack(rack.id, "VST: ReaComp (Cockos)");
  if (!chain) throw new Error("chain not created");
  mutator.addRackToChain(chain.id);
  expect(outline(host.dump())).toEqual([
    "R1: Rack",
    "  R1_C1",
    "    R1_C1_D1: ReaComp",
    "      R1_C1_D1_FX: ReaComp",
    "      R1_C1_D1_Util",
    "    R2: Rack",
    "      _R2_M",
    "  _R1_M",
  ]);
});

test("debug logging goes to the injected sink", () => {
  const lines: string[] = [];
  const { mutator } = setup({ mutator: { debug: true, log: (line) => lines.push(line) } });
  expect(mutator.addChainToRack(id(99))).toBeNull();
  expect(lines).toEqual([`[fxrack:mutator] addChainToRack: ${id(99)} not found`]);
});

test("a rack deleted mid-operation ends it with null and keeps committed writes", () => {
  const lines: string[] = [];
  const host = createInMemoryFxHost({ generateId: counterIds() });
  let deleteRackOnInsert = false;
  const racing: FxHost = {
    ...host,
    insertFx(plugin, position) {
      if (deleteRackOnInsert) {
        deleteRackOnInsert = false;
        host.remove(0);
      }
      return host.insertFx(plugin, position);
    },
  };
  const mutator = new HierarchyMutator(racing, { debug: true, log: (line) => lines.push(line) });
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");

  deleteRackOnInsert = true;
  expect(mutator.addChainToRack(rack.id)).toBeNull();
  expect(outline(host.dump())).toEqual(["R1_C1"]);
  expect(host.undoLabels()).toEqual(["Add rack", "Add empty chain (failed)"]);
  expect(host.uiRefreshDepth()).toBe(0);
  expect(lines.at(-1)).toBe(`[fxrack:mutator] Add empty chain: ${id(1)} no longer resolves, stopping (created: ${id(3)})`);
});

test("a chain deleted while its devices move out ends the conversion with []", () => {
  const host = createInMemoryFxHost({ generateId: counterIds() });
  let deleteChainOnMove = false;
  const racing: FxHost = {
    ...host,
    moveToTopLevel(fx, position) {
      const moved = host.moveToTopLevel(fx, position);
      if (deleteChainOnMove) {
        deleteChainOnMove = false;
        const chain = host.childAt(0, 0);
        if (chain !== null) host.remove(chain);
      }
      return moved;
    },
  };
  const mutator = new HierarchyMutator(racing);
  const rack = mutator.addRack();
  if (!rack) throw new Error("rack not created");
  const chain = mutator.addChainToRack(rack.id, "VST: ReaComp (Cockos)");
  if (!chain) throw new Error("chain not created");
  mutator.addDeviceToChain(chain.id, "VST: ReaEQ (Cockos)");

  const labels = host.undoLabels().length;
  expect(mutator.convertChainToDevices(id(404))).toEqual([]);
  expect(host.undoLabels()).toHaveLength(labels);

  deleteChainOnMove = true;
  expect(mutator.convertChainToDevices(chain.id)).toEqual([]);
  expect(outline(host.dump())).toEqual(["R1: Rack", "  _R1_M", "D1: ReaComp", "  D1_FX: ReaComp", "  D1_Util"]);
  expect(host.undoLabels().at(-1)).toBe("Convert chain to devices (failed)");
});

test("an unrepresentable rack index fails before anything is inserted", () => {
  const { host, mutator } = setup();
  host.insertFx("Container");
  host.rename(0, "R9007199254740991: Big");
  expect(() => mutator.addRack()).toThrow("rackIdx must be a positive integer, got: 9007199254740992");
  expect(host.dump().map((row) => row.name)).toEqual(["R9007199254740991: Big"]);
  expect(host.undoLabels()).toEqual(["Add rack (failed)"]);

  host.rename(0, "R9007199254740993: Big");
  expect(mutator.addRack()?.name).toBe("R1: Rack");
  expect(host.dump().map((row) => row.name)).toEqual(["R9007199254740993: Big", "R1: Rack"]);
});
