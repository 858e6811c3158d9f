// tests/objects/registry.test.ts
import { ObjectRegistry } from "../../src/objects/core/registry.js";
import { ObjectError, isObjectError } from "../../src/objects/errors.js";
import { defineObjectType } from "../../src/objects/interfaces.js";
import { formatObjectId, objectIndex } from "../../src/objects/core/objectId.js";
import { Button, Label, Panel, makeRegistry, makeSmallTree } from "./testUtils.js";

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isObjectError(err)) return err.kind;
    throw err;
  }
  return undefined;
}

describe("ObjectRegistry lifecycle", () => {
  it("registers unparented, unnamed objects", () => {
    const reg = makeRegistry();
    const id = reg.register(Panel);

    expect(reg.contains(id)).toBe(true);
    expect(reg.objectCount).toBe(1);
    expect(reg.parent(id)).toBeNull();
    expect(reg.children(id)).toEqual([]);
    expect(reg.objectName(id)).toBe("");
    expect(reg.typeId(id)).toBe(Panel);
    expect(reg.typeName(id)).toBe("Panel");
  });

  it("accepts plain type tokens", () => {
    const reg = makeRegistry();
    const Slider = defineObjectType("Slider");
    const id = reg.register(Slider);
    expect(reg.typeId(id)).toBe(Slider);
    expect(reg.typeName(id)).toBe("Slider");
  });

  it("cascade delete removes the whole subtree", () => {
    const reg = makeRegistry();
    const { root, child1, child2, grandchild } = makeSmallTree(reg);
    const bystander = reg.register(Panel);

    const removed = reg.destroy(root);

    expect(removed).toEqual([grandchild, child1, child2, root]);
    for (const id of [root, child1, child2, grandchild]) expect(reg.contains(id)).toBe(false);
    expect(reg.contains(bystander)).toBe(true);
    expect(reg.objectCount).toBe(1);
  });

  it("destroying a child unlinks it from its parent only", () => {
    const reg = makeRegistry();
    const { root, child1, child2, grandchild } = makeSmallTree(reg);

    reg.destroy(child1);

    expect(reg.children(root)).toEqual([child2]);
    expect(reg.childCount(root)).toBe(1);
    expect(reg.contains(grandchild)).toBe(false);
    expect(reg.contains(root)).toBe(true);
  });

  it("destroy of an unknown id fails without touching anything", () => {
    const reg = makeRegistry();
    const { root, child1 } = makeSmallTree(reg);
    reg.destroy(child1);
    const before = reg.epoch;

    expect(errorKind(() => reg.destroy(child1))).toBe("InvalidObjectId");
    expect(reg.epoch).toBe(before);
    expect(reg.objectCount).toBe(2);
    expect(reg.contains(root)).toBe(true);
  });

  it("freed ids stay dead after their slots are reused", () => {
    const reg = makeRegistry(2);
    const a = reg.register(Panel);
    reg.destroy(a);
    const b = reg.register(Panel);

    expect(b).not.toBe(a);
    expect(reg.contains(a)).toBe(false);
    expect(errorKind(() => reg.objectName(a))).toBe("InvalidObjectId");
    expect(reg.contains(b)).toBe(true);
  });

  it("lists roots in slot order, unaffected by earlier destroys", () => {
    const reg = makeRegistry();
    const a = reg.register(Panel);
    const b = reg.register(Panel);
    const c = reg.register(Panel);
    const d = reg.register(Panel);

    reg.destroy(a);
    expect(reg.rootObjects()).toEqual([b, c, d]);

    const e = reg.register(Label);
    expect(objectIndex(e)).toBe(0);
    expect(reg.rootObjects()).toEqual([e, b, c, d]);
  });
});

describe("ObjectRegistry.setParent", () => {
  it("appends to the end of the new parent's children", () => {
    const reg = makeRegistry();
    const p = reg.register(Panel);
    const a = reg.register(Label);
    const b = reg.register(Label);
    reg.setParent(a, p);
    reg.setParent(b, p);

    expect(reg.children(p)).toEqual([a, b]);
    expect(reg.parent(a)).toBe(p);
    expect(reg.parent(b)).toBe(p);
  });

  it("moves between parents and back to root", () => {
    const reg = makeRegistry();
    const p1 = reg.register(Panel);
    const p2 = reg.register(Panel);
    const child = reg.register(Label);

    reg.setParent(child, p1);
    reg.setParent(child, p2);
    expect(reg.children(p1)).toEqual([]);
    expect(reg.children(p2)).toEqual([child]);
    expect(reg.parent(child)).toBe(p2);

    reg.setParent(child, null);
    expect(reg.parent(child)).toBeNull();
    expect(reg.children(p2)).toEqual([]);
    expect(reg.rootObjects()).toEqual([p1, p2, child]);
  });

  it("re-setting the same parent moves the child to the front", () => {
    const reg = makeRegistry();
    const p = reg.register(Panel);
    const a = reg.register(Label);
    const b = reg.register(Label);
    reg.setParent(a, p);
    reg.setParent(b, p);

    reg.setParent(a, p);
    expect(reg.children(p)).toEqual([b, a]);
  });

  it("keeps the reparented subtree intact", () => {
    const reg = makeRegistry();
    const { root, child1, grandchild } = makeSmallTree(reg);
    const other = reg.register(Panel);

    reg.setParent(child1, other);
    expect(reg.children(child1)).toEqual([grandchild]);
    expect(reg.ancestors(grandchild)).toEqual([child1, other]);
    expect(reg.children(root).includes(child1)).toBe(false);
  });

  it("rejects circular parentage and leaves links unchanged", () => {
    const reg = makeRegistry();
    const obj1 = reg.register(Panel);
    const obj2 = reg.register(Panel);
    reg.setParent(obj2, obj1);

    expect(errorKind(() => reg.setParent(obj1, obj2))).toBe("CircularParentage");
    expect(reg.parent(obj1)).toBeNull();
    expect(reg.parent(obj2)).toBe(obj1);
    expect(reg.children(obj1)).toEqual([obj2]);
    expect(reg.children(obj2)).toEqual([]);
  });

  it("rejects self-parenting and deeper descendants", () => {
    const reg = makeRegistry();
    const { root, grandchild } = makeSmallTree(reg);

    expect(errorKind(() => reg.setParent(root, root))).toBe("CircularParentage");
    expect(errorKind(() => reg.setParent(root, grandchild))).toBe("CircularParentage");
    expect(reg.parent(root)).toBeNull();
  });

  it("rejects unknown ids", () => {
    const reg = makeRegistry();
    const a = reg.register(Panel);
    const gone = reg.register(Panel);
    reg.destroy(gone);

    expect(errorKind(() => reg.setParent(a, gone))).toBe("InvalidObjectId");
    expect(errorKind(() => reg.setParent(gone, a))).toBe("InvalidObjectId");
    expect(errorKind(() => reg.setParent(gone, null))).toBe("InvalidObjectId");
  });

  it("reports proper ancestors only", () => {
    const reg = makeRegistry();
    const { root, child1, child2, grandchild } = makeSmallTree(reg);

    expect(reg.isAncestorOf(root, grandchild)).toBe(true);
    expect(reg.isAncestorOf(child1, grandchild)).toBe(true);
    expect(reg.isAncestorOf(child2, grandchild)).toBe(false);
    expect(reg.isAncestorOf(grandchild, root)).toBe(false);
    expect(reg.isAncestorOf(root, root)).toBe(false);
    expect(reg.ancestors(grandchild)).toEqual([child1, root]);
    expect(reg.depth(grandchild)).toBe(2);
    expect(reg.depth(root)).toBe(0);
  });
});

describe("ObjectRegistry naming and lookup", () => {
  it("renames without reordering siblings", () => {
    const reg = makeRegistry();
    const { root, child1, child2 } = makeSmallTree(reg);

    reg.setObjectName(child2, "second");
    reg.setObjectName(child1, "first");
    expect(reg.objectName(child1)).toBe("first");
    expect(reg.children(root)).toEqual([child1, child2]);
  });

  it("finds direct children by name and type", () => {
    const reg = makeRegistry();
    const { root, child1, child2, grandchild } = makeSmallTree(reg);
    reg.setObjectName(child1, "item");
    reg.setObjectName(child2, "item");
    reg.setObjectName(grandchild, "deep");

    expect(reg.findChildByName(root, "item")).toBe(child1);
    expect(reg.findChildByName(root, "deep")).toBeUndefined();
    expect(reg.findChild(root, "item", Label)).toBe(child2);
    expect(reg.findChild(root, "item", Button)).toBeUndefined();
    expect(reg.findChildrenByType(root, Panel)).toEqual([child1]);
    expect(reg.findChildrenByType(root, Button)).toEqual([]);
  });

  it("finds descendants by name at any depth, excluding the start", () => {
    const reg = makeRegistry();
    const { root, child1, child2, grandchild } = makeSmallTree(reg);
    reg.setObjectName(root, "x");
    reg.setObjectName(grandchild, "x");
    reg.setObjectName(child2, "x");
    reg.setObjectName(child1, "y");

    expect(reg.findDescendantsByName(root, "x")).toEqual([grandchild, child2]);
    expect(reg.findDescendantsByName(child1, "x")).toEqual([grandchild]);
    expect(reg.findDescendantsByName(root, "none")).toEqual([]);
  });

  it("dumps a readable tree", () => {
    const reg = makeRegistry();
    const { root, child1, child2, grandchild } = makeSmallTree(reg);
    reg.setObjectName(root, "window");
    reg.setObjectName(grandchild, "ok");

    const expected =
      `[${formatObjectId(root)}] window (Panel)\n` +
      `  [${formatObjectId(child1)}] (unnamed) (Panel)\n` +
      `    [${formatObjectId(grandchild)}] ok (Button)\n` +
      `  [${formatObjectId(child2)}] (unnamed) (Label)\n`;
    expect(reg.dumpObjectTree(root)).toBe(expected);
  });

  it("queries on stale ids throw ObjectError", () => {
    const reg = makeRegistry();
    const id = reg.register(Panel);
    reg.destroy(id);
    expect(() => reg.children(id)).toThrow(ObjectError);
    expect(() => reg.typeName(id)).toThrow("Invalid or destroyed object ID");
  });
});

describe("ObjectRegistry epoch and logging", () => {
  it("bumps the epoch on mutations but not on queries", () => {
    const reg = makeRegistry();
    const a = reg.register(Panel);
    const e0 = reg.epoch;
    reg.children(a);
    reg.objectName(a);
    expect(reg.epoch).toBe(e0);
    reg.setObjectName(a, "a");
    expect(reg.epoch).toBe(e0 + 1);
  });

  it("traces lifecycle events through the configured logger", () => {
    const debug = jest.fn();
    const reg = new ObjectRegistry({ logger: { debug } });
    const p = reg.register(Panel);
    const c = reg.register(Label);
    reg.setParent(c, p);
    reg.destroy(p);

    expect(debug).toHaveBeenCalledWith("registered object", { id: formatObjectId(p), type: "Panel" });
    expect(debug).toHaveBeenCalledWith("set parent", { id: formatObjectId(c), parent: formatObjectId(p) });
    expect(debug).toHaveBeenCalledWith("destroying object tree", { id: formatObjectId(p), descendants: 1 });
  });
});
