import { describe, it } from "node:test";
import assert from "node:assert";
import { z } from "zod";
import { defineModel, getChangeTracker, type TrackedRecord } from "../src/index.js";
import { assertExactFields } from "./helpers.js";

const Child = defineModel(z.object({ value: z.string() }), { name: "Child" });

const Parent = defineModel(
  z.object({
    child: Child.schema,
    children: z.array(Child.schema).default([]),
    byKey: z.record(Child.schema).default({}),
    byId: z.map(z.number(), Child.schema).default(() => new Map()),
  }),
  { name: "Parent" },
);

function assertSuperset<T>(record: TrackedRecord<T>) {
  const tracker = getChangeTracker(record);
  const recursive = tracker.changedFieldsRecursive();
  for (const field of tracker.changedFields()) {
    assert.ok(recursive.has(field), `${field} missing from recursive changes`);
  }
}

describe("recursive changes", () => {
  describe("nested record", () => {
    it("should report nested changes with dotted paths", () => {
      const parent = Parent.create({ child: { value: "a" } });
      const tracker = getChangeTracker(parent);

      parent.child.value = "b";

      assert.strictEqual(tracker.hasChanged(), true);
      assert.strictEqual(tracker.hasSelfChanged(), false);
      assert.deepStrictEqual(tracker.changedFields(), new Set());
      assert.deepStrictEqual(tracker.original, {});
      assertExactFields(tracker.changedFieldsRecursive(), ["child", "child.value"]);

      const childTracker = getChangeTracker(parent.child);
      assert.deepStrictEqual(childTracker.original, { value: "a" });
      assertExactFields(childTracker.changedFieldsRecursive(), ["value"]);
      assertSuperset(parent);
    });

    it("should copy an existing record passed in", () => {
      const child = Child.create({ value: "a" });
      child.value = "b";
      const parent = Parent.create({ child });

      assert.notStrictEqual(parent.child, child);
      assert.strictEqual(parent.child.value, "b");
      assert.strictEqual(getChangeTracker(parent).hasChanged(), false);

      child.value = "c";

      assert.strictEqual(parent.child.value, "b");
      assert.strictEqual(getChangeTracker(parent).hasChanged(), false);
    });

    it("should keep parents apart when they are built from one record", () => {
      const child = Child.create({ value: "a" });
      const first = Parent.create({ child, children: [child] });
      const second = Parent.create({ child, byKey: { only: child } });

      child.value = "b";

      assert.strictEqual(getChangeTracker(first).hasChanged(), false);
      assert.strictEqual(getChangeTracker(second).hasChanged(), false);

      first.children[0].value = "c";
      second.byKey.only.value = "d";
      getChangeTracker(first.children[0]).resetChanged();

      assert.strictEqual(getChangeTracker(first).hasChanged(), false);
      assertExactFields(getChangeTracker(second).changedFieldsRecursive(), ["byKey", "byKey.value"]);
    });

    it("should list fields holding nested changes without dotted paths", () => {
      const parent = Parent.create({ child: { value: "a" }, children: [{ value: "x" }] });
      const tracker = getChangeTracker(parent);

      parent.child.value = "b";
      parent.children[0].value = "y";

      assertExactFields(tracker.changedFieldsWithNested(), ["child", "children"]);

      parent.children = [];

      assertExactFields(tracker.changedFieldsWithNested(), ["child", "children"]);
      assertExactFields(tracker.changedFieldsRecursive(), ["child", "child.value", "children"]);
    });

    it("should not descend into a field that changed directly", () => {
      const parent = Parent.create({ child: { value: "a" } });
      const tracker = getChangeTracker(parent);

      parent.child = Child.create({ value: "c" });
      parent.child.value = "d";

      assertExactFields(tracker.changedFields(), ["child"]);
      assertExactFields(tracker.changedFieldsRecursive(), ["child"]);
      assertSuperset(parent);
    });

    it("should report a nested marker as a change of the field", () => {
      const parent = Parent.create({ child: { value: "a" } });

      getChangeTracker(parent.child).markChanged("audit");

      assert.strictEqual(getChangeTracker(parent).hasChanged(), true);
      assertExactFields(getChangeTracker(parent).changedFieldsRecursive(), ["child"]);
    });

    it("should follow changes across several levels", () => {
      const GrandParent = defineModel(z.object({ parent: Parent.schema, label: z.string() }));
      const root = GrandParent.create({ parent: { child: { value: "a" } }, label: "root" });

      root.parent.child.value = "b";
      root.label = "changed";

      assertExactFields(getChangeTracker(root).changedFieldsRecursive(), [
        "label",
        "parent",
        "parent.child",
        "parent.child.value",
      ]);
      assertSuperset(root);
    });

    it("should forget nested changes once the child is reset", () => {
      const parent = Parent.create({ child: { value: "a" } });

      parent.child.value = "b";
      getChangeTracker(parent).resetChanged();

      assert.strictEqual(getChangeTracker(parent).hasChanged(), true);

      getChangeTracker(parent.child).resetChanged();

      assert.strictEqual(getChangeTracker(parent).hasChanged(), false);
      assert.deepStrictEqual(getChangeTracker(parent).changedFieldsRecursive(), new Set());
    });
  });

  describe("collections of records", () => {
    it("should merge element changes of a list under the field name", () => {
      const parent = Parent.create({
        child: { value: "a" },
        children: [{ value: "x" }, { value: "y" }],
      });

      parent.children[1].value = "z";

      assertExactFields(getChangeTracker(parent).changedFieldsRecursive(), ["children", "children.value"]);
      assert.deepStrictEqual(getChangeTracker(parent).changedFields(), new Set());
    });

    it("should merge element changes of a keyed object under the field name", () => {
      const parent = Parent.create({ child: { value: "a" }, byKey: { first: { value: "m" } } });

      parent.byKey.first.value = "n";

      assertExactFields(getChangeTracker(parent).changedFieldsRecursive(), ["byKey", "byKey.value"]);
    });

    it("should merge element changes of a Map under the field name", () => {
      const parent = Parent.create({ child: { value: "a" }, byId: new Map([[1, { value: "m" }]]) });

      const element = parent.byId.get(1);
      assert.ok(element);
      element.value = "n";

      assertExactFields(getChangeTracker(parent).changedFieldsRecursive(), ["byId", "byId.value"]);
    });

    it("should not report unchanged collections", () => {
      const parent = Parent.create({ child: { value: "a" }, children: [{ value: "x" }] });

      assert.strictEqual(getChangeTracker(parent).hasChanged(), false);
      assert.deepStrictEqual(getChangeTracker(parent).changedFieldsRecursive(), new Set());
    });

    it("should treat lists of plain objects as opaque", () => {
      const Plain = defineModel(z.object({ rows: z.array(z.object({ value: z.string() })) }));
      const record = Plain.create({ rows: [{ value: "a" }] });

      record.rows[0].value = "b";

      assert.strictEqual(getChangeTracker(record).hasChanged(), false);
    });
  });
});
