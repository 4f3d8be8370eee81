import { assert, describe, test } from "@cellflex/testkit";
import { ClampRecorder } from "../engine/clamps.js";
import { createFlexItem, sortByOrder, toFlexSizing } from "../flexItem.js";

describe("createFlexItem", () => {
  test("defaults to no grow, shrink 1, auto basis, order 0", () => {
    const item = createFlexItem("x");
    assert.deepEqual(item, { content: "x", flexGrow: 0, flexShrink: 1, flexBasis: -1, order: 0 });
    assert.equal(Object.isFrozen(item), true);
  });

  test("alignSelf is only present when given", () => {
    assert.equal("alignSelf" in createFlexItem("x"), false);
    assert.equal(createFlexItem("x", { alignSelf: "center" }).alignSelf, "center");
  });
});

describe("toFlexSizing", () => {
  test("fractional weights are floored and reported", () => {
    const recorder = new ClampRecorder();
    const sizing = toFlexSizing(createFlexItem("x", { flexGrow: 1.5 }), 2, recorder);
    assert.deepEqual(sizing, { grow: 1, shrink: 1, basis: -1 });
    assert.deepEqual(recorder.list(), [
      { kind: "input-normalized", detail: "item 2 flexGrow=1.5 floored" },
    ]);
  });

  test("any negative basis means auto", () => {
    const sizing = toFlexSizing(createFlexItem("x", { flexBasis: -7 }), 0, new ClampRecorder());
    assert.equal(sizing.basis, -1);
  });

  test("non-finite shrink becomes zero", () => {
    const recorder = new ClampRecorder();
    const sizing = toFlexSizing(
      createFlexItem("x", { flexShrink: Number.POSITIVE_INFINITY }),
      0,
      recorder,
    );
    assert.equal(sizing.shrink, 0);
    assert.equal(recorder.list().length, 1);
  });
});

describe("sortByOrder", () => {
  test("is stable", () => {
    const items = [
      createFlexItem("b", { order: 1 }),
      createFlexItem("a", { order: 0 }),
      createFlexItem("c", { order: 1 }),
    ];
    assert.deepEqual(
      sortByOrder(items).map((it) => it.content),
      ["a", "b", "c"],
    );
  });
});
