import { assert, describe, test } from "@cellflex/testkit";
import { allocateByWeight, splitEvenly, unitShare } from "../engine/distribute.js";

describe("splitEvenly", () => {
  test("remainder goes to the first slots", () => {
    assert.deepEqual(splitEvenly(31, 3), [11, 10, 10]);
    assert.deepEqual(splitEvenly(7, 2), [4, 3]);
    assert.deepEqual(splitEvenly(30, 3), [10, 10, 10]);
  });

  test("zero slots and negative totals", () => {
    assert.deepEqual(splitEvenly(5, 0), []);
    assert.deepEqual(splitEvenly(-4, 2), [0, 0]);
    assert.deepEqual(splitEvenly(Number.NaN, 2), [0, 0]);
  });
});

describe("allocateByWeight", () => {
  test("floors each share and does not redistribute the loss", () => {
    assert.deepEqual(allocateByWeight(10, [1, 1, 1]), [3, 3, 3]);
    assert.deepEqual(allocateByWeight(7, [2, 1]), [4, 2]);
  });

  test("non-positive and non-finite weights get nothing", () => {
    assert.deepEqual(allocateByWeight(10, [1, -1, Number.NaN]), [10, 0, 0]);
    assert.deepEqual(allocateByWeight(10, [0, 0]), [0, 0]);
  });
});

describe("unitShare", () => {
  test("earliest units absorb the remainder", () => {
    assert.equal(unitShare(10, 3, 0), 4);
    assert.equal(unitShare(10, 3, 1), 3);
    assert.equal(unitShare(10, 3, 2), 3);
    assert.equal(unitShare(9, 3, 2), 3);
  });

  test("no units means no space", () => {
    assert.equal(unitShare(5, 0, 0), 0);
  });
});
