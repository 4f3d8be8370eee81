import { assert, assertBlock, describe, test } from "@cellflex/testkit";
import { GridContainer } from "../gridContainer.js";

const sp = (n: number): string => " ".repeat(n);

describe("GridContainer tracks", () => {
  test("leftover cells go to the first columns and rows", () => {
    const tracks = new GridContainer(3, 3, 11, 8).computeTracks();
    assert.deepEqual(tracks.columnWidths, [4, 4, 3]);
    assert.deepEqual(tracks.rowHeights, [3, 3, 2]);
  });

  test("padding, margin and gaps come off before splitting", () => {
    const tracks = new GridContainer(2, 2, 20, 10)
      .setPadding(1)
      .setMargin(1)
      .setGap(1)
      .computeTracks();
    assert.deepEqual(tracks.columnWidths, [8, 7]);
    assert.deepEqual(tracks.rowHeights, [3, 2]);
  });
});

describe("GridContainer render", () => {
  test("cells are placed by row and column", () => {
    const out = new GridContainer(2, 3, 11, 4).setCell(0, 0, "a").setCell(1, 2, "z").render();
    assertBlock(out, [`a${sp(10)}`, sp(11), `${sp(8)}z  `, sp(11)]);
  });

  test("gaps separate columns", () => {
    const out = new GridContainer(1, 2, 9, 1)
      .setGap(1)
      .setCell(0, 0, "ab")
      .setCell(0, 1, "cd")
      .render();
    assert.equal(out, "ab   cd  ");
  });

  test("writes outside the matrix leave the output unchanged", () => {
    const grid = new GridContainer(2, 2, 10, 2).setCell(0, 1, "k");
    const before = grid.render();
    grid.setCell(2, 0, "x").setCell(0, 2, "x").setCell(-1, 0, "x").setCell(0, 0.5, "x");
    assert.equal(grid.render(), before);
    assert.equal(grid.getCell(2, 0), undefined);
    assert.equal(grid.getCell(0, 1), "k");
    const kinds = grid.renderWithReport().clamps.map((c) => c.kind);
    assert.deepEqual(kinds, ["cell-ignored", "cell-ignored", "cell-ignored", "cell-ignored"]);
  });

  test("a grid with no rows or columns renders the empty string", () => {
    assert.equal(new GridContainer(0, 3, 20, 5).render(), "");
    assert.equal(new GridContainer(2, 0, 20, 5).render(), "");
  });

  test("cell content is cropped to its track", () => {
    const out = new GridContainer(1, 2, 6, 1).setCell(0, 0, "abcdef").setCell(0, 1, "xyz").render();
    assert.equal(out, "abcxyz");
  });
});
