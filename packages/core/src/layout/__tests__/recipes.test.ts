import { assert, describe, test } from "@cellflex/testkit";
import {
  dashboardGeometry,
  dashboardLayout,
  dealSections,
  responsiveLayout,
  sidebarLayout,
} from "../recipes/index.js";

const sp = (n: number): string => " ".repeat(n);
const sixLines = "h1\nh2\nh3\nh4\nh5\nh6";

describe("dashboardGeometry", () => {
  test("a header over its maximum is clamped and main absorbs the rows", () => {
    const clamped = dashboardGeometry(20, sixLines, "f", { maxHeaderHeight: 5 });
    assert.equal(clamped.headerHeight, 5);
    assert.equal(clamped.footerHeight, 1);
    assert.equal(clamped.mainHeight, 14);
    assert.deepEqual(clamped.clamps, [
      { kind: "region-shrunk", detail: "header 6 lines clamped to max 5" },
    ]);

    const free = dashboardGeometry(20, sixLines, "f");
    assert.equal(free.headerHeight, 6);
    assert.equal(free.mainHeight, 13);
  });

  test("the header shrinks before the footer", () => {
    const g = dashboardGeometry(5, "a\nb\nc\nd", "x\ny\nz");
    assert.deepEqual([g.headerHeight, g.mainHeight, g.footerHeight], [2, 0, 3]);

    const tight = dashboardGeometry(2, "a\nb\nc\nd", "x\ny\nz");
    assert.deepEqual([tight.headerHeight, tight.mainHeight, tight.footerHeight], [0, 0, 2]);
  });

  test("minimum heights apply to short regions", () => {
    const g = dashboardGeometry(10, "", "", { minHeaderHeight: 2, minFooterHeight: 1 });
    assert.deepEqual([g.headerHeight, g.mainHeight, g.footerHeight], [2, 7, 1]);
  });

  test("gaps come off the height before the regions are sized", () => {
    const g = dashboardGeometry(10, "a\nb", "f", { gap: 2 });
    assert.deepEqual([g.headerHeight, g.mainHeight, g.footerHeight], [2, 3, 1]);
    assert.deepEqual(g.clamps, []);

    const named = dashboardGeometry(10, "a\nb", "f", { gap: "sm" });
    assert.equal(named.mainHeight, 5);
  });

  test("gaps taller than the dashboard leave every region empty", () => {
    const g = dashboardGeometry(3, "a", "b", { gap: 2 });
    assert.deepEqual([g.headerHeight, g.mainHeight, g.footerHeight], [0, 0, 0]);
    assert.deepEqual(
      g.clamps.map((c) => c.kind),
      ["available-negative", "region-shrunk", "region-shrunk"],
    );
    assert.equal(g.clamps[0]?.detail, "gaps 4 exceed dashboard height 3");
  });
});

describe("dashboardLayout", () => {
  test("stacks header, main and footer", () => {
    const lines = dashboardLayout(12, 6, "H", "main", "F").split("\n");
    assert.deepEqual(lines, [`H${sp(11)}`, `main${sp(8)}`, sp(12), sp(12), sp(12), `F${sp(11)}`]);
  });

  test("a gap separates the regions", () => {
    const lines = dashboardLayout(12, 6, "H", "main", "F", { gap: 1 }).split("\n");
    assert.deepEqual(lines, [`H${sp(11)}`, sp(12), `main${sp(8)}`, sp(12), sp(12), `F${sp(11)}`]);
  });

  test("a clamped header frees a row for main", () => {
    const lines = dashboardLayout(10, 20, sixLines, "m", "f", { maxHeaderHeight: 5 }).split("\n");
    assert.equal(lines.length, 20);
    assert.equal(lines[4], `h5${sp(8)}`);
    assert.equal(lines[5], `m${sp(9)}`);
    assert.equal(lines[18], sp(10));
    assert.equal(lines[19], `f${sp(9)}`);
  });
});

describe("sidebarLayout", () => {
  test("main and sidebar split 2:1 side by side", () => {
    const out = sidebarLayout(90, 1, "M", "S");
    assert.equal(out.length, 90);
    assert.equal(out.indexOf("S"), 60);
  });

  test("a fixed sidebar width leaves the rest to main", () => {
    const out = sidebarLayout(90, 1, "M", "S", { sidebarWidth: 20 });
    assert.equal(out.indexOf("S"), 70);
  });

  test("a gap narrows main and keeps the sidebar start", () => {
    const out = sidebarLayout(90, 1, "M".repeat(60), "S", { gap: 2 });
    assert.equal(out.length, 90);
    assert.equal(out.slice(0, 60), `${"M".repeat(58)}  `);
    assert.equal(out.indexOf("S"), 60);
  });

  test("small terminals stack the sidebar under main", () => {
    const lines = sidebarLayout(40, 6, "M", "S").split("\n");
    assert.deepEqual(lines, [`M${sp(39)}`, sp(40), sp(40), sp(40), `S${sp(39)}`, sp(40)]);
  });
});

describe("responsiveLayout", () => {
  test("sections are dealt round-robin", () => {
    assert.deepEqual(dealSections(["a", "b", "c", "d", "e"], 2), [
      ["a", "c", "e"],
      ["b", "d"],
    ]);
  });

  test("large terminals get three columns", () => {
    const lines = responsiveLayout(130, 3, ["a", "b", "c"]).split("\n");
    assert.equal(lines.length, 3);
    assert.equal(lines[0], `a${sp(43)}b${sp(42)}c${sp(42)}`);
  });

  test("a gap separates the columns", () => {
    const lines = responsiveLayout(130, 3, ["a", "b", "c"], { gap: 2 }).split("\n");
    assert.equal(lines.length, 3);
    assert.equal(lines[0], `a${sp(43)}b${sp(43)}c${sp(41)}`);
    assert.equal(lines[1], sp(130));
  });

  test("small terminals stack everything in one column", () => {
    const lines = responsiveLayout(60, 4, ["a", "b"]).split("\n");
    assert.deepEqual(lines, [`a${sp(59)}`, sp(60), `b${sp(59)}`, sp(60)]);
  });

  test("no sections renders the empty string", () => {
    assert.equal(responsiveLayout(100, 3, []), "");
  });
});
