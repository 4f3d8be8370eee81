import { assert, assertBlock, describe, test } from "@cellflex/testkit";
import { createLayoutConfig } from "../../config.js";
import { stripAnsi } from "../textMeasure.js";
import { Panel } from "../panel.js";

describe("Panel", () => {
  test("title sits above content inside a rounded border", () => {
    const out = new Panel({ width: 0, height: 0 }, "Title", "body", true).render();
    assertBlock(out, ["╭─────╮", "│Title│", "│body │", "╰─────╯"]);
  });

  test("padding goes inside the border", () => {
    const out = new Panel({ width: 0, height: 0, padding: 1 }, "Title", "body", true).render();
    assertBlock(out, [
      "╭───────╮",
      "│       │",
      "│ Title │",
      "│ body  │",
      "│       │",
      "╰───────╯",
    ]);
  });

  test("margin goes outside the border", () => {
    const out = new Panel({ width: 0, height: 0, margin: 1 }, "", "x", true).render();
    assertBlock(out, ["     ", " ╭─╮ ", " │x│ ", " ╰─╯ ", "     "]);
  });

  test("fixed size crops content to the inner area", () => {
    const out = new Panel({ width: 10, height: 4 }, "T", "content here", true).render();
    assertBlock(out, ["╭────────╮", "│T       │", "│content │", "╰────────╯"]);
  });

  test("no title and no border leaves the content as is", () => {
    assert.equal(new Panel({ width: 0, height: 0 }, "", "x", false).render(), "x");
  });

  test("setters chain", () => {
    const panel = new Panel({ width: 0, height: 0 }, "", "", false)
      .setTitle("A")
      .setContent("b")
      .setFocused(true);
    assert.equal(panel.isFocused, true);
    assert.equal(panel.render(), "A\nb");
  });

  test("focus switches title and border to the primary colour", () => {
    const config = createLayoutConfig({ colorLevel: 3 });
    const primary = "\x1b[38;2;255;107;53m";
    const muted = "\x1b[38;2;174;182;191m";

    const resting = new Panel({ width: 0, height: 0 }, "T", "x", true, config).render();
    assert.equal(resting.split("\n")[0]?.startsWith(muted), true);
    assert.equal(resting.includes(primary), false);

    const focused = new Panel({ width: 0, height: 0 }, "T", "x", true, config)
      .setFocused(true)
      .render();
    assert.equal(focused.split("\n")[0]?.startsWith(primary), true);
    assert.equal(focused.split("\n")[1]?.includes(`${primary}\x1b[1mT`), true);
    assert.equal(stripAnsi(focused), "╭─╮\n│T│\n│x│\n╰─╯");
  });
});
