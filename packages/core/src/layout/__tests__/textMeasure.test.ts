import { assert, describe, test } from "@cellflex/testkit";
import {
  countLines,
  measureLinesWidth,
  measureTextCells,
  splitLines,
  stripAnsi,
  tokenizeLine,
  truncateToCells,
  truncateWithEllipsis,
} from "../textMeasure.js";

describe("line splitting", () => {
  test("the empty string is zero lines", () => {
    assert.deepEqual(splitLines(""), []);
    assert.equal(countLines(""), 0);
  });

  test("CRLF is normalized and a trailing newline adds a line", () => {
    assert.deepEqual(splitLines("a\r\nb"), ["a", "b"]);
    assert.equal(countLines("a\nb\n"), 3);
  });
});

describe("cell measurement", () => {
  test("wide glyphs take two cells and escapes none", () => {
    assert.equal(measureTextCells("日本"), 4);
    assert.equal(measureTextCells("\x1b[31mred\x1b[39m"), 3);
    assert.equal(measureLinesWidth(["ab", "日本", ""]), 4);
  });

  test("stripAnsi removes colour sequences", () => {
    assert.equal(stripAnsi("\x1b[1mbold\x1b[22m"), "bold");
  });
});

describe("tokenizeLine", () => {
  test("interleaved tokenizers keep their own position", () => {
    const first = tokenizeLine("\x1b[1mab\x1b[22m");
    const second = tokenizeLine("\x1b[2mx\x1b[22m");
    const seenFirst: string[] = [];
    const seenSecond: string[] = [];
    let firstDone = false;
    let secondDone = false;
    while (!firstDone || !secondDone) {
      if (!firstDone) {
        const r = first.next();
        if (r.done === true) firstDone = true;
        else seenFirst.push(r.value.text);
      }
      if (!secondDone) {
        const r = second.next();
        if (r.done === true) secondDone = true;
        else seenSecond.push(r.value.text);
      }
    }
    assert.deepEqual(seenFirst, ["\x1b[1m", "a", "b", "\x1b[22m"]);
    assert.deepEqual(seenSecond, ["\x1b[2m", "x", "\x1b[22m"]);
  });

  test("stripAnsi between steps does not disturb a running tokenizer", () => {
    const tokens = tokenizeLine("\x1b[31mr\x1b[39m");
    const seen: string[] = [];
    for (const token of tokens) {
      seen.push(token.kind);
      stripAnsi("\x1b[1mnoise\x1b[22m");
    }
    assert.deepEqual(seen, ["escape", "grapheme", "escape"]);
  });
});

describe("truncateToCells", () => {
  test("a wide glyph cut in half becomes a space", () => {
    assert.equal(truncateToCells("日本語", 3), "日 ");
  });

  test("styled text keeps its escapes and gets a reset", () => {
    assert.equal(truncateToCells("\x1b[31mred text\x1b[39m", 3), "\x1b[31mred\x1b[0m");
  });

  test("text that fits is returned as is", () => {
    assert.equal(truncateToCells("abc", 5), "abc");
  });

  test("ellipsis variant", () => {
    assert.equal(truncateWithEllipsis("abcdef", 4), "abc…");
    assert.equal(truncateWithEllipsis("abcdef", 1), "…");
  });
});
