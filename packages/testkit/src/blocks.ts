import { strict as assert } from "node:assert";

// biome-ignore lint/suspicious/noControlCharactersInRegex: SGR sequences start with ESC
const SGR_RE = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(SGR_RE, "");
}

/** Lines of a rendered block with spaces shown as "·" so padding is visible. */
export function visibleLines(block: string): string[] {
  if (block.length === 0) return [];
  return stripAnsi(block)
    .split("\n")
    .map((line) => line.replace(/ /g, "·"));
}

/**
 * Compare a rendered block with the expected lines. On mismatch the message
 * shows both sides with visible spaces.
 */
export function assertBlock(actual: string, expected: readonly string[], message?: string): void {
  const got = visibleLines(actual);
  const want = expected.map((line) => line.replace(/ /g, "·"));
  assert.deepEqual(
    got,
    want,
    message ?? `block mismatch\n--- expected\n${want.join("\n")}\n--- actual\n${got.join("\n")}`,
  );
}
