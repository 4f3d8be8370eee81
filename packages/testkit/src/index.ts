export { createRng, type Rng } from "./rng.js";
export { assertBlock, stripAnsi, visibleLines } from "./blocks.js";
export { assert, describe, test } from "./nodeTest.js";
