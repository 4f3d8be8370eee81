import type { LayoutConfig } from "../../config.js";
import type { SpacingValue } from "../spacing-scale.js";

/** Options every recipe accepts. */
export type RecipeOptions = Readonly<{
  config?: LayoutConfig;
  /** Blank cells between regions. Default 0. */
  gap?: SpacingValue;
}>;
