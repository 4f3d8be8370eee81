import type { LayoutClamp } from "./layout/engine/clamps.js";

export type LayoutWarnContext = Readonly<{
  devMode: boolean;
  warnedLayoutIssues: Set<string>;
  warn: (message: string) => void;
}>;

export function warnLayoutIssue(ctx: LayoutWarnContext, key: string, detail: string): void {
  if (!ctx.devMode) return;
  if (ctx.warnedLayoutIssues.has(key)) return;
  ctx.warnedLayoutIssues.add(key);
  ctx.warn(`[cellflex][layout] ${detail}`);
}

/**
 * Report every clamp of one render pass. `owner` names the container
 * ("flex:row", "grid:2x3", ...) so repeated renders of the same container do
 * not repeat the same warning.
 */
export function emitClampWarnings(
  ctx: LayoutWarnContext,
  owner: string,
  clamps: readonly LayoutClamp[],
): void {
  if (!ctx.devMode) return;
  for (const clamp of clamps) {
    warnLayoutIssue(ctx, `${owner}:${clamp.kind}:${clamp.detail}`, `${owner}: ${clamp.detail}`);
  }
}
