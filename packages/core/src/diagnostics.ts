/**
 * packages/core/src/diagnostics.ts — Dev-mode layout warnings.
 *
 * Why: Layout never fails, so the only signal that a fallback kicked in
 * (placeholder image, abandoned float drop, non-converged inline pass) is a
 * warning. Warnings are deduplicated by key per layout call and silent outside
 * dev mode.
 */

export type WarnFn = (message: string) => void;

export type LayoutDiagnostics = Readonly<{
  devMode: boolean;
  warnedLayoutIssues: Set<string>;
  warn: WarnFn;
}>;

export function createLayoutDiagnostics(devMode: boolean, warn: WarnFn): LayoutDiagnostics {
  return { devMode, warnedLayoutIssues: new Set<string>(), warn };
}

export function warnLayoutIssue(ctx: LayoutDiagnostics, key: string, detail: string): void {
  if (!ctx.devMode) return;
  if (ctx.warnedLayoutIssues.has(key)) return;
  ctx.warnedLayoutIssues.add(key);
  ctx.warn(`[boxflow][layout] ${detail}`);
}

/** Default sink. */
export function consoleWarn(message: string): void {
  globalThis.console.warn(message);
}

/** Dev mode unless NODE_ENV is "production". */
export function defaultDevMode(): boolean {
  return process.env["NODE_ENV"] !== "production";
}
