// ── Pipeline stages ─────────────────────────────────────────────────────────
// Order in which `--process all` runs them.

export const STAGES = ["natives", "images", "text", "letters", "translate", "summary"] as const;
export type Stage = (typeof STAGES)[number];

export function isStage(value: string): value is Stage {
  return STAGES.some((s) => s === value);
}

/**
 * Whether a run must have ANTHROPIC_API_KEY. Every stage calls the model,
 * except letters when it replays a saved grouping without OCR.
 */
export function needsModel(
  stages: readonly Stage[],
  options: { reuseGrouping?: boolean; runOcr?: boolean } = {},
): boolean {
  return stages.some((s) => !(s === "letters" && options.reuseGrouping && !options.runOcr));
}
