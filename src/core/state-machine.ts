/**
 * All pipeline steps in execution order.
 */
export const ALL_STEPS = [
  "resolve-versions",
  "install-dependencies",
  "build-aom",
  "build-libheif",
  "build-imagemagick",
  "finalize",
] as const;

export type PipelineStep = (typeof ALL_STEPS)[number];

/**
 * Initial, running and terminal states. `failed_*` absorbs every error.
 */
export type PipelineStatus = "init" | PipelineStep | "done" | `failed_${PipelineStep}`;

export type TransitionEvent = "success" | "failure";

/** Status line label shown while a step runs. */
export const STEP_LABELS: Record<PipelineStep, string> = {
  "resolve-versions": "Resolving versions",
  "install-dependencies": "Installing dependencies",
  "build-aom": "Building aom",
  "build-libheif": "Building libheif",
  "build-imagemagick": "Building ImageMagick",
  finalize: "Performing final steps",
};

export function isStep(status: PipelineStatus): status is PipelineStep {
  return (ALL_STEPS as readonly string[]).includes(status);
}

export function isTerminal(status: PipelineStatus): boolean {
  return status === "done" || status.startsWith("failed_");
}

/**
 * Pure function: given current state + event, return next state.
 */
export function nextState(current: "init" | PipelineStep, event: TransitionEvent): PipelineStatus {
  if (current === "init") return ALL_STEPS[0];
  if (event === "failure") return `failed_${current}`;

  const idx = ALL_STEPS.indexOf(current);
  if (idx >= ALL_STEPS.length - 1) return "done";
  return ALL_STEPS[idx + 1];
}
