import { type PipelineStep, type PipelineStatus, isStep, isTerminal, nextState } from "./state-machine.js";
import { type InstallerError, errorForStep } from "./errors.js";

export type StepOutcome =
  | { ok: true; warnings?: InstallerError[] }
  | { ok: false; error: InstallerError };

export type StepRunner = (step: PipelineStep) => Promise<StepOutcome>;

export type StepRecord = {
  status: "success" | "failed";
  duration_ms: number;
  error?: string;
  warnings?: string[];
};

export type PipelineResult = {
  success: boolean;
  final_status: PipelineStatus;
  step_results: Partial<Record<PipelineStep, StepRecord>>;
  warnings: InstallerError[];
  failure?: { step: PipelineStep; error: InstallerError };
};

/** Receives step transitions as they happen; the terminal reporter is the main implementation. */
export interface PipelineObserver {
  stepStarted(step: PipelineStep): void;
  stepSucceeded(step: PipelineStep, warnings: InstallerError[]): void;
  stepFailed(step: PipelineStep, error: InstallerError): void;
}

/**
 * Drives the install steps through the state machine.
 *
 * Each step runs exactly once, in order. The first failure moves the
 * pipeline into its `failed_<step>` state and nothing after it runs.
 */
export class Pipeline {
  private readonly stepRunner: StepRunner;
  private readonly observer?: PipelineObserver;

  constructor(stepRunner: StepRunner, observer?: PipelineObserver) {
    this.stepRunner = stepRunner;
    this.observer = observer;
  }

  async run(): Promise<PipelineResult> {
    const result: PipelineResult = {
      success: false,
      final_status: nextState("init", "success"),
      step_results: {},
      warnings: [],
    };

    let status = result.final_status;
    while (!isTerminal(status) && isStep(status)) {
      const step = status;
      this.observer?.stepStarted(step);
      const stepStart = Date.now();

      let outcome: StepOutcome;
      try {
        outcome = await this.stepRunner(step);
      } catch (e: unknown) {
        outcome = { ok: false, error: errorForStep(step, e) };
      }

      const duration_ms = Date.now() - stepStart;

      if (outcome.ok) {
        const warnings = outcome.warnings ?? [];
        result.step_results[step] = {
          status: "success",
          duration_ms,
          ...(warnings.length > 0 ? { warnings: warnings.map((w) => w.message) } : {}),
        };
        result.warnings.push(...warnings);
        this.observer?.stepSucceeded(step, warnings);
        status = nextState(step, "success");
      } else {
        result.step_results[step] = { status: "failed", duration_ms, error: outcome.error.message };
        result.failure = { step, error: outcome.error };
        this.observer?.stepFailed(step, outcome.error);
        status = nextState(step, "failure");
      }
    }

    result.final_status = status;
    result.success = status === "done";
    return result;
  }
}
