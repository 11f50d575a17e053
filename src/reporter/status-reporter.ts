import { Chalk, type ChalkInstance } from "chalk";
import { STEP_LABELS, type PipelineStep } from "../core/state-machine.js";
import { SLOW_CORE_THRESHOLD, type HostInfo } from "../core/host.js";
import type { InstallerError, VerificationError } from "../core/errors.js";
import type { PipelineObserver } from "../core/pipeline.js";
import type { UpdateNotice } from "../core/update-check.js";
import type { ResolvedVersions } from "../types/config.js";

export const LABEL_WIDTH = 37;

const VERIFY_LABEL = "Verifying ImageMagick installation";

export type StatusReporterOptions = {
  logFile: string;
  write?: (chunk: string) => void;
  /** Defaults to chalk's own terminal detection. */
  color?: boolean;
};

/**
 * Terminal output: one status line per step, `[..]` while running and
 * overwritten in place with `[OK]` or `[FAILURE]`.
 */
export class StatusReporter implements PipelineObserver {
  private readonly write: (chunk: string) => void;
  private readonly c: ChalkInstance;
  private readonly logFile: string;

  constructor(opts: StatusReporterOptions) {
    this.logFile = opts.logFile;
    this.write = opts.write ?? ((chunk) => process.stdout.write(chunk));
    this.c = opts.color === undefined ? new Chalk() : new Chalk({ level: opts.color ? 1 : 0 });
  }

  banner(version: string, host: HostInfo, update: UpdateNotice | null): void {
    const rule = "#".repeat(43);
    this.write(` ${rule}\n Welcome to the ImageMagick installer ${version}\n ${rule}\n\n`);

    if (update) {
      this.write(` ${this.c.yellow(`A newer installer version (${update.latest}) is available!`)}\n\n`);
    }

    const slow = host.cores < SLOW_CORE_THRESHOLD ? ` ${this.c.yellow("(Slow compilation)")}` : "";
    this.write(` Detected OS    : ${host.distro}\n`);
    this.write(` Detected Arch  : ${host.arch}\n`);
    this.write(` Detected Cores : ${host.cores}${slow}\n\n`);

    const header = "#".repeat(21);
    this.write(` ${header}\n Installation Process\n ${header}\n\n`);
  }

  versions(versions: ResolvedVersions): void {
    this.write(`   ImageMagick : ${versions.imagemagick}\n`);
    this.write(`   aom         : ${versions.aom}\n`);
    this.write(`   libheif     : ${versions.libheif}\n`);
  }

  stepStarted(step: PipelineStep): void {
    this.write(`${this.statusLine(STEP_LABELS[step], "..")}\r`);
  }

  stepSucceeded(step: PipelineStep): void {
    this.write(`${this.statusLine(STEP_LABELS[step], this.c.green("OK"))}\n`);
  }

  stepFailed(step: PipelineStep, error: InstallerError): void {
    this.write(`${this.statusLine(STEP_LABELS[step], this.c.red("FAILURE"))}\n`);
    this.fatal(error);
  }

  /** A fatal error once the log file exists: message plus a pointer to the log. */
  fatal(error: InstallerError): void {
    this.write(` ${this.c.red(error.message)}\n`);
    this.pointToLog();
  }

  verification(warning: VerificationError | null): void {
    if (warning) {
      this.write(`${this.statusLine(VERIFY_LABEL, this.c.red("FAILURE"))}\n`);
      this.write(` ${this.c.yellow(warning.message)}\n`);
      this.pointToLog();
      return;
    }

    this.write(`${this.statusLine(VERIFY_LABEL, this.c.green("OK"))}\n`);
    this.write(`\n ${this.c.green("ImageMagick was compiled successfully!")}\n`);
    this.write(`\n Installation log : ${this.logFile}\n\n`);
  }

  /** Failures that happen before the log file exists. */
  error(message: string): void {
    this.write(`${this.c.red(`Error: ${message}`)}\n`);
  }

  private statusLine(label: string, state: string): string {
    return ` ${label.padEnd(LABEL_WIDTH)}[${state}]`;
  }

  private pointToLog(): void {
    this.write(`\n ${this.c.cyan(`Please check ${this.logFile} for details.`)}\n\n`);
  }
}
