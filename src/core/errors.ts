import type { PackageName } from "../types/config.js";
import type { PipelineStep } from "./state-machine.js";

export type InstallerErrorCode =
  | "PRECONDITION"
  | "RESOLUTION"
  | "DEPENDENCY"
  | "BUILD"
  | "FINALIZE"
  | "VERIFICATION";

/**
 * Base class of the installer's error taxonomy.
 * Every kind aborts the run except `VerificationError`, which is reported as a warning.
 */
export class InstallerError extends Error {
  readonly code: InstallerErrorCode;
  readonly fatal: boolean;

  constructor(code: InstallerErrorCode, message: string, opts?: { cause?: unknown; fatal?: boolean }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.fatal = opts?.fatal ?? true;
  }
}

/** Privilege, OS family, tooling or configuration checks. */
export class PreconditionError extends InstallerError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("PRECONDITION", message, opts);
  }
}

/** `pkg` is null when the failure is not tied to one package's lookup. */
export class ResolutionError extends InstallerError {
  readonly pkg: PackageName | null;

  constructor(pkg: PackageName | null, message: string, opts?: { cause?: unknown }) {
    super("RESOLUTION", message, opts);
    this.pkg = pkg;
  }
}

export class DependencyError extends InstallerError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("DEPENDENCY", message, opts);
  }
}

/** Download, extract, configure, compile or install of one source package failed. */
export class BuildError extends InstallerError {
  readonly pkg: PackageName;

  constructor(pkg: PackageName, message: string, opts?: { cause?: unknown }) {
    super("BUILD", message, opts);
    this.pkg = pkg;
  }
}

export class FinalizeError extends InstallerError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("FINALIZE", message, opts);
  }
}

export class VerificationError extends InstallerError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super("VERIFICATION", message, { ...opts, fatal: false });
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Wrap an unexpected throw from a step in the error kind that step owns. */
export function errorForStep(step: PipelineStep, cause: unknown): InstallerError {
  if (cause instanceof InstallerError) return cause;

  const message = errorMessage(cause);
  switch (step) {
    case "resolve-versions":
      return new ResolutionError(null, message, { cause });
    case "install-dependencies":
      return new DependencyError(message, { cause });
    case "build-aom":
      return new BuildError("aom", message, { cause });
    case "build-libheif":
      return new BuildError("libheif", message, { cause });
    case "build-imagemagick":
      return new BuildError("imagemagick", message, { cause });
    case "finalize":
      return new FinalizeError(message, { cause });
  }
}
