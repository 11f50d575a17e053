import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { INSTALLER_NAME, INSTALLER_VERSION } from "../meta.js";
import {
  InstallerError,
  PreconditionError,
  ResolutionError,
  VerificationError,
  errorMessage,
} from "../core/errors.js";
import { detectCores, detectHost, makeFlags } from "../core/host.js";
import { LogSink } from "../core/log-sink.js";
import { Pipeline, type PipelineObserver, type PipelineResult, type StepRunner } from "../core/pipeline.js";
import { assertRoot, checkPreconditions } from "../core/preconditions.js";
import { type CommandRunner, ExecFileRunner, LoggedShell } from "../core/shell.js";
import { checkForUpdate } from "../core/update-check.js";
import { withWorkspace } from "../core/workspace.js";
import { runBuild } from "../core/steps/build-source.js";
import { runFinalize } from "../core/steps/finalize.js";
import { runInstallDeps } from "../core/steps/install-deps.js";
import { type Fetcher, type VersionOverrides, assertResolved, resolveVersions } from "../core/steps/resolve-versions.js";
import { StatusReporter } from "../reporter/status-reporter.js";
import { EXIT } from "./exit-codes.js";
import type { BuildEnv, InstallConfig, InstallerConfig, PackageName, ResolvedVersions } from "../types/config.js";

export type InstallOpts = {
  imagemagickVersion?: string;
  aomVersion?: string;
  libheifVersion?: string;
  /** CI mode: no package index refresh, no packaged-ImageMagick removal, workspace kept. */
  ci?: boolean;
  configDir?: string;
  env?: string;
};

/** Seams for tests; production uses the real process, network and terminal. */
export type InstallDeps = {
  runner?: CommandRunner;
  fetcher?: Fetcher;
  getuid?: () => number;
  cores?: number;
  processEnv?: NodeJS.ProcessEnv;
  write?: (chunk: string) => void;
  color?: boolean;
};

export type InstallResult =
  | {
      ok: true;
      exitCode: typeof EXIT.SUCCESS;
      verified: boolean;
      versions: ResolvedVersions;
      logFile: string;
      pipeline: PipelineResult;
    }
  | {
      ok: false;
      exitCode: typeof EXIT.FAILURE;
      error: InstallerError;
      logFile?: string;
      pipeline?: PipelineResult;
    };

function loadInstallerConfig(opts: InstallOpts, env: NodeJS.ProcessEnv): InstallerConfig {
  let raw: unknown;
  try {
    raw = loadConfig(opts.env, opts.configDir, env);
  } catch (e: unknown) {
    throw new PreconditionError(`Unable to read configuration: ${errorMessage(e)}`, { cause: e });
  }

  const res = validateConfig(raw);
  if (!res.valid) {
    throw new PreconditionError(`Invalid configuration: ${res.errors}`);
  }
  return res.config;
}

function asInstallerError(e: unknown): InstallerError {
  return e instanceof InstallerError ? e : new PreconditionError(errorMessage(e), { cause: e });
}

/**
 * Install ImageMagick 7 with aom and libheif from source.
 *
 * Preconditions run before the log file, the workspace or any network call
 * exist; everything after that goes through the pipeline and its reporter.
 */
export async function install(opts: InstallOpts, deps: InstallDeps = {}): Promise<InstallResult> {
  const runner = deps.runner ?? new ExecFileRunner();
  const fetcher = deps.fetcher ?? fetch;
  const processEnv = deps.processEnv ?? process.env;
  const ci = opts.ci ?? false;

  let config: InstallerConfig;
  try {
    assertRoot(deps.getuid);
    config = loadInstallerConfig(opts, processEnv);
    await checkPreconditions(runner, { requiredTools: config.required_tools, getuid: deps.getuid });
  } catch (e: unknown) {
    const error = asInstallerError(e);
    new StatusReporter({ logFile: "", write: deps.write, color: deps.color }).error(error.message);
    return { ok: false, exitCode: EXIT.FAILURE, error };
  }

  const logFile = config.log_file;
  const log = new LogSink(logFile);
  const reporter = new StatusReporter({ logFile, write: deps.write, color: deps.color });

  try {
    await log.truncate();
  } catch (e: unknown) {
    const error = new PreconditionError(`Unable to create log file ${logFile}`, { cause: e });
    reporter.error(error.message);
    return { ok: false, exitCode: EXIT.FAILURE, error };
  }

  const cores = deps.cores ?? detectCores();
  const host = await detectHost(runner, cores);
  const update = await checkForUpdate(config.installer_update_url, INSTALLER_VERSION, fetcher, log);
  reporter.banner(INSTALLER_VERSION, host, update);
  await log.note(`${INSTALLER_NAME} ${INSTALLER_VERSION} on ${host.distro} (${host.arch}, ${cores} cores)${ci ? ", CI mode" : ""}`);

  const env: BuildEnv = { DEBIAN_FRONTEND: "noninteractive", MAKEFLAGS: makeFlags(cores) };
  const shell = new LoggedShell(runner, log, env);
  const overrides: VersionOverrides = {
    imagemagick: opts.imagemagickVersion,
    aom: opts.aomVersion,
    libheif: opts.libheifVersion,
  };

  // Filled by the resolve-versions step, read by every later one.
  const run: { config: InstallConfig | null } = { config: null };

  const requireConfig = (): InstallConfig => {
    if (!run.config) throw new ResolutionError(null, "Versions were not resolved");
    return run.config;
  };

  const observer: PipelineObserver = {
    stepStarted: (step) => reporter.stepStarted(step),
    stepSucceeded: (step) => {
      reporter.stepSucceeded(step);
      if (step === "resolve-versions" && run.config) reporter.versions(run.config.versions);
    },
    stepFailed: (step, error) => reporter.stepFailed(step, error),
  };

  let pipeline: PipelineResult;
  try {
    pipeline = await withWorkspace(config.work_dir, { keep: ci }, async (workDir) => {
      const build = async (pkg: PackageName) => {
        const current = requireConfig();
        await runBuild(shell, pkg, current.versions[pkg], config.packages[pkg], current.workDir);
        return { ok: true } as const;
      };

      const stepRunner: StepRunner = async (step) => {
        switch (step) {
          case "resolve-versions": {
            const versions = assertResolved(
              await resolveVersions(overrides, config.packages, fetcher, processEnv.GITHUB_TOKEN),
            );
            run.config = Object.freeze({
              versions: Object.freeze({ ...versions }),
              ci,
              workDir,
              logFile,
              pinFile: config.pin_file,
              cores,
              env: Object.freeze({ ...env }),
            });
            await log.note(`versions: ImageMagick ${versions.imagemagick}, aom ${versions.aom}, libheif ${versions.libheif}`);
            return { ok: true };
          }
          case "install-dependencies":
            await runInstallDeps(shell, {
              ci,
              aptSources: config.apt_sources,
              buildPackages: config.build_packages,
            });
            return { ok: true };
          case "build-aom":
            return build("aom");
          case "build-libheif":
            return build("libheif");
          case "build-imagemagick":
            return build("imagemagick");
          case "finalize": {
            const current = requireConfig();
            const { verification } = await runFinalize(shell, current.pinFile, current.versions.imagemagick);
            return { ok: true, warnings: verification ? [verification] : [] };
          }
        }
      };

      return new Pipeline(stepRunner, observer).run();
    });
  } catch (e: unknown) {
    const error = asInstallerError(e);
    await log.note(`aborted: ${error.message}`);
    reporter.fatal(error);
    return { ok: false, exitCode: EXIT.FAILURE, error, logFile };
  }

  if (pipeline.failure) {
    const { step, error } = pipeline.failure;
    await log.note(`${step} failed: ${error.message}`);
    return { ok: false, exitCode: EXIT.FAILURE, error, logFile, pipeline };
  }

  const warning = pipeline.warnings.find((w): w is VerificationError => w instanceof VerificationError) ?? null;
  if (warning) await log.note(`verification failed: ${warning.message}`);
  reporter.verification(warning);

  return {
    ok: true,
    exitCode: EXIT.SUCCESS,
    verified: warning === null,
    versions: requireConfig().versions,
    logFile,
    pipeline,
  };
}
