import { Command } from "commander";
import { INSTALLER_NAME, INSTALLER_VERSION } from "./meta.js";
import type { InstallOpts } from "./commands/install.js";

type CliOptions = {
  imagemagickVersion?: string;
  aomVersion?: string;
  libheifVersion?: string;
  travis?: boolean;
  ci?: boolean;
  config?: string;
  env?: string;
};

export function toInstallOpts(opts: CliOptions): InstallOpts {
  return {
    imagemagickVersion: opts.imagemagickVersion,
    aomVersion: opts.aomVersion,
    libheifVersion: opts.libheifVersion,
    ci: Boolean(opts.travis || opts.ci),
    configDir: opts.config,
    env: opts.env,
  };
}

/**
 * Root command. Unknown flags and stray arguments are ignored so wrappers
 * can pass through options meant for other tools.
 */
export function createProgram(onInstall: (opts: InstallOpts) => Promise<void>): Command {
  const program = new Command();

  program
    .name(INSTALLER_NAME)
    .description("Build ImageMagick 7 with aom and libheif (HEIC/AVIF) from source on Debian/Ubuntu")
    .version(INSTALLER_VERSION)
    .option("--imagemagick-version <version>", "ImageMagick version to build (default: latest release)")
    .option("--aom-version <version>", "aom version to build (default: latest tag)")
    .option("--libheif-version <version>", "libheif version to build (default: latest release)")
    .option("--travis", "CI mode: skip package index refresh and keep the work directory")
    .option("--ci", "Alias for --travis")
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config override layer, loads <config>/<name>.yaml")
    .allowUnknownOption()
    .allowExcessArguments()
    .action(async (opts: CliOptions) => {
      await onInstall(toInstallOpts(opts));
    });

  return program;
}
