import fs from "node:fs/promises";
import { DependencyError } from "../errors.js";
import { type LoggedShell, formatCommand } from "../shell.js";

export type InstallDepsOptions = {
  ci: boolean;
  aptSources: string;
  buildPackages: string[];
};

export type InstallDepsResult = {
  removedPackagedImageMagick: boolean;
  sourcesEnabled: boolean;
};

/**
 * Uncomment `# deb-src ` lines so `apt build-dep` can see source packages.
 * Returns whether the file changed; a missing file is left alone.
 */
export async function enableSourceRepositories(sourcesPath: string): Promise<boolean> {
  let content: string;
  try {
    content = await fs.readFile(sourcesPath, "utf8");
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return false;
    throw e;
  }

  const updated = content.replace(/^# deb-src /gm, "deb-src ");
  if (updated === content) return false;

  await fs.writeFile(sourcesPath, updated, "utf8");
  return true;
}

async function mustSucceed(shell: LoggedShell, command: string, args: string[]): Promise<void> {
  const exitCode = await shell.run(command, args);
  if (exitCode !== 0) {
    throw new DependencyError(`${formatCommand({ command, args })} exited with code ${exitCode}`);
  }
}

/**
 * Install-dependencies step: drop a packaged ImageMagick, refresh the index,
 * enable source repositories and pull the build dependencies.
 * CI mode skips the removal and the index refresh.
 */
export async function runInstallDeps(shell: LoggedShell, opts: InstallDepsOptions): Promise<InstallDepsResult> {
  let removedPackagedImageMagick = false;

  if (!opts.ci) {
    if ((await shell.run("dpkg", ["-s", "imagemagick"])) === 0) {
      await mustSucceed(shell, "apt-get", ["remove", "imagemagick", "--autoremove", "--purge", "-y"]);
      removedPackagedImageMagick = true;
    }

    await mustSucceed(shell, "apt-get", ["update", "-qq"]);
  }

  let sourcesEnabled: boolean;
  try {
    sourcesEnabled = await enableSourceRepositories(opts.aptSources);
  } catch (e: unknown) {
    throw new DependencyError(`Unable to enable source repositories in ${opts.aptSources}`, { cause: e });
  }

  await mustSucceed(shell, "apt", ["build-dep", "-qq", "-y", "imagemagick"]);
  await mustSucceed(shell, "apt-get", [
    "-o",
    "Dpkg::Options::=--force-confmiss",
    "-o",
    "Dpkg::Options::=--force-confold",
    "-y",
    "install",
    ...opts.buildPackages,
  ]);

  return { removedPackagedImageMagick, sourcesEnabled };
}
