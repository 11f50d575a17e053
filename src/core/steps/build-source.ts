import path from "node:path";
import { BuildError } from "../errors.js";
import { type LoggedShell, formatCommand } from "../shell.js";
import type { PackageName, SourcePackageConfig } from "../../types/config.js";

export type BuildCommand = {
  command: string;
  args: string[];
  cwd: string;
};

export type BuildResult = {
  pkg: PackageName;
  version: string;
  sourceDir: string;
  commands: number;
};

export function fillTemplate(template: string, version: string): string {
  return template.replaceAll("{version}", version);
}

/**
 * Expand a package recipe into its command sequence:
 * download → extract → configure → make → make install → ldconfig.
 */
export function planBuild(pkg: PackageName, version: string, source: SourcePackageConfig, workDir: string): BuildCommand[] {
  const url = fillTemplate(source.download_url, version);
  const archive = fillTemplate(source.archive, version);
  const sourceDir = path.join(workDir, fillTemplate(source.source_dir, version));

  const commands: BuildCommand[] = [
    { command: "wget", args: ["-qc", url, "-O", archive], cwd: workDir },
    { command: "tar", args: ["-xf", archive], cwd: workDir },
  ];

  let buildDir: string;
  if (source.build_system === "cmake") {
    buildDir = path.join(workDir, `build_${pkg}`);
    commands.push(
      { command: "mkdir", args: ["-p", buildDir], cwd: workDir },
      { command: "cmake", args: [sourceDir, ...source.configure_flags], cwd: buildDir },
    );
  } else {
    buildDir = sourceDir;
    commands.push({ command: "./configure", args: [...source.configure_flags], cwd: buildDir });
  }

  commands.push(
    { command: "make", args: [], cwd: buildDir },
    { command: "make", args: ["install"], cwd: buildDir },
    { command: "ldconfig", args: [], cwd: workDir },
  );

  return commands;
}

/**
 * Build step for one source package. Stops at the first failing command;
 * whatever was downloaded or built stays in the work directory.
 */
export async function runBuild(
  shell: LoggedShell,
  pkg: PackageName,
  version: string,
  source: SourcePackageConfig,
  workDir: string,
): Promise<BuildResult> {
  if (!version) {
    throw new BuildError(pkg, `No version set for ${pkg}`);
  }

  const plan = planBuild(pkg, version, source, workDir);
  for (const step of plan) {
    const exitCode = await shell.run(step.command, step.args, { cwd: step.cwd });
    if (exitCode !== 0) {
      throw new BuildError(pkg, `Building ${pkg} failed: ${formatCommand(step)} exited with code ${exitCode}`);
    }
  }

  return {
    pkg,
    version,
    sourceDir: path.join(workDir, fillTemplate(source.source_dir, version)),
    commands: plan.length,
  };
}
