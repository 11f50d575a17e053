import { PreconditionError } from "./errors.js";
import type { CommandRunner } from "./shell.js";

/** Tools whose Debian package name differs from the binary. */
const TOOL_PACKAGES: Record<string, string> = {
  lsb_release: "lsb-release",
};

export type PreconditionOptions = {
  requiredTools: string[];
  getuid?: () => number;
};

function currentUid(): number {
  return typeof process.getuid === "function" ? process.getuid() : -1;
}

export function packageForTool(tool: string): string {
  return TOOL_PACKAGES[tool] ?? tool;
}

export function assertRoot(getuid: () => number = currentUid): void {
  if (getuid() !== 0) {
    throw new PreconditionError("You must be root or use sudo to run this script");
  }
}

/**
 * Host checks, in order: root, apt-get, lsb_release, then the required tools.
 * Missing tools are installed quietly; nothing is logged since the log
 * file does not exist yet.
 */
export async function checkPreconditions(runner: CommandRunner, opts: PreconditionOptions): Promise<void> {
  assertRoot(opts.getuid);

  if (!(await runner.exists("apt-get"))) {
    throw new PreconditionError("This installer cannot run on any other system than Debian or Ubuntu");
  }

  for (const tool of ["lsb_release", ...opts.requiredTools]) {
    if (await runner.exists(tool)) continue;

    const pkg = packageForTool(tool);
    const res = await runner.run({
      command: "apt-get",
      args: ["install", "-qq", "-y", pkg],
      env: { ...process.env, DEBIAN_FRONTEND: "noninteractive" },
    });
    if (res.exitCode !== 0) {
      throw new PreconditionError(`Unable to install required package ${pkg}`);
    }
  }
}
