import os from "node:os";
import type { CommandRunner } from "./shell.js";

export type HostInfo = {
  distro: string;
  arch: string;
  cores: number;
};

/** Below this many cores the banner warns about slow compilation. */
export const SLOW_CORE_THRESHOLD = 4;

export function detectCores(): number {
  return Math.max(1, os.availableParallelism());
}

/** `make` runs one job more than there are cores and holds the load average at the core count. */
export function makeFlags(cores: number): string {
  return `-j${cores + 1} -l${cores}`;
}

export async function detectHost(runner: CommandRunner, cores: number = detectCores()): Promise<HostInfo> {
  const res = await runner.run({ command: "lsb_release", args: ["-ds"] });
  const distro = res.exitCode === 0 && res.stdout.trim() ? res.stdout.trim().replace(/^"|"$/g, "") : "unknown";
  return { distro, arch: os.machine(), cores };
}
