import { mkdir, rm } from "node:fs/promises";
import { PreconditionError } from "./errors.js";

export type WorkspaceOptions = {
  /** CI mode: leave the sources in place after the run. */
  keep: boolean;
  remove?: (dir: string) => Promise<void>;
};

async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Scoped work directory: created before `fn`, deleted once after it settles,
 * whether it resolved or threw, unless `keep` is set.
 */
export async function withWorkspace<T>(dir: string, opts: WorkspaceOptions, fn: (dir: string) => Promise<T>): Promise<T> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (e: unknown) {
    throw new PreconditionError(`Could not create work directory ${dir}`, { cause: e });
  }

  try {
    return await fn(dir);
  } finally {
    if (!opts.keep) await (opts.remove ?? removeDir)(dir);
  }
}
