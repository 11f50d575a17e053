import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { FinalizeError, VerificationError } from "../errors.js";
import type { LoggedShell } from "../shell.js";

/** apt preference that keeps the distro's imagemagick packages from ever installing over the source build. */
export const PIN_FILE_CONTENT = "Package: imagemagick*\nPin: release *\nPin-Priority: -1\n";

export async function writePinFile(pinFile: string): Promise<void> {
  try {
    await mkdir(dirname(pinFile), { recursive: true });
    await writeFile(pinFile, PIN_FILE_CONTENT, "utf8");
  } catch (e: unknown) {
    throw new FinalizeError(`Unable to write ${pinFile}`, { cause: e });
  }
}

/**
 * Ask the installed `identify` for its version. Returns a VerificationError
 * instead of throwing: a mismatch does not fail the run.
 */
export async function verifyInstallation(shell: LoggedShell, expectedVersion: string): Promise<VerificationError | null> {
  const res = await shell.capture("identify", ["-version"]);
  if (res.exitCode !== 0) {
    return new VerificationError(`identify -version exited with code ${res.exitCode}`);
  }
  if (!res.stdout.includes(expectedVersion)) {
    const reported = res.stdout.split("\n")[0]?.trim() || "(no output)";
    return new VerificationError(`Installed ImageMagick does not report ${expectedVersion}: ${reported}`);
  }
  return null;
}

export type FinalizeResult = {
  verification: VerificationError | null;
};

/** Finalize step: pin the distro package away, then check the installed binary. */
export async function runFinalize(shell: LoggedShell, pinFile: string, imagemagickVersion: string): Promise<FinalizeResult> {
  await writePinFile(pinFile);
  const verification = await verifyInstallation(shell, imagemagickVersion);
  return { verification };
}
