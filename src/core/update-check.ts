import { errorMessage } from "./errors.js";
import { isNewer } from "./version.js";
import { type Fetcher, USER_AGENT, extractTag, stripTagPrefix } from "./steps/resolve-versions.js";
import type { LogSink } from "./log-sink.js";

export type UpdateNotice = {
  current: string;
  latest: string;
};

/** `version` from a registry document, else `tag_name` from a GitHub release. */
export function publishedVersion(body: unknown): string {
  const version = typeof body === "object" && body !== null ? Reflect.get(body, "version") : undefined;
  if (typeof version === "string" && version) return version;
  return stripTagPrefix(extractTag(body, "latest_release"));
}

/**
 * Compare the running installer with the latest published release.
 * Best effort: a failed lookup is noted in the log and yields null.
 */
export async function checkForUpdate(
  url: string | undefined,
  current: string,
  fetcher: Fetcher,
  log: LogSink,
): Promise<UpdateNotice | null> {
  if (!url) return null;

  try {
    const res = await fetcher(url, { headers: { Accept: "application/json", "User-Agent": USER_AGENT } });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    const latest = publishedVersion(await res.json());
    if (!latest) throw new Error("no version in response");
    return isNewer(latest, current) ? { current, latest } : null;
  } catch (e: unknown) {
    await log.note(`installer update check skipped: ${errorMessage(e)}`);
    return null;
  }
}
