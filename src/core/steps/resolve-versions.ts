import { ResolutionError, errorMessage } from "../errors.js";
import {
  PACKAGE_NAMES,
  type PackageName,
  type ResolvedVersions,
  type SourcePackageConfig,
} from "../../types/config.js";

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export type VersionOverrides = Partial<Record<PackageName, string>>;

export const USER_AGENT = "imagemagick7-installer";

export function stripTagPrefix(tag: string): string {
  return tag.trim().replace(/^v/, "");
}

function githubHeaders(token: string | undefined): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": USER_AGENT,
  };
  if (token) headers.Authorization = `Bearer ${token}`;
  return headers;
}

function readStringField(value: unknown, field: string): string {
  if (typeof value !== "object" || value === null || !(field in value)) return "";
  const raw: unknown = Reflect.get(value, field);
  return typeof raw === "string" ? raw : "";
}

/** Pull the tag out of a release or tag-list document. Empty when absent. */
export function extractTag(body: unknown, kind: SourcePackageConfig["release_kind"]): string {
  if (kind === "tags") {
    return Array.isArray(body) && body.length > 0 ? readStringField(body[0], "name") : "";
  }
  return readStringField(body, "tag_name");
}

/** Query the release endpoint of one package and return its latest version. */
export async function fetchLatestVersion(
  pkg: PackageName,
  source: SourcePackageConfig,
  fetcher: Fetcher,
  token?: string,
): Promise<string> {
  let body: unknown;
  try {
    const res = await fetcher(source.release_api, { headers: githubHeaders(token) });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
    }
    body = await res.json();
  } catch (e: unknown) {
    throw new ResolutionError(pkg, `Unable to determine version number for ${pkg}: ${errorMessage(e)}`, { cause: e });
  }

  const version = stripTagPrefix(extractTag(body, source.release_kind));
  if (!version) {
    throw new ResolutionError(pkg, `Unable to determine version number for ${pkg}`);
  }
  return version;
}

/**
 * Resolve all three versions. Explicit values win and their lookup is never made.
 */
export async function resolveVersions(
  overrides: VersionOverrides,
  packages: Record<PackageName, SourcePackageConfig>,
  fetcher: Fetcher,
  token: string | undefined,
): Promise<ResolvedVersions> {
  const resolved: ResolvedVersions = { aom: "", libheif: "", imagemagick: "" };

  for (const pkg of PACKAGE_NAMES) {
    const explicit = overrides[pkg]?.trim();
    resolved[pkg] = explicit ? explicit : await fetchLatestVersion(pkg, packages[pkg], fetcher, token);
  }

  return resolved;
}

/** Invariant guard for the build steps: every version must be non-empty. */
export function assertResolved(versions: ResolvedVersions | null): ResolvedVersions {
  if (!versions) throw new ResolutionError(null, "Versions were not resolved");
  for (const pkg of PACKAGE_NAMES) {
    if (!versions[pkg]) {
      throw new ResolutionError(pkg, `Unable to determine version number for ${pkg}`);
    }
  }
  return versions;
}
