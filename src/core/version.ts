/**
 * Structured version values. "7.1.1-29" → [7, 1, 1, 29]; a segment without
 * leading digits counts as 0. Missing trailing segments compare as 0, so
 * "1.2" equals "1.2.0".
 */
export type Version = {
  raw: string;
  segments: number[];
};

export function parseVersion(input: string): Version {
  const raw = input.trim().replace(/^v/i, "");
  const segments = raw
    .split(/[.-]/)
    .filter((part) => part.length > 0)
    .map((part) => {
      const m = /^\d+/.exec(part);
      return m ? parseInt(m[0], 10) : 0;
    });
  return { raw, segments };
}

/** Total order over versions: negative, zero or positive like `Array.prototype.sort` expects. */
export function compareVersions(a: Version | string, b: Version | string): number {
  const left = typeof a === "string" ? parseVersion(a) : a;
  const right = typeof b === "string" ? parseVersion(b) : b;
  const len = Math.max(left.segments.length, right.segments.length);

  for (let i = 0; i < len; i++) {
    const diff = (left.segments[i] ?? 0) - (right.segments[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function isNewer(candidate: Version | string, current: Version | string): boolean {
  return compareVersions(candidate, current) > 0;
}
