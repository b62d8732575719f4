import { compare as semverCompare, parse as parseSemver, type SemVer } from "semver";
import type { ChangeType, Version } from "./types.js";

/** semver rejects identifiers with characters outside [0-9A-Za-z-]. */
function toSemVer(v: Version): SemVer | null {
  const core = `${v.major}.${v.minor}.${v.patch}`;
  if (!v.prerelease) return parseSemver(core);
  const prerelease = v.prerelease
    .replace(/[^0-9A-Za-z.-]/g, "-")
    .split(".")
    .filter(Boolean)
    .join(".");
  return parseSemver(`${core}-${prerelease}`);
}

function compareCore(a: Version, b: Version): number {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  if (a.patch !== b.patch) return a.patch < b.patch ? -1 : 1;
  return 0;
}

/**
 * Order two versions: -1 when a < b, 0 when equal, 1 when a > b.
 * A release outranks any prerelease of the same core version; null sorts
 * below everything.
 */
export function compareVersions(a: Version | null, b: Version | null): number {
  if (!a || !b) {
    if (!a && !b) return 0;
    return a ? 1 : -1;
  }

  const left = toSemVer(a);
  const right = toSemVer(b);
  if (left && right) return semverCompare(left, right);

  const core = compareCore(a, b);
  if (core !== 0) return core;
  if (a.prerelease === b.prerelease) return 0;
  if (!a.prerelease) return 1;
  if (!b.prerelease) return -1;
  return a.prerelease < b.prerelease ? -1 : 1;
}

/** True when `candidate` is newer than `current`. */
export function isNewer(current: Version, candidate: Version): boolean {
  return compareVersions(current, candidate) < 0;
}

export function getChangeType(from: Version, to: Version): ChangeType {
  const cmp = compareVersions(from, to);
  if (cmp === 0) return "none";
  if (cmp > 0) return "downgrade";
  if (from.major !== to.major) return "major";
  if (from.minor !== to.minor) return "minor";
  return "patch";
}
