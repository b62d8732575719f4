import { logger } from "../config/logger.js";
import type { TagDigests } from "../registry/types.js";
import { compareVersions } from "../version/comparator.js";
import { parseImageTag, parseTag } from "../version/parser.js";
import type { Version } from "../version/types.js";
import { TAG_REGEX_LABEL, VERSION_MAX_LABEL, VERSION_MIN_LABEL, VERSION_PIN_MINOR_LABEL } from "./labels.js";

/** Tags that move between images and say nothing about the version. */
export const MUTABLE_TAGS = new Set(["latest", "stable", "main"]);

const UNVERSIONED_TAGS = new Set(["latest", "stable", "main", "develop"]);

function tagVersion(tag: string): Version | null {
  const info = parseImageTag(`image:${tag}`);
  return info.isVersioned ? info.version : null;
}

/** Keep tags matching `pattern`. An invalid pattern filters nothing. */
export function filterTagsByRegex(tags: readonly string[], pattern: string): string[] {
  if (!pattern) return [...tags];
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (err) {
    logger.warn("Ignoring invalid tag regex", { pattern, error: err instanceof Error ? err.message : String(err) });
    return [...tags];
  }
  return tags.filter((tag) => re.test(tag));
}

/**
 * Newest tag that is a version with the same variant suffix as the current
 * one, honouring the tag-regex, version-min, version-max and
 * version-pin-minor labels. Prereleases are skipped while the current version
 * is stable. "" when nothing qualifies.
 */
export function findLatestVersion(
  tags: readonly string[],
  requiredSuffix: string,
  currentVersion: Version | null,
  labels: Readonly<Record<string, string>>,
): string {
  const candidates = filterTagsByRegex(tags, labels[TAG_REGEX_LABEL] ?? "");
  const isCurrentStable = currentVersion !== null && currentVersion.prerelease === "";
  const minVersion = labels[VERSION_MIN_LABEL] ? parseTag(labels[VERSION_MIN_LABEL]) : null;
  const maxVersion = labels[VERSION_MAX_LABEL] ? parseTag(labels[VERSION_MAX_LABEL]) : null;
  const pinMinor = labels[VERSION_PIN_MINOR_LABEL] === "true";

  let best: { tag: string; version: Version } | null = null;
  for (const tag of candidates) {
    if (UNVERSIONED_TAGS.has(tag)) continue;
    const info = parseImageTag(`image:${tag}`);
    const version = info.isVersioned ? info.version : null;
    if (!version) continue;
    if (info.suffix !== requiredSuffix) continue;
    if (isCurrentStable && version.prerelease !== "") continue;
    if (pinMinor && currentVersion) {
      if (version.major !== currentVersion.major || version.minor !== currentVersion.minor) continue;
    }
    if (minVersion && compareVersions(version, minVersion) < 0) continue;
    if (maxVersion && compareVersions(version, maxVersion) > 0) continue;

    if (!best || compareVersions(version, best.version) > 0) best = { tag, version };
  }
  return best?.tag ?? "";
}

function stripSha(digest: string): string {
  return digest.replace(/^sha256:/, "");
}

/** Same content, `sha256:` prefix or not. */
export function sameDigest(a: string, b: string): boolean {
  return stripSha(a) === stripSha(b);
}

/** Dots in a versioned tag: "2.10.2" beats "2.10" beats "2". */
function specificity(tag: string): number {
  return tag.split(".").length - 1;
}

/**
 * The version tag that points at `digest`, preferring the most specific one.
 * "latest" when only latest matches, "" when nothing does.
 */
export function selectTagForDigest(tagDigests: TagDigests, digest: string): string {
  let bestTag = "";
  let matchesLatest = false;
  for (const [tag, digests] of Object.entries(tagDigests)) {
    if (!digests.some((d) => sameDigest(d, digest))) continue;
    if (tag === "latest") matchesLatest = true;
    if (!tagVersion(tag)) continue;
    if (!bestTag || specificity(tag) > specificity(bestTag)) bestTag = tag;
  }
  if (bestTag) return bestTag;
  return matchesLatest ? "latest" : "";
}
