import type { TagInfo, Version } from "./types.js";

/** Core version only: 1.2, 1.2.3, v1.2.3. A bare "1243" is not a version. */
const SEMVER_PATTERN = /^v?(\d+)\.(\d+)(?:\.(\d+))?/;

const PRERELEASE_IDENTIFIERS = ["alpha", "beta", "rc", "dev", "pre", "preview", "canary"];

const META_TAGS = new Set(["stable", "main", "master", "develop", "dev", "edge", "nightly", "beta", "alpha", "rc"]);

const HASH_PATTERN = /^([a-f0-9]{7,40}|sha[0-9]+-[a-f0-9]+)/;

/** Build metadata that is not part of a variant name. Applied in order. */
const BUILD_SUFFIX_PATTERNS = [
  /-ls\d+/g, // LinuxServer build numbers: -ls286
  /-r\d+/g, // revisions: -r3
  /-\d{8}/g, // date stamps: -20250413
  /-\d{12,}/g, // long timestamps
  /-[0-9a-f]{7,}/g, // git hashes: -8cddf87
  /\.dev\d+/g,
  /-ubuntu[\d.]+/g,
  /-\d+$/g,
  /_\d+$/g,
  /^\.\d+/g, // LinuxServer ".2946"
];

interface DatePattern {
  pattern: RegExp;
  /** Pulls year, month and day out of a match. */
  parts: (m: RegExpMatchArray) => [string, string, string];
}

// Checked before semver: 2024.01.15 would otherwise read as v2024.1.15.
const DATE_PATTERNS: DatePattern[] = [
  { pattern: /^(\d{4})\.(\d{1,2})\.(\d{1,2})/, parts: (m) => [m[1], m[2], m[3]] },
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})/, parts: (m) => [m[1], m[2], m[3]] },
  { pattern: /^(\d{8})$/, parts: (m) => [m[1].slice(0, 4), m[1].slice(4, 6), m[1].slice(6, 8)] },
  { pattern: /^(\d{4})(\d{2})(\d{2})/, parts: (m) => [m[1], m[2], m[3]] },
];

function emptyTagInfo(full: string): TagInfo {
  return {
    full,
    version: null,
    isLatest: false,
    isVersioned: false,
    suffix: "",
    versionType: null,
    hash: "",
    metaTag: "",
  };
}

/** Render a version the way registries usually spell it. */
export function formatVersion(v: Version): string {
  if (v.kind === "date") {
    return `${v.major}.${String(v.minor).padStart(2, "0")}.${String(v.patch).padStart(2, "0")}`;
  }
  return v.prerelease ? `${v.major}.${v.minor}.${v.patch}-${v.prerelease}` : `${v.major}.${v.minor}.${v.patch}`;
}

/**
 * Strip build metadata from a variant suffix, keeping identifiers like
 * "alpine" or "tensorrt".
 */
export function normalizeSuffix(suffix: string): string {
  if (!suffix) return "";
  let normalized = suffix;
  for (const pattern of BUILD_SUFFIX_PATTERNS) {
    normalized = normalized.replace(pattern, "");
  }
  return normalized.replace(/^[-_.]+|[-_.]+$/g, "");
}

function isPrereleaseIdentifier(part: string): boolean {
  return PRERELEASE_IDENTIFIERS.some((id) => part === id || part.startsWith(id));
}

/** Extract a semantic version and the remaining variant suffix from a tag. */
function extractVersion(tag: string): { version: Version | null; suffix: string } {
  const m = tag.match(SEMVER_PATTERN);
  if (!m) return { version: null, suffix: tag };

  const version: Version = {
    major: Number.parseInt(m[1], 10),
    minor: Number.parseInt(m[2], 10),
    patch: m[3] ? Number.parseInt(m[3], 10) : 0,
    prerelease: "",
    original: tag,
    kind: "semantic",
  };

  let remainder = tag.slice(m[0].length);
  if (!remainder) return { version, suffix: "" };

  if (remainder.startsWith("-")) remainder = remainder.slice(1);
  if (remainder.startsWith("+")) remainder = remainder.slice(1);

  let suffix = remainder;
  const parts = remainder.split(/[-.+]/).filter(Boolean);
  if (parts.length > 0) {
    const first = parts[0].toLowerCase();
    if (isPrereleaseIdentifier(first)) {
      const start = remainder.toLowerCase().indexOf(first);
      let end = start + first.length;
      // "beta.1" / "rc-2": a numeric part right after the identifier belongs to it
      if (parts.length > 1 && /^\d+$/.test(parts[1])) {
        end = remainder.indexOf(parts[1], end) + parts[1].length;
      }
      version.prerelease = remainder.slice(start, end);
      suffix = remainder.slice(end).replace(/^[-.+]/, "");
    }
  }

  return { version, suffix: normalizeSuffix(suffix) };
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/** Match a tag against the date patterns. Month and day must be two digits. */
function matchDate(tag: string): { version: Version; matched: string } | null {
  for (const { pattern, parts } of DATE_PATTERNS) {
    const m = tag.match(pattern);
    if (!m) continue;
    const [y, mo, d] = parts(m);
    if (mo.length !== 2 || d.length !== 2) continue;
    const year = Number.parseInt(y, 10);
    const month = Number.parseInt(mo, 10);
    const day = Number.parseInt(d, 10);
    if (!isValidDate(year, month, day)) continue;
    return {
      version: { major: year, minor: month, patch: day, prerelease: "", original: tag, kind: "date" },
      matched: m[0],
    };
  }
  return null;
}

function isCommitHash(tag: string): boolean {
  const clean = tag.replace(/^sha256-/, "").replace(/^sha1-/, "").replace(/^git-/, "");
  return HASH_PATTERN.test(clean);
}

/**
 * Parse the version information carried by an `image:tag` string.
 *
 * - `nginx:1.21.3-alpine` → 1.21.3, suffix "alpine"
 * - `nginx:latest` / `app:latest-full` → latest (suffix "full")
 * - `app:2024.01.15` → date version
 * - `app:abc123def` → commit hash, unversioned
 */
export function parseImageTag(imageTag: string): TagInfo {
  const info = emptyTagInfo(imageTag);
  const parts = imageTag.split(":");
  if (parts.length < 2) {
    info.isLatest = true;
    return info;
  }
  const tag = parts[parts.length - 1];

  if (tag === "latest" || tag.startsWith("latest-")) {
    info.isLatest = true;
    if (tag.startsWith("latest-")) {
      info.suffix = normalizeSuffix(tag.slice("latest-".length));
    }
    return info;
  }

  const date = matchDate(tag);
  if (date) {
    info.version = date.version;
    info.isVersioned = true;
    info.versionType = "date";
    info.suffix = normalizeSuffix(tag.slice(date.matched.length).replace(/^-/, ""));
    return info;
  }

  const { version, suffix } = extractVersion(tag);
  if (version) {
    info.version = version;
    info.isVersioned = true;
    info.suffix = suffix;
    info.versionType = "semantic";
    return info;
  }

  if (isCommitHash(tag)) {
    info.versionType = "hash";
    info.hash = tag;
    return info;
  }

  if (META_TAGS.has(tag.toLowerCase())) {
    info.versionType = "meta";
    info.metaTag = tag;
  }
  return info;
}

/**
 * Parse a bare tag (or version label) into a version, or null when it does
 * not carry one. Never throws.
 */
export function parseTag(tag: string): Version | null {
  const { version } = extractVersion(tag);
  if (version) return version;
  return matchDate(tag)?.version ?? null;
}
