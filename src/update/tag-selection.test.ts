import { describe, expect, it } from "vitest";
import { parseTag } from "../version/parser.js";
import type { Version } from "../version/types.js";
import { filterTagsByRegex, findLatestVersion, sameDigest, selectTagForDigest } from "./tag-selection.js";

function v(tag: string): Version {
  const parsed = parseTag(tag);
  if (!parsed) throw new Error(`test tag ${tag} does not parse`);
  return parsed;
}

describe("findLatestVersion", () => {
  const tags = ["1.25.3", "1.25.4", "1.26.0-alpine", "1.26.0", "latest", "2.0.0-rc1", "stable"];

  it("picks the newest stable tag with the same suffix", () => {
    expect(findLatestVersion(tags, "", v("1.25.3"), {})).toBe("1.26.0");
  });

  it("stays on the current variant", () => {
    expect(findLatestVersion(["1.25.3-alpine", "1.26.0-alpine", "1.27.0"], "alpine", v("1.25.3"), {})).toBe(
      "1.26.0-alpine",
    );
  });

  it("offers prereleases when already on one", () => {
    expect(findLatestVersion(["1.26.0", "2.0.0-rc1"], "", v("2.0.0-beta.1"), {})).toBe("2.0.0-rc1");
  });

  it("offers prereleases when the current version is unknown", () => {
    expect(findLatestVersion(["1.0.0", "1.1.0-beta"], "", null, {})).toBe("1.1.0-beta");
  });

  it("pins to the current minor version", () => {
    const labels = { "scout.version-pin-minor": "true" };
    expect(findLatestVersion(["1.25.4", "1.26.0", "2.0.0"], "", v("1.25.3"), labels)).toBe("1.25.4");
  });

  it("applies the maximum version", () => {
    const labels = { "scout.version-max": "1.99" };
    expect(findLatestVersion(["1.25.4", "1.26.0", "2.0.0"], "", v("1.25.3"), labels)).toBe("1.26.0");
  });

  it("returns empty when the minimum excludes everything", () => {
    const labels = { "scout.version-min": "3.0" };
    expect(findLatestVersion(["1.25.4", "1.26.0", "2.0.0"], "", v("1.25.3"), labels)).toBe("");
  });

  it("applies the tag regex", () => {
    const labels = { "scout.tag-regex": "^1\\.25\\." };
    expect(findLatestVersion(["1.25.4", "1.26.0", "2.0.0"], "", v("1.25.3"), labels)).toBe("1.25.4");
  });

  it("ignores an invalid tag regex", () => {
    const labels = { "scout.tag-regex": "[" };
    expect(findLatestVersion(["1.25.4", "1.26.0", "2.0.0"], "", v("1.25.3"), labels)).toBe("2.0.0");
  });

  it("returns empty when no tag is a version", () => {
    expect(findLatestVersion(["latest", "stable", "weird-tag-format-!!!"], "", null, {})).toBe("");
  });
});

describe("filterTagsByRegex", () => {
  it("keeps matching tags", () => {
    expect(filterTagsByRegex(["1.0.0", "1.0.0-alpine", "2.0.0"], "alpine$")).toEqual(["1.0.0-alpine"]);
  });

  it("keeps everything for an empty pattern", () => {
    expect(filterTagsByRegex(["a", "b"], "")).toEqual(["a", "b"]);
  });
});

describe("selectTagForDigest", () => {
  it("prefers the most specific version tag", () => {
    const tagDigests = {
      latest: ["sha256:aaa"],
      "2": ["sha256:aaa"],
      "2.10": ["sha256:aaa"],
      "2.10.2": ["aaa"],
      "2.9.0": ["sha256:bbb"],
    };
    expect(selectTagForDigest(tagDigests, "sha256:aaa")).toBe("2.10.2");
  });

  it("falls back to latest when only latest matches", () => {
    expect(selectTagForDigest({ latest: ["sha256:aaa"], "1.0.0": ["sha256:bbb"] }, "sha256:aaa")).toBe("latest");
  });

  it("returns empty when nothing matches", () => {
    expect(selectTagForDigest({ "1.0.0": ["sha256:bbb"] }, "sha256:aaa")).toBe("");
  });
});

describe("sameDigest", () => {
  it("ignores the sha256 prefix", () => {
    expect(sameDigest("sha256:abc", "abc")).toBe(true);
    expect(sameDigest("sha256:abc", "sha256:abd")).toBe(false);
  });
});
