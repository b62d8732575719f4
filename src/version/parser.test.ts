import { describe, expect, it } from "vitest";
import { formatVersion, normalizeSuffix, parseImageTag, parseTag } from "./parser.js";

describe("parseImageTag", () => {
  it("parses a plain semantic version", () => {
    const info = parseImageTag("nginx:1.21.3");
    expect(info.isVersioned).toBe(true);
    expect(info.versionType).toBe("semantic");
    expect(info.suffix).toBe("");
    expect(info.version).toEqual({
      major: 1,
      minor: 21,
      patch: 3,
      prerelease: "",
      original: "1.21.3",
      kind: "semantic",
    });
  });

  it("keeps a variant suffix", () => {
    const info = parseImageTag("nginx:1.21.3-alpine");
    expect(info.version?.patch).toBe(3);
    expect(info.suffix).toBe("alpine");
  });

  it("separates a dotted prerelease from the core version", () => {
    const info = parseImageTag("app:2.0.0-beta.1");
    expect(info.version?.prerelease).toBe("beta.1");
    expect(info.suffix).toBe("");
  });

  it("separates prerelease and suffix when both are present", () => {
    const info = parseImageTag("app:1.2.3-rc1-alpine");
    expect(info.version?.prerelease).toBe("rc1");
    expect(info.suffix).toBe("alpine");
  });

  it("drops LinuxServer build metadata from the suffix", () => {
    const info = parseImageTag("linuxserver/plex:1.40.0.7998-c29d4c0c8-ls286");
    expect(info.version?.major).toBe(1);
    expect(info.version?.minor).toBe(40);
    expect(info.suffix).toBe("");
  });

  it("marks latest", () => {
    const info = parseImageTag("nginx:latest");
    expect(info.isLatest).toBe(true);
    expect(info.version).toBeNull();
  });

  it("keeps the suffix of a latest-variant tag", () => {
    const info = parseImageTag("app:latest-alpine");
    expect(info.isLatest).toBe(true);
    expect(info.suffix).toBe("alpine");
  });

  it("treats a missing tag as latest", () => {
    expect(parseImageTag("nginx").isLatest).toBe(true);
  });

  it("parses date tags before semantic versions", () => {
    const info = parseImageTag("app:2024.01.15");
    expect(info.versionType).toBe("date");
    expect(info.version).toMatchObject({ major: 2024, minor: 1, patch: 15, kind: "date" });
  });

  it("recognises commit hashes as unversioned", () => {
    const info = parseImageTag("app:abc123def");
    expect(info.versionType).toBe("hash");
    expect(info.hash).toBe("abc123def");
    expect(info.isVersioned).toBe(false);
  });

  it("recognises meta tags", () => {
    const info = parseImageTag("app:stable");
    expect(info.versionType).toBe("meta");
    expect(info.metaTag).toBe("stable");
  });

  it("does not throw on a malformed tag", () => {
    const info = parseImageTag("myapp:weird-tag-format-!!!");
    expect(info.version).toBeNull();
    expect(info.isVersioned).toBe(false);
    expect(info.isLatest).toBe(false);
    expect(info.versionType).toBeNull();
  });
});

describe("parseTag", () => {
  it("fills a missing patch with zero", () => {
    expect(parseTag("v1.2")).toMatchObject({ major: 1, minor: 2, patch: 0 });
  });

  it("returns null for non-version text", () => {
    expect(parseTag("latest")).toBeNull();
    expect(parseTag("weird-tag-format-!!!")).toBeNull();
  });

  it("reads compact dates", () => {
    expect(parseTag("20240115")).toMatchObject({ major: 2024, minor: 1, patch: 15, kind: "date" });
  });

  it("rejects impossible compact dates", () => {
    expect(parseTag("20241345")).toBeNull();
  });
});

describe("normalizeSuffix", () => {
  it("strips revision numbers", () => {
    expect(normalizeSuffix("alpine-r3")).toBe("alpine");
  });

  it("strips LinuxServer build numbers", () => {
    expect(normalizeSuffix("ubuntu-ls12")).toBe("ubuntu");
  });

  it("returns empty for pure build metadata", () => {
    expect(normalizeSuffix("_1")).toBe("");
    expect(normalizeSuffix("")).toBe("");
  });
});

describe("formatVersion", () => {
  it("pads date versions", () => {
    expect(formatVersion({ major: 2024, minor: 1, patch: 5, prerelease: "", original: "", kind: "date" })).toBe(
      "2024.01.05",
    );
  });

  it("appends the prerelease", () => {
    expect(formatVersion({ major: 1, minor: 0, patch: 0, prerelease: "rc1", original: "", kind: "semantic" })).toBe(
      "1.0.0-rc1",
    );
  });
});
