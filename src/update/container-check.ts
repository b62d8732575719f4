import { LRUCache } from "lru-cache";
import { logger } from "../config/logger.js";
import type { Container, RuntimeClient } from "../docker/types.js";
import type { RegistryClient } from "../registry/types.js";
import { getChangeType, isNewer } from "../version/comparator.js";
import { extractFromImage, registryRef } from "../version/extractor.js";
import { formatVersion, parseTag } from "../version/parser.js";
import type { Version } from "../version/types.js";
import { extractServiceName } from "./compose-labels.js";
import { ALLOW_LATEST_LABEL, IGNORE_LABEL, isTruthyLabel } from "./labels.js";
import { findLatestVersion, MUTABLE_TAGS, sameDigest, selectTagForDigest } from "./tag-selection.js";
import type { ContainerUpdate } from "./types.js";

const DIGEST_VERSION_CACHE_MAX = 500;

function errorMessage(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message || "check failed";
}

function baseRow(container: Container): ContainerUpdate {
  return {
    containerId: container.id,
    containerName: container.name,
    serviceName: extractServiceName(container),
    image: container.image,
    currentTag: "",
    currentVersion: "",
    latestVersion: "",
    currentDigest: "",
    latestDigest: "",
    changeType: "unknown",
    usingLatestTag: false,
    recommendedTag: "",
    status: "UP_TO_DATE",
    error: "",
  };
}

function parseIfSet(version: string): Version | null {
  return version ? parseTag(version) : null;
}

/** A tag worth recommending instead of :latest. */
function isPinnableVersion(version: string): boolean {
  return version !== "" && version !== "latest" && parseTag(version) !== null;
}

/**
 * Classifies one container against its registry. Never throws: runtime and
 * registry failures become CHECK_FAILED rows, malformed tags degrade to a
 * raw string comparison.
 */
export class ContainerChecker {
  /** `registry/repository@digest` → version tag ("" when none matched). */
  private readonly digestVersions = new LRUCache<string, string>({ max: DIGEST_VERSION_CACHE_MAX });

  constructor(
    private readonly runtime: RuntimeClient,
    private readonly registry: RegistryClient,
  ) {}

  async checkContainer(container: Container, signal?: AbortSignal): Promise<ContainerUpdate> {
    const row = baseRow(container);
    try {
      return await this.evaluate(container, row, signal);
    } catch (err) {
      logger.warn("Container check failed", {
        container: container.name,
        image: container.image,
        error: errorMessage(err),
      });
      return { ...row, status: "CHECK_FAILED", latestVersion: "", error: errorMessage(err) };
    }
  }

  private async evaluate(container: Container, row: ContainerUpdate, signal?: AbortSignal): Promise<ContainerUpdate> {
    const log = { container: container.name, image: container.image };

    if (isTruthyLabel(container.labels[IGNORE_LABEL])) {
      logger.debug("Container ignored by label", log);
      return { ...row, status: "IGNORED", changeType: "none" };
    }

    if (await this.runtime.isLocalImage(container.image, signal)) {
      logger.debug("Local image, nothing to compare", log);
      return { ...row, status: "LOCAL_IMAGE", changeType: "none" };
    }

    const info = extractFromImage(container.image);
    const ref = registryRef(info);
    const checkTag = info.tagName;
    row.currentTag = info.tagName;
    row.usingLatestTag = info.tag.isLatest;

    row.currentVersion = await this.labelVersion(container, signal);
    if (!row.currentVersion && info.tag.isVersioned && info.tag.version) {
      row.currentVersion = formatVersion(info.tag.version);
    }
    row.currentDigest = await this.currentDigest(container, signal);
    if (!row.currentVersion && row.currentDigest) {
      const resolved = await this.resolveVersionFromDigest(ref, row.currentDigest, signal);
      if (isPinnableVersion(resolved)) row.currentVersion = resolved;
    }

    const tags = await this.registry.listTags(ref, signal);
    const currentVer = parseIfSet(row.currentVersion);
    const allowLatest = isTruthyLabel(container.labels[ALLOW_LATEST_LABEL]);
    const latestFromTags = findLatestVersion(tags, info.tag.suffix, currentVer, container.labels);

    // mutable tags: the digest is the only reliable signal
    if (MUTABLE_TAGS.has(checkTag) && row.currentDigest) {
      const latestDigest = await this.tagDigest(ref, checkTag, signal);
      if (latestDigest !== null) {
        row.latestDigest = latestDigest;
        if (!sameDigest(row.currentDigest, latestDigest)) {
          await this.markNewerImage(row, ref, checkTag, latestFromTags, signal);
        } else {
          row.status = "UP_TO_DATE";
          row.changeType = "none";
          const sameContentTag = await this.resolveVersionFromDigest(ref, row.currentDigest, signal);
          if (isPinnableVersion(sameContentTag)) row.latestVersion = sameContentTag;
          else if (isPinnableVersion(row.currentVersion)) row.latestVersion = row.currentVersion;
          else row.latestVersion = latestFromTags;
          if (checkTag === "latest" && !allowLatest && isPinnableVersion(row.latestVersion)) {
            row.status = "UP_TO_DATE_PINNABLE";
            row.recommendedTag = row.latestVersion;
          }
        }
        logger.debug("Digest comparison complete", { ...log, status: row.status, latest: row.latestVersion });
        return row;
      }
    }

    row.latestVersion = latestFromTags;
    if (row.currentVersion && latestFromTags) {
      const latestVer = parseTag(latestFromTags);
      if (currentVer && latestVer) {
        row.changeType = getChangeType(currentVer, latestVer);
        row.status = isNewer(currentVer, latestVer) ? "UPDATE_AVAILABLE" : "UP_TO_DATE";
      } else if (row.currentVersion !== latestFromTags) {
        row.status = "UPDATE_AVAILABLE";
        row.changeType = "unknown";
      } else {
        row.status = "UP_TO_DATE";
        row.changeType = "none";
      }
    } else if (latestFromTags) {
      row.status = "UPDATE_AVAILABLE";
      row.changeType = "unknown";
    } else if (!row.currentDigest) {
      row.status = "UP_TO_DATE";
      row.changeType = "none";
    } else {
      let latestDigest: string;
      try {
        latestDigest = await this.registry.getTagDigest(ref, checkTag, signal);
      } catch (err) {
        throw new Error(
          `cannot determine update status: no semantic versions found and digest check failed (${errorMessage(err)})`,
          { cause: err },
        );
      }
      row.latestDigest = latestDigest;
      if (sameDigest(row.currentDigest, latestDigest)) {
        row.status = "UP_TO_DATE";
        row.changeType = "none";
      } else {
        await this.markNewerImage(row, ref, checkTag, "", signal);
      }
    }

    if (
      row.usingLatestTag &&
      row.currentVersion &&
      row.status === "UP_TO_DATE" &&
      !allowLatest &&
      isPinnableVersion(row.latestVersion)
    ) {
      row.status = "UP_TO_DATE_PINNABLE";
      row.recommendedTag = row.latestVersion;
    }

    logger.debug("Version comparison complete", {
      ...log,
      status: row.status,
      current: row.currentVersion,
      latest: row.latestVersion,
    });
    return row;
  }

  /** The tracked tag now points at different content. */
  private async markNewerImage(
    row: ContainerUpdate,
    ref: string,
    checkTag: string,
    latestFromTags: string,
    signal?: AbortSignal,
  ): Promise<void> {
    row.status = "UPDATE_AVAILABLE";
    row.changeType = "unknown";

    const newTag = await this.resolveVersionFromDigest(ref, row.latestDigest, signal);
    if (isPinnableVersion(newTag)) row.latestVersion = newTag;
    else if (latestFromTags) row.latestVersion = latestFromTags;
    else row.latestVersion = `(newer image available, tag: ${checkTag})`;

    const currentVer = parseIfSet(row.currentVersion);
    const latestVer = parseIfSet(row.latestVersion);
    if (currentVer && latestVer) row.changeType = getChangeType(currentVer, latestVer);
  }

  /** Version from the image labels, dropped unless it parses. Lookup failures leave it unknown. */
  private async labelVersion(container: Container, signal?: AbortSignal): Promise<string> {
    try {
      const version = await this.runtime.getImageVersion(container.image, signal);
      if (version && !parseTag(version)) {
        logger.debug("Ignoring non-version label", { container: container.name, version });
        return "";
      }
      return version;
    } catch (err) {
      logger.debug("Image version lookup failed", { container: container.name, error: errorMessage(err) });
      return "";
    }
  }

  private async currentDigest(container: Container, signal?: AbortSignal): Promise<string> {
    try {
      return await this.runtime.getImageDigest(container.image, signal);
    } catch (err) {
      logger.warn("Image digest lookup failed", { container: container.name, error: errorMessage(err) });
      return "";
    }
  }

  /** Digest of `tag` in the registry, or null when the lookup failed. */
  private async tagDigest(ref: string, tag: string, signal?: AbortSignal): Promise<string | null> {
    try {
      return await this.registry.getTagDigest(ref, tag, signal);
    } catch (err) {
      logger.debug("Tag digest lookup failed", { ref, tag, error: errorMessage(err) });
      return null;
    }
  }

  /**
   * The version tag that points at `digest`. Resolved tags are cached per
   * image and digest; lookup failures resolve to "" and are not cached.
   */
  private async resolveVersionFromDigest(ref: string, digest: string, signal?: AbortSignal): Promise<string> {
    const key = `${ref}@${digest.replace(/^sha256:/, "")}`;
    const cached = this.digestVersions.get(key);
    if (cached !== undefined) return cached;

    try {
      const tagDigests = await this.registry.listTagsWithDigests(ref, signal);
      const tag = selectTagForDigest(tagDigests, digest);
      if (tag) this.digestVersions.set(key, tag);
      return tag;
    } catch (err) {
      logger.debug("Tag digest listing failed", { ref, error: errorMessage(err) });
      return "";
    }
  }
}
