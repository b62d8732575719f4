/** Tag → digests (manifest list first, then per-architecture manifests). */
export type TagDigests = Record<string, string[]>;

/**
 * Read-only registry operations. `image` is `registry/repository`
 * (e.g. "docker.io/library/nginx", "ghcr.io/linuxserver/plex").
 */
export interface RegistryClient {
  listTags(image: string, signal?: AbortSignal): Promise<string[]>;
  /** "latest" when present, else the first tag listed. */
  getLatestTag(image: string, signal?: AbortSignal): Promise<string>;
  getTagDigest(imageRef: string, tag: string, signal?: AbortSignal): Promise<string>;
  listTagsWithDigests(imageRef: string, signal?: AbortSignal): Promise<TagDigests>;
}

export class RegistryError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly registryMessage: string,
  ) {
    super(`registry error ${statusCode}: ${registryMessage}`);
    this.name = "RegistryError";
  }
}

export class NoTagsFoundError extends Error {
  constructor(public readonly image: string) {
    super(`no tags found for ${image}`);
    this.name = "NoTagsFoundError";
  }
}

export class CircuitOpenError extends Error {
  constructor(public readonly registry: string) {
    super(`circuit breaker is open: registry temporarily unavailable: ${registry}`);
    this.name = "CircuitOpenError";
  }
}
