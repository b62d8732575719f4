import { parseImageTag } from "./parser.js";
import type { ImageInfo } from "./types.js";

export const DEFAULT_REGISTRY = "docker.io";

export function looksLikeRegistry(segment: string): boolean {
  return segment.includes(".") || segment.includes(":") || segment === "localhost";
}

/**
 * Split an image reference into registry, repository and tag.
 *
 * - `nginx:1.21.3` → docker.io, library/nginx, 1.21.3
 * - `ghcr.io/linuxserver/plex:latest` → ghcr.io, linuxserver/plex, latest
 * - `localhost:5000/app` → localhost:5000, app, latest
 *
 * A pinned digest (`repo@sha256:…`) is dropped; the tag before it still counts.
 */
export function extractFromImage(image: string): ImageInfo {
  const atIdx = image.indexOf("@");
  const ref = atIdx === -1 ? image : image.slice(0, atIdx);

  let imagePath = ref;
  let tagName = "latest";
  const colonIdx = ref.lastIndexOf(":");
  // a colon followed by a slash belongs to a registry port, not a tag
  if (colonIdx !== -1 && !ref.slice(colonIdx + 1).includes("/")) {
    imagePath = ref.slice(0, colonIdx);
    tagName = ref.slice(colonIdx + 1);
  }

  const parts = imagePath.split("/");
  let registry = DEFAULT_REGISTRY;
  let repository: string;
  if (parts.length === 1) {
    repository = `library/${parts[0]}`;
  } else if (looksLikeRegistry(parts[0])) {
    registry = parts[0];
    repository = parts.slice(1).join("/");
  } else {
    repository = imagePath;
  }
  if (registry === DEFAULT_REGISTRY && !repository.includes("/")) {
    repository = `library/${repository}`;
  }

  return {
    full: image,
    registry,
    repository,
    tagName,
    tag: parseImageTag(`${imagePath}:${tagName}`),
  };
}

/** `registry/repository`, the form registry clients take. */
export function registryRef(info: ImageInfo): string {
  return `${info.registry}/${info.repository}`;
}
