/** How a version was read from a tag. */
export type VersionKind = "semantic" | "date";

/** A parsed image version. Date tags map year/month/day onto major/minor/patch. */
export interface Version {
  major: number;
  minor: number;
  patch: number;
  /** e.g. "alpha", "beta.1", "rc2". Empty for a release. */
  prerelease: string;
  /** The tag text the version was read from. */
  original: string;
  kind: VersionKind;
}

/** Size of the step between two versions, from the current one's point of view. */
export type ChangeType = "none" | "patch" | "minor" | "major" | "downgrade" | "unknown";

export type TagVersionType = "semantic" | "date" | "hash" | "meta";

/** Everything a tag says about the image it names. */
export interface TagInfo {
  /** The full `image:tag` string that was parsed. */
  full: string;
  version: Version | null;
  isLatest: boolean;
  isVersioned: boolean;
  /** Variant such as "alpine" or "slim", with build metadata stripped. */
  suffix: string;
  versionType: TagVersionType | null;
  hash: string;
  metaTag: string;
}

/** A container image reference split into its parts. */
export interface ImageInfo {
  full: string;
  /** e.g. "docker.io", "ghcr.io", "localhost:5000" */
  registry: string;
  /** e.g. "library/nginx", "linuxserver/plex" */
  repository: string;
  /** Tag as written, "latest" when absent. */
  tagName: string;
  tag: TagInfo;
}
