/** Health as reported in the container status line. */
export type HealthStatus = "healthy" | "unhealthy" | "starting" | "none";

/** A running (or stopped) container as seen by the update checker. Read-only. */
export interface Container {
  readonly id: string;
  readonly name: string;
  /** `repository[:tag]` as the daemon reports it. */
  readonly image: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly state: string;
  readonly healthStatus: HealthStatus;
}

/** The container runtime operations the checker needs. */
export interface RuntimeClient {
  listContainers(signal?: AbortSignal): Promise<Container[]>;
  /** True when the image was built locally and has no registry digest. */
  isLocalImage(imageRef: string, signal?: AbortSignal): Promise<boolean>;
  /** Version from the image labels, or "" when none is set. */
  getImageVersion(imageName: string, signal?: AbortSignal): Promise<string>;
  /** `sha256:…` registry digest, falling back to the image id. */
  getImageDigest(imageName: string, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}
