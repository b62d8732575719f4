import Docker from "dockerode";
import { config } from "../config/index.js";
import type { Container, HealthStatus, RuntimeClient } from "./types.js";

/** Image labels that carry a version, in order of preference. */
const VERSION_LABELS = ["org.opencontainers.image.version", "build_version", "version", "VERSION"];

/** "Up 2 minutes (healthy)" → healthy. */
export function parseHealthStatus(status: string): HealthStatus {
  if (status.includes("(healthy)")) return "healthy";
  if (status.includes("(unhealthy)")) return "unhealthy";
  if (status.includes("(health: starting)")) return "starting";
  return "none";
}

/**
 * LinuxServer images label `build_version` as
 * "Linuxserver.io version:- 5.28.0.10274-ls286 Build-date:- 2024-…".
 */
export function parseBuildVersion(value: string): string {
  const idx = value.indexOf("version:-");
  if (idx === -1) return value;
  const versionPart = value.slice(idx + "version:-".length).trim();
  const end = versionPart.indexOf(" Build-date");
  return end > 0 ? versionPart.slice(0, end) : versionPart;
}

function toContainer(info: Docker.ContainerInfo): Container {
  return {
    id: info.Id,
    name: (info.Names[0] ?? "").replace(/^\//, ""),
    image: info.Image,
    labels: info.Labels ?? {},
    state: info.State,
    healthStatus: parseHealthStatus(info.Status ?? ""),
  };
}

/**
 * Runtime client over the Docker Engine API. Uses dockerode exclusively --
 * no child_process.exec.
 */
export class DockerRuntimeClient implements RuntimeClient {
  readonly docker: Docker;
  private closed = false;

  constructor(docker?: Docker) {
    this.docker = docker ?? new Docker({ socketPath: config.docker.socketPath });
  }

  /** All containers, running and stopped. */
  async listContainers(signal?: AbortSignal): Promise<Container[]> {
    this.ensureOpen(signal);
    const all = await this.docker.listContainers({ all: true });
    return all.map(toContainer);
  }

  async isLocalImage(imageRef: string, signal?: AbortSignal): Promise<boolean> {
    const info = await this.inspectImage(imageRef, signal);
    return (info.RepoDigests ?? []).length === 0;
  }

  async getImageVersion(imageName: string, signal?: AbortSignal): Promise<string> {
    const info = await this.inspectImage(imageName, signal);
    const labels: Record<string, string> = info.Config?.Labels ?? {};
    for (const label of VERSION_LABELS) {
      const value = labels[label];
      if (!value) continue;
      return label === "build_version" ? parseBuildVersion(value) : value;
    }
    return "";
  }

  async getImageDigest(imageName: string, signal?: AbortSignal): Promise<string> {
    const info = await this.inspectImage(imageName, signal);
    const repoDigest = info.RepoDigests?.[0];
    if (repoDigest) {
      const atIdx = repoDigest.indexOf("@");
      return atIdx > 0 ? repoDigest.slice(atIdx + 1) : repoDigest;
    }
    return info.Id;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async inspectImage(imageName: string, signal?: AbortSignal): Promise<Docker.ImageInspectInfo> {
    this.ensureOpen(signal);
    try {
      return await this.docker.getImage(imageName).inspect();
    } catch (err) {
      throw new Error(`failed to inspect image ${imageName}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  private ensureOpen(signal?: AbortSignal): void {
    if (this.closed) throw new Error("runtime client is closed");
    signal?.throwIfAborted();
  }
}
