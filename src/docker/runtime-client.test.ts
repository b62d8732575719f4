import type Docker from "dockerode";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { DockerRuntimeClient, parseBuildVersion, parseHealthStatus } from "./runtime-client.js";

function mockDocker() {
  const inspect = vi.fn();
  return {
    inspect,
    listContainers: vi.fn(),
    getImage: vi.fn(() => ({ inspect })),
  };
}

describe("parseHealthStatus", () => {
  it.each([
    ["Up 2 minutes (healthy)", "healthy"],
    ["Up 5 seconds (unhealthy)", "unhealthy"],
    ["Up 1 second (health: starting)", "starting"],
    ["Up 10 minutes", "none"],
  ])("%s -> %s", (status, expected) => {
    expect(parseHealthStatus(status)).toBe(expected);
  });
});

describe("parseBuildVersion", () => {
  it("extracts the version from a LinuxServer label", () => {
    expect(parseBuildVersion("Linuxserver.io version:- 5.28.0.10274-ls286 Build-date:- 2024-06-01")).toBe(
      "5.28.0.10274-ls286",
    );
  });

  it("returns other values unchanged", () => {
    expect(parseBuildVersion("1.2.3")).toBe("1.2.3");
  });
});

describe("DockerRuntimeClient", () => {
  let docker: ReturnType<typeof mockDocker>;
  let client: DockerRuntimeClient;

  beforeEach(() => {
    docker = mockDocker();
    client = new DockerRuntimeClient(docker as unknown as Docker);
  });

  it("lists all containers and maps them", async () => {
    docker.listContainers.mockResolvedValue([
      {
        Id: "c1",
        Names: ["/web"],
        Image: "nginx:1.25.3",
        Labels: { "com.docker.compose.service": "web" },
        State: "running",
        Status: "Up 3 hours (healthy)",
      },
    ]);

    const containers = await client.listContainers();

    expect(docker.listContainers).toHaveBeenCalledWith({ all: true });
    expect(containers).toEqual([
      {
        id: "c1",
        name: "web",
        image: "nginx:1.25.3",
        labels: { "com.docker.compose.service": "web" },
        state: "running",
        healthStatus: "healthy",
      },
    ]);
  });

  it("treats an image without repo digests as local", async () => {
    docker.inspect.mockResolvedValue({ Id: "sha256:local", RepoDigests: [] });
    await expect(client.isLocalImage("myapp:dev")).resolves.toBe(true);
    expect(docker.getImage).toHaveBeenCalledWith("myapp:dev");
  });

  it("treats an image with repo digests as pulled", async () => {
    docker.inspect.mockResolvedValue({ Id: "sha256:img", RepoDigests: ["nginx@sha256:aaa"] });
    await expect(client.isLocalImage("nginx:1.25.3")).resolves.toBe(false);
  });

  it("reads the OCI version label first", async () => {
    docker.inspect.mockResolvedValue({
      Id: "sha256:img",
      Config: { Labels: { version: "0.9", "org.opencontainers.image.version": "1.4.2" } },
    });
    await expect(client.getImageVersion("app:latest")).resolves.toBe("1.4.2");
  });

  it("parses the LinuxServer build_version label", async () => {
    docker.inspect.mockResolvedValue({
      Id: "sha256:img",
      Config: { Labels: { build_version: "Linuxserver.io version:- 4.0.1-ls12 Build-date:- 2024-02-02" } },
    });
    await expect(client.getImageVersion("lscr.io/linuxserver/app:latest")).resolves.toBe("4.0.1-ls12");
  });

  it("returns an empty version when no label is set", async () => {
    docker.inspect.mockResolvedValue({ Id: "sha256:img", Config: { Labels: {} } });
    await expect(client.getImageVersion("app:latest")).resolves.toBe("");
  });

  it("takes the digest from RepoDigests", async () => {
    docker.inspect.mockResolvedValue({ Id: "sha256:img", RepoDigests: ["ghcr.io/team/app@sha256:abc123"] });
    await expect(client.getImageDigest("ghcr.io/team/app:1.0.0")).resolves.toBe("sha256:abc123");
  });

  it("falls back to the image id when there is no repo digest", async () => {
    docker.inspect.mockResolvedValue({ Id: "sha256:img", RepoDigests: [] });
    await expect(client.getImageDigest("app:dev")).resolves.toBe("sha256:img");
  });

  it("wraps inspect failures with the image name", async () => {
    docker.inspect.mockRejectedValue(new Error("no such image"));
    await expect(client.getImageDigest("gone:1")).rejects.toThrow("failed to inspect image gone:1: no such image");
  });

  it("refuses calls after close", async () => {
    await client.close();
    await expect(client.listContainers()).rejects.toThrow("runtime client is closed");
  });

  it("refuses calls with an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stop"));
    await expect(client.listContainers(controller.signal)).rejects.toThrow("stop");
    expect(docker.listContainers).not.toHaveBeenCalled();
  });
});
