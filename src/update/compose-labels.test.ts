import { describe, expect, it } from "vitest";
import type { Container } from "../docker/types.js";
import { extractServiceName, extractServiceNames, extractStackName } from "./compose-labels.js";

function container(name: string, labels: Record<string, string> = {}): Container {
  return { id: `id-${name}`, name, image: "nginx:1.25.3", labels, state: "running", healthStatus: "none" };
}

describe("extractServiceName", () => {
  it("reads the compose service label", () => {
    expect(extractServiceName(container("web-1", { "com.docker.compose.service": "web" }))).toBe("web");
  });

  it("returns empty outside a stack", () => {
    expect(extractServiceName(container("standalone"))).toBe("");
  });

  it("returns empty for a missing container", () => {
    expect(extractServiceName(undefined)).toBe("");
  });
});

describe("extractServiceNames", () => {
  const containers = [
    container("web-1", { "com.docker.compose.service": "web" }),
    container("db-1", { "com.docker.compose.service": "db" }),
    container("standalone"),
    container("cache-1", { "com.docker.compose.service": "" }),
  ];

  it("returns services of the named containers in container order", () => {
    expect(extractServiceNames(containers, ["db-1", "web-1"])).toEqual(["web", "db"]);
  });

  it("skips containers without a service", () => {
    expect(extractServiceNames(containers, ["standalone", "cache-1", "db-1"])).toEqual(["db"]);
  });

  it("returns nothing when no names match", () => {
    expect(extractServiceNames(containers, ["missing"])).toEqual([]);
  });
});

describe("extractStackName", () => {
  it("reads the compose project label", () => {
    expect(extractStackName(container("web-1", { "com.docker.compose.project": "media" }))).toBe("media");
    expect(extractStackName(container("standalone"))).toBe("");
  });
});
