import { z } from "zod";
import { logger } from "../config/logger.js";
import { compareVersions } from "../version/comparator.js";
import { parseTag } from "../version/parser.js";
import { NoTagsFoundError, RegistryError, type TagDigests } from "./types.js";

/** Docker Hub serves the V2 API from a different host than its name. */
const DOCKER_HUB = "docker.io";
const DOCKER_HUB_REGISTRY_URL = "https://registry-1.docker.io";
const DOCKER_HUB_API_URL = "https://hub.docker.com/v2";

const MANIFEST_ACCEPT = [
  "application/vnd.oci.image.index.v1+json",
  "application/vnd.oci.image.manifest.v1+json",
  "application/vnd.docker.distribution.manifest.list.v2+json",
  "application/vnd.docker.distribution.manifest.v2+json",
].join(", ");

/** Registries without a tag→digest listing get per-tag HEAD requests for this many of the highest versioned tags. */
export const DIGEST_LOOKUP_TAG_LIMIT = 25;

/**
 * The `limit` highest tags by parsed version. tags/list is ordered lexically,
 * so `1.0.9` would otherwise follow `1.0.10`. Unversioned tags rank lowest.
 */
export function highestTags(tags: readonly string[], limit: number): string[] {
  return tags
    .map((tag) => ({ tag, version: parseTag(tag) }))
    .sort((a, b) => compareVersions(a.version, b.version))
    .slice(-limit)
    .map(({ tag }) => tag);
}

const tokenResponseSchema = z
  .object({ token: z.string().optional(), access_token: z.string().optional() })
  .refine((body) => Boolean(body.token ?? body.access_token), { message: "token response carries no token" });

const tagListSchema = z.object({
  name: z.string().optional(),
  tags: z.array(z.string()).nullable().optional(),
});

const hubTagsSchema = z.object({
  results: z.array(
    z.object({
      name: z.string(),
      digest: z.string().nullish(),
      images: z.array(z.object({ digest: z.string().nullish() })).nullish(),
    }),
  ),
});

const errorBodySchema = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
});

export interface RegistryHttpClientOptions {
  /** Registry host as it appears in image references: "docker.io", "ghcr.io", "localhost:5000". */
  registry: string;
  timeoutMs: number;
  username?: string;
  password?: string;
}

interface BearerChallenge {
  realm: string;
  service?: string;
  scope?: string;
}

/** Parse `Bearer realm="…",service="…",scope="…"`; null for any other scheme. */
export function parseBearerChallenge(header: string): BearerChallenge | null {
  const m = header.match(/^Bearer\s+(.*)$/i);
  if (!m) return null;
  const params: Record<string, string> = {};
  for (const part of m[1].matchAll(/(\w+)="([^"]*)"/g)) {
    params[part[1].toLowerCase()] = part[2];
  }
  if (!params.realm) return null;
  return { realm: params.realm, service: params.service, scope: params.scope };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function toRegistryError(res: Response, what: string): Promise<RegistryError> {
  const text = await res.text().catch(() => "");
  const parsed = errorBodySchema.safeParse(parseJson(text));
  const detail = parsed.success ? parsed.data.errors[0].message : res.statusText || "request failed";
  return new RegistryError(res.status, `${what}: ${detail}`);
}

function isLocalRegistry(registry: string): boolean {
  const host = registry.split(":")[0];
  return host === "localhost" || host === "127.0.0.1";
}

/**
 * Docker Registry HTTP API V2 client for one registry. Pulls anonymous (or
 * credentialed) bearer tokens on demand from the realm a 401 names, and uses
 * the Docker Hub API where the registry alone cannot answer cheaply.
 *
 * Methods take the repository within this registry ("library/nginx").
 */
export class RegistryHttpClient {
  readonly registry: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly username?: string;
  private readonly password?: string;
  /** Bearer token per repository pull scope. */
  private readonly tokens = new Map<string, string>();

  constructor(opts: RegistryHttpClientOptions) {
    this.registry = opts.registry;
    this.timeoutMs = opts.timeoutMs;
    this.username = opts.username;
    this.password = opts.password;
    if (opts.registry === DOCKER_HUB) {
      this.baseUrl = DOCKER_HUB_REGISTRY_URL;
    } else {
      this.baseUrl = `${isLocalRegistry(opts.registry) ? "http" : "https"}://${opts.registry}`;
    }
  }

  async listTags(repository: string, signal?: AbortSignal): Promise<string[]> {
    if (this.registry === DOCKER_HUB) {
      const results = await this.fetchHubTags(repository, signal);
      return results.map((t) => t.name);
    }

    const res = await this.request(`/v2/${repository}/tags/list`, { method: "GET" }, repository, signal);
    if (!res.ok) throw await toRegistryError(res, `tags request for ${repository}`);
    const body = tagListSchema.parse(await res.json());
    return body.tags ?? [];
  }

  async getLatestTag(repository: string, signal?: AbortSignal): Promise<string> {
    const tags = await this.listTags(repository, signal);
    if (tags.includes("latest")) return "latest";
    if (tags.length === 0) throw new NoTagsFoundError(repository);
    return tags[0];
  }

  /** Manifest digest of a tag, read from the Docker-Content-Digest header of a HEAD request. */
  async getTagDigest(repository: string, tag: string, signal?: AbortSignal): Promise<string> {
    const res = await this.request(
      `/v2/${repository}/manifests/${tag}`,
      { method: "HEAD", headers: { Accept: MANIFEST_ACCEPT } },
      repository,
      signal,
    );
    if (!res.ok) throw await toRegistryError(res, `manifest request for ${repository}:${tag}`);
    const digest = res.headers.get("docker-content-digest");
    if (!digest) throw new Error(`No digest header for ${repository}:${tag}`);
    return digest;
  }

  async listTagsWithDigests(repository: string, signal?: AbortSignal): Promise<TagDigests> {
    if (this.registry === DOCKER_HUB) {
      const tagDigests: TagDigests = {};
      for (const tag of await this.fetchHubTags(repository, signal)) {
        // the manifest list digest first: it is what RepoDigests holds for multi-arch images
        const digests = [tag.digest, ...(tag.images ?? []).map((img) => img.digest)].filter(
          (d): d is string => Boolean(d),
        );
        if (digests.length > 0) tagDigests[tag.name] = digests;
      }
      return tagDigests;
    }

    const tags = await this.listTags(repository, signal);
    const tagDigests: TagDigests = {};
    for (const tag of highestTags(tags, DIGEST_LOOKUP_TAG_LIMIT)) {
      try {
        tagDigests[tag] = [await this.getTagDigest(repository, tag, signal)];
      } catch (err) {
        // tags/list may name tags whose manifests are gone
        if (err instanceof RegistryError && err.statusCode === 404) {
          logger.debug("Skipping tag without manifest", { registry: this.registry, repository, tag });
          continue;
        }
        throw err;
      }
    }
    return tagDigests;
  }

  /** One page of the Docker Hub tags API, newest first. */
  private async fetchHubTags(repository: string, signal?: AbortSignal) {
    const url = `${DOCKER_HUB_API_URL}/repositories/${repository}/tags?page_size=100`;
    const res = await fetch(url, { method: "GET", signal: this.withTimeout(signal) });
    if (!res.ok) throw await toRegistryError(res, `docker hub tags request for ${repository}`);
    return hubTagsSchema.parse(await res.json()).results;
  }

  private withTimeout(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private basicAuth(): string | null {
    if (!this.username || !this.password) return null;
    return `Basic ${Buffer.from(`${this.username}:${this.password}`).toString("base64")}`;
  }

  /**
   * Send a request to the registry. A 401 carrying a Bearer challenge fetches
   * a token and retries once; a Basic challenge retries with the configured
   * credentials.
   */
  private async request(path: string, init: RequestInit, repository: string, signal?: AbortSignal): Promise<Response> {
    const send = (authorization: string | null) => {
      const headers = new Headers(init.headers);
      if (authorization) headers.set("Authorization", authorization);
      return fetch(`${this.baseUrl}${path}`, { ...init, headers, signal: this.withTimeout(signal) });
    };

    const cached = this.tokens.get(repository);
    const res = await send(cached ? `Bearer ${cached}` : null);
    if (res.status !== 401) return res;

    const challenge = res.headers.get("www-authenticate") ?? "";
    const bearer = parseBearerChallenge(challenge);
    if (bearer) {
      const token = await this.fetchToken(bearer, repository, signal);
      this.tokens.set(repository, token);
      return send(`Bearer ${token}`);
    }
    const basic = this.basicAuth();
    if (/^Basic/i.test(challenge) && basic) return send(basic);
    return res;
  }

  private async fetchToken(challenge: BearerChallenge, repository: string, signal?: AbortSignal): Promise<string> {
    const url = new URL(challenge.realm);
    if (challenge.service) url.searchParams.set("service", challenge.service);
    url.searchParams.set("scope", challenge.scope ?? `repository:${repository}:pull`);

    const headers: Record<string, string> = {};
    const basic = this.basicAuth();
    if (basic) headers.Authorization = basic;

    const res = await fetch(url.toString(), { method: "GET", headers, signal: this.withTimeout(signal) });
    if (!res.ok) throw await toRegistryError(res, `token request for ${repository}`);
    const body = tokenResponseSchema.parse(await res.json());
    return body.token ?? body.access_token ?? "";
  }
}
