import { LRUCache } from "lru-cache";
import { logger } from "../config/logger.js";
import { DEFAULT_REGISTRY, looksLikeRegistry } from "../version/extractor.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import { RegistryHttpClient } from "./http-client.js";
import type { RegistryClient, TagDigests } from "./types.js";

/** Digests of mutable tags move often; they get a shorter TTL than tag lists. */
export const DIGEST_CACHE_TTL_MS = 5 * 60 * 1000;

const CACHE_MAX_ENTRIES = 1000;

/** What the manager needs from a per-registry client. Methods take the repository within that registry. */
export type RegistryBackend = Pick<
  RegistryHttpClient,
  "listTags" | "getLatestTag" | "getTagDigest" | "listTagsWithDigests"
>;

export interface RegistryManagerOptions {
  /** Tag list TTL (ms). 0 disables caching. */
  cacheTtlMs: number;
  timeoutMs: number;
  username?: string;
  password?: string;
  breaker?: CircuitBreaker;
  /** Builds the client for a registry host. Defaults to RegistryHttpClient. */
  clientFactory?: (registry: string) => RegistryBackend;
}

export interface RegistryRef {
  registry: string;
  repository: string;
}

/**
 * Split a `registry/repository` reference.
 *
 * - "nginx" → docker.io, library/nginx
 * - "linuxserver/plex" → docker.io, linuxserver/plex
 * - "ghcr.io/linuxserver/plex" → ghcr.io, linuxserver/plex
 */
export function parseImageRef(imageRef: string): RegistryRef {
  const parts = imageRef.split("/");
  if (parts.length === 1) return { registry: DEFAULT_REGISTRY, repository: `library/${parts[0]}` };
  if (looksLikeRegistry(parts[0])) {
    const repository = parts.slice(1).join("/");
    if (parts[0] === DEFAULT_REGISTRY && !repository.includes("/")) {
      return { registry: DEFAULT_REGISTRY, repository: `library/${repository}` };
    }
    return { registry: parts[0], repository };
  }
  return { registry: DEFAULT_REGISTRY, repository: imageRef };
}

/**
 * Routes registry calls to one client per registry host, caching results and
 * guarding each registry with a circuit breaker.
 */
export class RegistryManager implements RegistryClient {
  private readonly clients = new Map<string, RegistryBackend>();
  private readonly breaker: CircuitBreaker;
  private readonly factory: (registry: string) => RegistryBackend;
  private readonly cacheTtlMs: number;
  private readonly tagCache = new LRUCache<string, string[]>({ max: CACHE_MAX_ENTRIES });
  private readonly digestCache = new LRUCache<string, string>({ max: CACHE_MAX_ENTRIES });
  private readonly tagDigestCache = new LRUCache<string, TagDigests>({ max: CACHE_MAX_ENTRIES });

  constructor(opts: RegistryManagerOptions) {
    this.cacheTtlMs = opts.cacheTtlMs;
    this.breaker = opts.breaker ?? new CircuitBreaker();
    this.factory =
      opts.clientFactory ??
      ((registry) =>
        new RegistryHttpClient({
          registry,
          timeoutMs: opts.timeoutMs,
          username: opts.username,
          password: opts.password,
        }));
  }

  async listTags(image: string, signal?: AbortSignal): Promise<string[]> {
    const { registry, repository } = parseImageRef(image);
    return this.cached(this.tagCache, `tags:${image}`, this.cacheTtlMs, (tags) => tags.length > 0, () =>
      this.breaker.execute(registry, () => this.client(registry).listTags(repository, signal), signal),
    );
  }

  async getLatestTag(image: string, signal?: AbortSignal): Promise<string> {
    const { registry, repository } = parseImageRef(image);
    return this.breaker.execute(registry, () => this.client(registry).getLatestTag(repository, signal), signal);
  }

  async getTagDigest(imageRef: string, tag: string, signal?: AbortSignal): Promise<string> {
    const { registry, repository } = parseImageRef(imageRef);
    const ttl = this.cacheTtlMs > 0 ? Math.min(this.cacheTtlMs, DIGEST_CACHE_TTL_MS) : 0;
    return this.cached(this.digestCache, `digest:${imageRef}:${tag}`, ttl, (d) => d !== "", () =>
      this.breaker.execute(registry, () => this.client(registry).getTagDigest(repository, tag, signal), signal),
    );
  }

  async listTagsWithDigests(imageRef: string, signal?: AbortSignal): Promise<TagDigests> {
    const { registry, repository } = parseImageRef(imageRef);
    return this.cached(
      this.tagDigestCache,
      `tags-digests:${imageRef}`,
      this.cacheTtlMs,
      (m) => Object.keys(m).length > 0,
      () =>
        this.breaker.execute(
          registry,
          () => this.client(registry).listTagsWithDigests(repository, signal),
          signal,
        ),
    );
  }

  getCircuitState(registry: string) {
    return this.breaker.getState(registry);
  }

  clearCache(): void {
    this.tagCache.clear();
    this.digestCache.clear();
    this.tagDigestCache.clear();
  }

  private client(registry: string): RegistryBackend {
    let client = this.clients.get(registry);
    if (!client) {
      client = this.factory(registry);
      this.clients.set(registry, client);
      logger.debug("Created registry client", { registry });
    }
    return client;
  }

  /** Check-fetch-store. Empty results are not cached. */
  private async cached<V extends {}>(
    cache: LRUCache<string, V>,
    key: string,
    ttl: number,
    worthCaching: (value: V) => boolean,
    fetch: () => Promise<V>,
  ): Promise<V> {
    if (ttl > 0) {
      const hit = cache.get(key);
      if (hit !== undefined) return hit;
    }
    const value = await fetch();
    if (ttl > 0 && worthCaching(value)) cache.set(key, value, { ttl });
    return value;
  }
}
