import type { Container } from "../docker/types.js";
import { COMPOSE_PROJECT_LABEL, COMPOSE_SERVICE_LABEL } from "./labels.js";

/** Compose service name, or "" when the container is not part of a stack. */
export function extractServiceName(container: Container | undefined): string {
  return container?.labels[COMPOSE_SERVICE_LABEL] ?? "";
}

/** Service names of the named containers, in container order, skipping those outside a stack. */
export function extractServiceNames(containers: readonly Container[], names: readonly string[]): string[] {
  const wanted = new Set(names);
  const services: string[] = [];
  for (const container of containers) {
    if (!wanted.has(container.name)) continue;
    const service = extractServiceName(container);
    if (service) services.push(service);
  }
  return services;
}

export function extractStackName(container: Container | undefined): string {
  return container?.labels[COMPOSE_PROJECT_LABEL] ?? "";
}
