export class ContainerListError extends Error {
  constructor(cause: unknown) {
    super(`failed to list containers: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "ContainerListError";
  }
}

export class CheckCancelledError extends Error {
  constructor(reason: unknown) {
    super(`update check cancelled: ${reason instanceof Error ? reason.message : String(reason)}`, { cause: reason });
    this.name = "CheckCancelledError";
  }
}
