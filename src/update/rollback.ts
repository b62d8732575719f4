import type { BatchContainerDetail, RollbackTarget } from "./types.js";

/**
 * Pick the most precise identifier to roll a container back to.
 *
 * A changed tag wins. With the tag unchanged, a recorded resolved version
 * that moved comes next, then the old digest. Nothing usable gives
 * `{ version: "", strategy: "none" }`.
 */
export function resolveRollbackVersion(detail: BatchContainerDetail): RollbackTarget {
  if (detail.oldVersion !== detail.newVersion) {
    return { version: detail.oldVersion, strategy: "tag" };
  }
  if (detail.oldResolvedVersion !== "" && detail.oldResolvedVersion !== detail.newResolvedVersion) {
    return { version: detail.oldResolvedVersion, strategy: "resolved" };
  }
  if (detail.oldDigest !== "") {
    return { version: detail.oldDigest, strategy: "digest" };
  }
  return { version: "", strategy: "none" };
}

export interface BatchRollbackPlan {
  targets: Record<string, RollbackTarget>;
  /** Containers with nothing to roll back to, in input order. */
  notRollbackable: string[];
}

/** Resolve rollback targets for every container of an update batch, keyed by container name. */
export function planBatchRollback(details: Readonly<Record<string, BatchContainerDetail>>): BatchRollbackPlan {
  const plan: BatchRollbackPlan = { targets: {}, notRollbackable: [] };
  for (const [name, detail] of Object.entries(details)) {
    const target = resolveRollbackVersion(detail);
    plan.targets[name] = target;
    if (target.strategy === "none") plan.notRollbackable.push(name);
  }
  return plan;
}
