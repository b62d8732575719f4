import type { ChangeType } from "../version/types.js";

export type CheckStatus =
  | "UP_TO_DATE"
  /** Up to date on :latest while a semver tag for the same content exists. */
  | "UP_TO_DATE_PINNABLE"
  | "UPDATE_AVAILABLE"
  /** Built locally; nothing to compare against. Never counted as failed. */
  | "LOCAL_IMAGE"
  /** Opted out with the scout.ignore label. */
  | "IGNORED"
  | "CHECK_FAILED";

/** One report row. `error` is non-empty exactly when `status` is CHECK_FAILED. */
export interface ContainerUpdate {
  containerId: string;
  containerName: string;
  /** Compose service, "" outside a stack. */
  serviceName: string;
  image: string;
  currentTag: string;
  currentVersion: string;
  /** Newest acceptable version; "" when the check failed. */
  latestVersion: string;
  currentDigest: string;
  latestDigest: string;
  changeType: ChangeType;
  usingLatestTag: boolean;
  recommendedTag: string;
  status: CheckStatus;
  error: string;
}

export interface CheckReport {
  /** Checks dispatched, whether or not they finished. */
  totalChecked: number;
  updatesFound: number;
  upToDate: number;
  localImages: number;
  ignored: number;
  failed: number;
  /** Completed rows in completion order. */
  updates: readonly ContainerUpdate[];
}

/** Result of a run. Listing failure and cancellation arrive in `error`; the report is always present. */
export interface CheckOutcome {
  report: CheckReport;
  error: Error | null;
}

/** A container's recorded version transition. Empty string means unknown. */
export interface BatchContainerDetail {
  oldVersion: string;
  newVersion: string;
  oldResolvedVersion: string;
  newResolvedVersion: string;
  oldDigest: string;
  newDigest: string;
}

export type RollbackStrategy = "tag" | "resolved" | "digest" | "none";

export interface RollbackTarget {
  version: string;
  strategy: RollbackStrategy;
}

export function emptyReport(): CheckReport {
  return { totalChecked: 0, updatesFound: 0, upToDate: 0, localImages: 0, ignored: 0, failed: 0, updates: [] };
}
