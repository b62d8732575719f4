/** Container labels that steer the update check. */
export const IGNORE_LABEL = "scout.ignore";
export const ALLOW_LATEST_LABEL = "scout.allow-latest";
export const TAG_REGEX_LABEL = "scout.tag-regex";
export const VERSION_MIN_LABEL = "scout.version-min";
export const VERSION_MAX_LABEL = "scout.version-max";
export const VERSION_PIN_MINOR_LABEL = "scout.version-pin-minor";

export const COMPOSE_SERVICE_LABEL = "com.docker.compose.service";
export const COMPOSE_PROJECT_LABEL = "com.docker.compose.project";

/** "true", "1" or "yes". */
export function isTruthyLabel(value: string | undefined): boolean {
  return value === "true" || value === "1" || value === "yes";
}
