function initialSetting(): boolean {
  const override = process.env.DENSE_LINKED_VEC_DEBUG;
  if (override !== undefined && override !== "") {
    return override !== "0" && override !== "false";
  }
  return process.env.NODE_ENV !== "production";
}

let enabled = initialSetting();

/**
 * Whether the unchecked fast paths re-check their preconditions.
 *
 * Defaults to on unless `NODE_ENV=production`. The environment variable
 * `DENSE_LINKED_VEC_DEBUG` (`1`/`0`) overrides the default.
 */
export function debugAssertionsEnabled(): boolean {
  return enabled;
}

/**
 * Turns debug assertions on or off for the whole process.
 * Returns the previous setting, so tests can restore it.
 */
export function setDebugAssertions(value: boolean): boolean {
  const previous = enabled;
  enabled = value;
  return previous;
}
