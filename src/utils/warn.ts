import { config } from '../config';

// Keys already reported through warnOnce.
const seen = new Set<string>();

/** Write a warning to stderr when `config.warnings` is enabled. */
export function warn(message: string): void {
  if (!config.warnings) return;
  // eslint-disable-next-line no-console
  console.warn(message);
}

/** Like {@link warn}, but reports a given key at most once per process. */
export function warnOnce(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  seen.add(key);
  // eslint-disable-next-line no-console
  console.warn(message);
}
