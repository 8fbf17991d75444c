import { ConfigurationError } from "../errors.js";

export type ConfigMap = Record<string, unknown>;

export function isConfigMap(value: unknown): value is ConfigMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` onto `base`: mappings merge key by key (recursively),
 * scalars and lists from `override` replace wholesale. Neither input is
 * modified and the result shares no mappings with them.
 */
export function mergeConfig(base: ConfigMap, override: ConfigMap): ConfigMap {
  const result: ConfigMap = {};
  for (const [key, value] of Object.entries(base)) {
    result[key] = isConfigMap(value) ? mergeConfig({}, value) : value;
  }
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] =
      isConfigMap(existing) && isConfigMap(value)
        ? mergeConfig(existing, value)
        : isConfigMap(value)
          ? mergeConfig({}, value)
          : value;
  }
  return result;
}

function extendsList(name: string, config: ConfigMap): string[] {
  const ext = config.extends;
  if (ext === undefined) return [];
  if (typeof ext === "string") return [ext];
  if (Array.isArray(ext) && ext.every((e): e is string => typeof e === "string")) return ext;
  throw new ConfigurationError("'extends' must be a job name or a list of job names", name);
}

/** Keywords `default:` supplies when a job does not set them itself */
export const DEFAULT_KEYWORDS = [
  "image",
  "services",
  "tags",
  "retry",
  "cache",
  "artifacts",
  "before_script",
  "after_script",
  "timeout",
  "interruptible",
] as const;

/**
 * Flatten `extends` chains for every entry of `raw` (jobs and hidden
 * templates alike), then apply `defaults` to keywords still unset.
 *
 * Bases merge left to right with the child last. Unknown or cyclic
 * references raise ConfigurationError.
 */
export function resolveTemplates(
  raw: ReadonlyMap<string, ConfigMap>,
  defaults: ConfigMap = {},
): Map<string, ConfigMap> {
  const resolved = new Map<string, ConfigMap>();

  const resolve = (name: string, chain: string[]): ConfigMap => {
    const done = resolved.get(name);
    if (done) return done;

    if (chain.includes(name)) {
      throw new ConfigurationError(
        `circular extends: ${[...chain, name].join(" -> ")}`,
        chain[0],
      );
    }
    const config = raw.get(name);
    if (!config) {
      throw new ConfigurationError(`extends unknown job or template '${name}'`, chain[chain.length - 1]);
    }

    let merged: ConfigMap = {};
    for (const base of extendsList(name, config)) {
      merged = mergeConfig(merged, resolve(base, [...chain, name]));
    }
    merged = mergeConfig(merged, config);
    delete merged.extends;

    resolved.set(name, merged);
    return merged;
  };

  for (const name of raw.keys()) resolve(name, []);

  const withDefaults = new Map<string, ConfigMap>();
  for (const [name, config] of resolved) {
    const job: ConfigMap = { ...config };
    for (const key of DEFAULT_KEYWORDS) {
      if (job[key] === undefined && defaults[key] !== undefined) {
        const value = defaults[key];
        job[key] = isConfigMap(value) ? mergeConfig({}, value) : value;
      }
    }
    withDefaults.set(name, job);
  }
  return withDefaults;
}
