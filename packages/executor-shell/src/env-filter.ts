/**
 * Host variables that never reach a job unless named in `include`.
 * Matched case-insensitively against the end of the name.
 */
const SENSITIVE_SUFFIXES = ["_API_KEY", "_SECRET", "_TOKEN", "_PASSWORD", "_CREDENTIAL", "_PRIVATE_KEY"];

const SENSITIVE_EXACT = new Set([
  "API_KEY",
  "SECRET",
  "TOKEN",
  "PASSWORD",
  "AWS_ACCESS_KEY_ID",
  "AWS_SECRET_ACCESS_KEY",
  "AWS_SESSION_TOKEN",
  "CI_JOB_TOKEN",
  "DOCKER_AUTH_CONFIG",
]);

/** What a shell needs to find its tools; inherited under every policy but none */
const CORE_VARIABLES = new Set([
  "PATH",
  "HOME",
  "USER",
  "SHELL",
  "LANG",
  "LC_ALL",
  "LC_CTYPE",
  "TERM",
  "TMPDIR",
  "TZ",
  "HTTP_PROXY",
  "HTTPS_PROXY",
  "NO_PROXY",
  "SSL_CERT_FILE",
  "SSL_CERT_DIR",
]);

function isSensitive(name: string): boolean {
  const upper = name.toUpperCase();
  if (SENSITIVE_EXACT.has(upper)) return true;
  return SENSITIVE_SUFFIXES.some((suffix) => upper.endsWith(suffix));
}

export type EnvFilterPolicy = "inherit_all" | "inherit_core" | "inherit_none";

export interface EnvFilterOptions {
  /** Names always passed through, sensitive or not */
  include?: ReadonlySet<string>;
  /** Names never passed through; wins over `include` */
  exclude?: ReadonlySet<string>;
}

/**
 * Reduce the host environment to what a job may see.
 *
 *   - "inherit_all": everything except sensitive names (default)
 *   - "inherit_core": only the core shell variables
 *   - "inherit_none": only PATH
 *
 * `include` adds names under every policy.
 */
export function filterEnv(
  env: NodeJS.ProcessEnv = process.env,
  policy: EnvFilterPolicy = "inherit_all",
  opts: EnvFilterOptions = {},
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || opts.exclude?.has(key)) continue;
    if (opts.include?.has(key) || key === "PATH") {
      result[key] = value;
      continue;
    }
    if (policy === "inherit_none") continue;
    if (CORE_VARIABLES.has(key)) {
      result[key] = value;
      continue;
    }
    if (policy === "inherit_all" && !isSensitive(key)) {
      result[key] = value;
    }
  }
  return result;
}

/** Host environment for a job: filtered host values under the job's own variables */
export function jobEnvironment(
  host: NodeJS.ProcessEnv,
  policy: EnvFilterPolicy,
  variables: Readonly<Record<string, string>>,
  opts: EnvFilterOptions = {},
): Record<string, string> {
  return { ...filterEnv(host, policy, opts), ...variables };
}
