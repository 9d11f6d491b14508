// `${VAR}` or `${VAR:-fallback}`
const ENV_REF = /\$\{(\w+)(?::-([^}]*))?\}/g;

/**
 * Expand environment references in every string of a parsed YAML tree.
 * Unset or empty variables take the fallback, or "" without one.
 */
export function expandEnvVarsDeep(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REF, (_match, key: string, fallback: string | undefined) => {
      const resolved = env[key];
      return resolved ? resolved : fallback ?? "";
    });
  }
  if (Array.isArray(value)) return value.map((v) => expandEnvVarsDeep(v, env));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnvVarsDeep(v, env);
    return out;
  }
  return value;
}
