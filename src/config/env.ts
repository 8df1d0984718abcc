/**
 * Environment configuration for tasktree
 *
 * TASKTREE_INTERVAL_MS   animator tick in milliseconds
 * TASKTREE_COLOR         auto | always | never
 * TASKTREE_STREAM        stdout | stderr
 * TASKTREE_LOG_LEVEL     tslog level name
 * TASKTREE_LOG_FORMAT    hidden | pretty | json
 * NO_COLOR               any non-empty value means color "never"
 */

export const ENV_KEYS = {
  intervalMs: "TASKTREE_INTERVAL_MS",
  color: "TASKTREE_COLOR",
  stream: "TASKTREE_STREAM",
  logLevel: "TASKTREE_LOG_LEVEL",
  logFormat: "TASKTREE_LOG_FORMAT",
} as const;

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Read raw configuration values from the environment. Values are not
 * validated here; the schema reports bad ones.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const interval = read(env, ENV_KEYS.intervalMs);
  if (interval !== undefined) {
    // Leave non-numeric text as-is so validation names the variable's field
    config["intervalMs"] = /^-?\d+(\.\d+)?$/.test(interval) ? Number(interval) : interval;
  }

  const color = read(env, ENV_KEYS.color);
  if (color !== undefined) {
    config["color"] = color.toLowerCase();
  } else if (read(env, "NO_COLOR") !== undefined) {
    config["color"] = "never";
  }

  for (const field of ["stream", "logLevel", "logFormat"] as const) {
    const value = read(env, ENV_KEYS[field]);
    if (value !== undefined) {
      config[field] = value.toLowerCase();
    }
  }

  return config;
}
