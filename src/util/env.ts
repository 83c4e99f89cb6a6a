/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

type Env = Record<string, string | undefined>;

export function getNodeEnv(env: Env = process.env): string {
  return env.NODE_ENV || "development";
}

export function getStage(env: Env = process.env): string {
  const stage = env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv(env) === "production" ? "prod" : "dev";
}

export function isProduction(env: Env = process.env): boolean {
  return getStage(env) === "prod" || getNodeEnv(env) === "production";
}

export function isTest(env: Env = process.env): boolean {
  return getNodeEnv(env) === "test" || env.JEST_WORKER_ID !== undefined;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  env?: Env;
}

/**
 * Reads an environment variable and runs it through `parse`.
 * Empty strings count as unset. Falls back to `defaultValue`, and throws
 * when the variable is `required` and has no default.
 */
export function getEnvVar<T>(
  name: string,
  parse: (raw: string) => T,
  options: GetEnvVarOptions<T> = {}
): T | undefined {
  const env = options.env ?? process.env;
  const candidate = env[name];

  if (candidate != null && candidate !== "") {
    return parse(candidate);
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    throw new Error(`Missing required env var: ${name}`);
  }

  return undefined;
}

export function getString(
  name: string,
  defaultValue?: string,
  env?: Env
): string | undefined {
  return getEnvVar(name, raw => raw, { defaultValue, env });
}

export function getNumber(
  name: string,
  defaultValue?: number,
  env?: Env
): number | undefined {
  return getEnvVar(
    name,
    raw => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
    { defaultValue, env }
  );
}
