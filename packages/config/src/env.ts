type EnvSource = Record<string, string | undefined>;

export type EnvStringOptions = {
  defaultValue?: string;
  required?: boolean;
};

export const getEnvString = (
  env: EnvSource,
  key: string,
  opts: EnvStringOptions = {}
): string | undefined => {
  const value = env[key]?.trim();
  if (value != null && value !== "") return value;
  if (opts.defaultValue != null) return opts.defaultValue;
  if (opts.required) throw new Error(`Missing required env var: ${key}`);
  return undefined;
};

export type EnvNumberOptions = {
  defaultValue?: number;
  required?: boolean;
};

/** Read an integer env var; malformed values fall back to the default or throw. */
export const getEnvInt = (
  env: EnvSource,
  key: string,
  opts: EnvNumberOptions = {}
): number | undefined => {
  const raw = env[key]?.trim();
  if (raw == null || raw === "") {
    if (opts.defaultValue != null) return opts.defaultValue;
    if (opts.required) throw new Error(`Missing required env var: ${key}`);
    return undefined;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    if (opts.defaultValue != null) return opts.defaultValue;
    throw new Error(`Invalid integer env var: ${key}=${raw}`);
  }
  return parsed;
};

/** Read a decimal env var, e.g. a pixel ratio. */
export const getEnvNumber = (
  env: EnvSource,
  key: string,
  opts: EnvNumberOptions = {}
): number | undefined => {
  const raw = env[key]?.trim();
  if (raw == null || raw === "") {
    if (opts.defaultValue != null) return opts.defaultValue;
    if (opts.required) throw new Error(`Missing required env var: ${key}`);
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    if (opts.defaultValue != null) return opts.defaultValue;
    throw new Error(`Invalid number env var: ${key}=${raw}`);
  }
  return parsed;
};

/** Read an env var restricted to a fixed set of values (case-insensitive). */
export const getEnvChoice = <T extends string>(
  env: EnvSource,
  key: string,
  choices: readonly T[],
  defaultValue: T
): T => {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return defaultValue;
  const match = choices.find((choice) => choice.toLowerCase() === raw);
  return match ?? defaultValue;
};
