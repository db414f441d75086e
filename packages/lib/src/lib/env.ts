type EnvSource = Readonly<Record<string, string | undefined>>;

// Guarded so the module can load where `process` is absent.
export const processEnv = (): EnvSource =>
  typeof process === "undefined" ? {} : process.env;

export const readEnv = (
  name: string,
  env: EnvSource = processEnv(),
): string | undefined => {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

export const readEnvFlag = (
  name: string,
  env: EnvSource = processEnv(),
): boolean => {
  const raw = readEnv(name, env);
  if (!raw) return false;
  const normalized = raw.toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

/** Positive integer from the environment, or undefined when unset/invalid. */
export const readEnvInteger = (
  name: string,
  env: EnvSource = processEnv(),
): number | undefined => {
  const raw = readEnv(name, env);
  if (!raw || !/^\d+$/.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  return value > 0 ? value : undefined;
};
