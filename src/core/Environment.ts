// Windows treats environment variable names case-insensitively (process.env.Path and
// process.env.PATH are the same entry), but a plain object copy does not.

const sameName = (a: string, b: string, platform: NodeJS.Platform): boolean =>
  platform === 'win32' ? a.toUpperCase() === b.toUpperCase() : a === b;

export const findEnvKey = (
  env: Readonly<Record<string, string | undefined>>,
  name: string,
  platform: NodeJS.Platform = process.platform,
): string | undefined => {
  if (name in env) return name;
  return Object.keys(env).find((key) => sameName(key, name, platform));
};

export const readEnv = (
  env: Readonly<Record<string, string | undefined>>,
  name: string,
  platform: NodeJS.Platform = process.platform,
): string | undefined => {
  const key = findEnvKey(env, name, platform);
  return key === undefined ? undefined : env[key];
};

export const mergeEnvironment = (
  base: Readonly<Record<string, string | undefined>>,
  overrides: Readonly<Record<string, string>>,
  platform: NodeJS.Platform = process.platform,
): NodeJS.ProcessEnv => {
  const merged: NodeJS.ProcessEnv = { ...base };
  for (const [name, value] of Object.entries(overrides)) {
    for (const key of Object.keys(merged)) {
      if (key !== name && sameName(key, name, platform)) delete merged[key];
    }
    merged[name] = value;
  }
  return merged;
};
