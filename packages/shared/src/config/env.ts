export type Env = Record<string, string | undefined>;

export const envString = (env: Env, name: string, fallback: string): string => {
  const value = env[name];
  return value !== undefined && value.trim() !== '' ? value.trim() : fallback;
};

export const envOptional = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

export const envInt = (env: Env, name: string, fallback: number): number => {
  const parsed = parseInt(env[name] || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const envBool = (env: Env, name: string, fallback: boolean): boolean => {
  const value = env[name]?.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return fallback;
};
