/**
 * Environment variable parsing helpers
 *
 * Every helper reads from an explicit source (process.env by default) so the
 * loader can be exercised with a plain object. Keys are also looked up in
 * lower case, matching how the rest of the codebase reads env vars.
 * Invalid values raise ConfigurationError: a bad threshold must stop startup.
 */

import { ConfigurationError } from "../errors/app.errors";

export type EnvSource = Record<string, string | undefined>;

export const readEnv = (env: EnvSource, key: string): string | undefined => {
  const raw = env[key] ?? env[key.toLowerCase()];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === "" ? undefined : trimmed;
};

export function envStr(env: EnvSource, key: string, fallback: string): string {
  return readEnv(env, key) ?? fallback;
}

export function envOptional(env: EnvSource, key: string): string | undefined {
  return readEnv(env, key);
}

export function envNum(env: EnvSource, key: string, fallback: number): number {
  const raw = readEnv(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${key} must be a number (got "${raw}")`);
  }
  return parsed;
}

export function envInt(env: EnvSource, key: string, fallback: number): number {
  const value = envNum(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer (got ${value})`);
  }
  return value;
}

export function envBigInt(
  env: EnvSource,
  key: string,
  fallback: bigint,
): bigint {
  const raw = readEnv(env, key);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(
      `${key} must be a non-negative integer (got "${raw}")`,
    );
  }
  return BigInt(raw);
}

export function envBool(
  env: EnvSource,
  key: string,
  fallback: boolean,
): boolean {
  const raw = readEnv(env, key);
  if (raw === undefined) return fallback;
  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigurationError(`${key} must be a boolean (got "${raw}")`);
}

export function envEnum<T extends string>(
  env: EnvSource,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = readEnv(env, key);
  if (raw === undefined) return fallback;
  const match = allowed.find((candidate) => candidate === raw.toLowerCase());
  if (match === undefined) {
    throw new ConfigurationError(
      `${key} must be one of ${allowed.join(", ")} (got "${raw}")`,
    );
  }
  return match;
}
