import { ConfigurationError } from "../errors/app.errors";

/** Where settings are read from: explicit overrides first, then process.env */
export type EnvSource = Record<string, string | undefined>;

export function createEnvReader(
  overrides: EnvSource = {},
  env: EnvSource = process.env,
): (key: string) => string | undefined {
  return (key: string): string | undefined => {
    const value = overrides[key] ?? env[key] ?? env[key.toLowerCase()];
    return value === "" ? undefined : value;
  };
}

type Read = (key: string) => string | undefined;

export function envStr(read: Read, key: string, fallback: string): string {
  return read(key) ?? fallback;
}

export function envNum(read: Read, key: string, fallback: number): number {
  const raw = read(key);
  if (raw === undefined) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Invalid ${key}: "${raw}" is not a number`);
  }
  return parsed;
}

export function envBool(read: Read, key: string, fallback: boolean): boolean {
  const raw = read(key);
  if (raw === undefined) return fallback;

  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigurationError(`Invalid ${key}: "${raw}" is not a boolean`);
  }
}

export function envEnum<T extends string>(
  read: Read,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = read(key);
  if (raw === undefined) return fallback;

  const normalized = raw.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw new ConfigurationError(
      `Invalid ${key}: "${raw}" (expected one of ${allowed.join(", ")})`,
    );
  }
  return match;
}

/** Comma-separated values, or a JSON array of strings */
export function envList(read: Read, key: string, fallback: readonly string[] = []): string[] {
  const raw = read(key);
  if (raw === undefined) return [...fallback];

  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      throw new ConfigurationError(`Invalid ${key}: not a JSON array`);
    }
    if (!Array.isArray(parsed)) {
      throw new ConfigurationError(`Invalid ${key}: not a JSON array`);
    }
    return parsed.map(String).map((item) => item.trim()).filter(Boolean);
  }

  return trimmed
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
