// Resolves server settings from the environment and explicit overrides.
import path from "path";
import type { AppConfig, ConfigOverrides, Env } from "./types.js";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 5000;
export const DEFAULT_DATABASE_FILE = "inventory.db";
export const MEMORY_DATABASE = ":memory:";

// Treat blank env values as unset.
const readEnv = (env: Env, key: string) => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const parsePort = (value: string | number) => {
  const port = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
};

const resolveDatabasePath = (databasePath: string) =>
  databasePath === MEMORY_DATABASE ? databasePath : path.resolve(databasePath);

// Overrides win over env; undefined overrides are ignored.
export const loadConfig = (env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig => {
  const host = overrides.host ?? readEnv(env, "HOST") ?? DEFAULT_HOST;
  const port = parsePort(overrides.port ?? readEnv(env, "PORT") ?? DEFAULT_PORT);
  const databasePath = overrides.databasePath ?? readEnv(env, "DATABASE_PATH") ?? DEFAULT_DATABASE_FILE;

  return {
    host,
    port,
    databasePath: resolveDatabasePath(databasePath)
  };
};
