// src/core/config/env.ts

import dotenv from "dotenv";
import fs from "fs";
import type { LevelWithSilent } from "pino";
import { ConfigError } from "../errors";

export type EnvSource = Record<string, string | undefined>;

export type AppConfig = {
  /** Free-form deployment label, e.g. "production" or "development". */
  environment: string;
  /** Shown as-is, never parsed. */
  databaseUrl: string;
  host: string;
  port: number;
  corsOrigins: string[];
  logLevel: LevelWithSilent;
  isDevelopment: boolean;
};

export const DEFAULT_ENVIRONMENT = "development";
export const DEFAULT_DATABASE_URL = "not configured";
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 8000;
export const DEFAULT_CORS_ORIGINS = ["http://localhost:3000", "http://frontend:3000"];

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function nonEmpty(v: string | undefined): string | undefined {
  const s = (v ?? "").trim();
  return s ? s : undefined;
}

/**
 * Loads `.env.local` from the working directory into process.env.
 * Values in the file win over the shell, like the original deployment did it.
 * Returns false when there is no such file.
 */
export function loadDotenv(path = ".env.local"): boolean {
  if (!fs.existsSync(path)) return false;
  const result = dotenv.config({ path, override: true });
  if (result.error) throw result.error;
  return true;
}

export function resolveEnvironment(env: EnvSource): string {
  return nonEmpty(env.PYTHON_ENV) ?? DEFAULT_ENVIRONMENT;
}

export function resolveDatabaseUrl(env: EnvSource): string {
  return nonEmpty(env.DATABASE_URL) ?? DEFAULT_DATABASE_URL;
}

function parsePort(raw: string | undefined): number {
  const s = nonEmpty(raw);
  if (s === undefined) return DEFAULT_PORT;
  if (!/^\d+$/.test(s)) throw new ConfigError("PORT", `expected an integer, got "${s}"`);
  const port = Number(s);
  if (port < 1 || port > 65535) {
    throw new ConfigError("PORT", `must be between 1 and 65535, got ${port}`);
  }
  return port;
}

function parseCorsOrigins(raw: string | undefined): string[] {
  const s = nonEmpty(raw);
  if (s === undefined) return [...DEFAULT_CORS_ORIGINS];
  return s
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

function isLogLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === v);
}

function parseLogLevel(raw: string | undefined, isDevelopment: boolean): LevelWithSilent {
  const s = nonEmpty(raw)?.toLowerCase();
  if (s === undefined) return isDevelopment ? "debug" : "info";
  if (!isLogLevel(s)) {
    throw new ConfigError("LOG_LEVEL", `expected one of ${LOG_LEVELS.join(", ")}, got "${s}"`);
  }
  return s;
}

export function loadConfig(env: EnvSource): AppConfig {
  const environment = resolveEnvironment(env);
  const isDevelopment = environment.toLowerCase() === DEFAULT_ENVIRONMENT;

  return {
    environment,
    databaseUrl: resolveDatabaseUrl(env),
    host: nonEmpty(env.HOST) ?? DEFAULT_HOST,
    port: parsePort(env.PORT),
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
    logLevel: parseLogLevel(env.LOG_LEVEL, isDevelopment),
    isDevelopment,
  };
}
