/**
 * Environment configuration, validated with zod. `.env` is read once on the
 * first call to `getConfig()`.
 */

import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  DATA_ROOT: z.string().min(1).default("./data"),
  SHEET_CATALOG_PATH: z.string().min(1).optional(),
  PREVIEW_MAX_ROWS: z.coerce.number().int().positive().optional(),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  logLevel: LogLevel;
  dataRoot: string;
  catalogPath: string;          // sheet catalog manifest
  previewMaxRows?: number;      // CLI row cap when a request has no limit
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationError(`Invalid environment: ${keys.join(", ")}`, {
      issues: parsed.error.issues,
    });
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    dataRoot: values.DATA_ROOT,
    catalogPath: values.SHEET_CATALOG_PATH ?? path.join(values.DATA_ROOT, "catalog.json"),
    previewMaxRows: values.PREVIEW_MAX_ROWS,
  };
}

export interface LogSettings {
  level: LogLevel;
  nodeEnv: AppConfig["nodeEnv"];
}

const logSettingsSchema = z.object({
  NODE_ENV: envSchema.shape.NODE_ENV.catch("development"),
  LOG_LEVEL: envSchema.shape.LOG_LEVEL.catch("info"),
});

/**
 * Logging settings only. Unknown values fall back to the defaults, so the
 * logger can start before the full environment has been validated.
 */
export function readLogSettings(env: Record<string, string | undefined> = process.env): LogSettings {
  const values = logSettingsSchema.parse(env);
  return { level: values.LOG_LEVEL, nodeEnv: values.NODE_ENV };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    dotenv.config();
    cached = loadConfig();
  }
  return cached;
}
