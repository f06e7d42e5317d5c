import dotenv from "dotenv";
import { parseLogLevel, type LogLevel } from "./logger.js";

dotenv.config({ path: process.env.ENV_FILE ?? ".env.local" });
dotenv.config();

export function getEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined || value === "") {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function getOptionalEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function getBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

export function getNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${name} is not a number: ${raw}`);
  }
  return value;
}

export function getRangedNumberEnv(name: string, fallback: number, min: number, max: number): number {
  const value = getNumberEnv(name, fallback);
  if (value < min || value > max) {
    throw new Error(`Environment variable ${name} must be between ${min} and ${max}: ${value}`);
  }
  return value;
}

export interface ServiceRuntimeConfig {
  serviceName: string;
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  apiTimeoutMs: number;
  apiRetries: number;
  apiBackoffMs: number;
}

export function loadServiceRuntimeConfig(serviceName: string, defaultPort: number): ServiceRuntimeConfig {
  return {
    serviceName,
    port: getNumberEnv("PORT", defaultPort),
    nodeEnv: process.env.NODE_ENV ?? "development",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    apiTimeoutMs: getNumberEnv("API_TIMEOUT_MS", 3000),
    apiRetries: getNumberEnv("API_RETRIES", 1),
    apiBackoffMs: getNumberEnv("API_BACKOFF_MS", 200)
  };
}
