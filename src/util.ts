import { setTimeout as sleepTimeout } from "node:timers/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export async function sleep(ms: number) {
  await sleepTimeout(ms);
}

export function getOptionalEnv(key: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const value = env[key];
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function getEnvInt(key: string, fallback: number, env: NodeJS.ProcessEnv = process.env) {
  const raw = env[key];
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getEnvBool(key: string, fallback: boolean, env: NodeJS.ProcessEnv = process.env) {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "true" || raw === "1" || raw === "yes";
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function minLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

export function log(event: string, payload: Record<string, unknown> = {}, level: LogLevel = "info") {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel()]) return;
  // One JSON object per line so journald / docker logs stay greppable.
  const line = JSON.stringify({ ts: new Date().toISOString(), level, event, ...payload });
  // eslint-disable-next-line no-console
  console.log(line);
}
