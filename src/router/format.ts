import type { TransferRates } from "../types.js";

const UNITS = ["B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"] as const;

export function formatBytes(bytes: number) {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";
  const exponent = Math.min(UNITS.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)));
  const value = Math.round((bytes / 1024 ** exponent) * 100) / 100;
  return `${value} ${UNITS[exponent]}`;
}

export function formatRates(rates: TransferRates): [string, string] {
  return [`${formatBytes(rates.rxBytesPerSecond)}/s`, `${formatBytes(rates.txBytesPerSecond)}/s`];
}
