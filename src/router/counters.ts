import type { Transport } from "../transport/types.js";
import type { ByteTotals, CounterSnapshot, TransferRates } from "../types.js";
import { log } from "../util.js";
import { formatRates } from "./format.js";
import { IFCONFIG_CMD, extractCounters } from "./parsers.js";

export const CACHE_TIME_SECONDS_DEFAULT = 5;

export class CacheEntry<T> {
  readonly value: T;

  readonly storedAt: number;

  readonly windowMs: number;

  constructor(value: T, storedAt: number, windowMs: number) {
    this.value = value;
    this.storedAt = storedAt;
    this.windowMs = windowMs;
  }

  isValid(now: number) {
    return now - this.storedAt < this.windowMs;
  }
}

export type TransferCountersOptions = {
  cacheTimeSeconds?: number;
  now?: () => number;
};

function perSecond(delta: number, elapsedSeconds: number) {
  if (delta <= 0 || elapsedSeconds <= 0) return 0;
  return Math.ceil(delta / elapsedSeconds);
}

/**
 * Interface byte counters of the router WAN port.
 *
 * Totals are cached for `cacheTimeSeconds` so that several readers in one poll
 * cycle trigger a single `ifconfig`. Rates are computed against a separate
 * snapshot stamped with the time the totals were read: the first call only
 * records it and returns null.
 */
export class TransferCounters {
  private readonly transport: Transport;

  private readonly windowMs: number;

  private readonly now: () => number;

  private cache: CacheEntry<ByteTotals> | null = null;

  private latest: CounterSnapshot | null = null;

  constructor(transport: Transport, opts: TransferCountersOptions = {}) {
    this.transport = transport;
    this.windowMs = Math.max(0, opts.cacheTimeSeconds ?? CACHE_TIME_SECONDS_DEFAULT) * 1000;
    this.now = opts.now ?? Date.now;
  }

  async getPacketsTotal(useCache = true): Promise<ByteTotals | null> {
    const snapshot = await this.readSnapshot(useCache);
    return snapshot ? { rx: snapshot.rx, tx: snapshot.tx } : null;
  }

  async getRx(useCache = true) {
    const totals = await this.getPacketsTotal(useCache);
    return totals?.rx ?? null;
  }

  async getTx(useCache = true) {
    const totals = await this.getPacketsTotal(useCache);
    return totals?.tx ?? null;
  }

  async getCurrentTransferRates(useCache = true): Promise<TransferRates | null> {
    const current = await this.readSnapshot(useCache);
    if (!current) return null;

    const previous = this.latest;
    this.latest = current;
    if (!previous) return null;

    const elapsedSeconds = (current.takenAt - previous.takenAt) / 1000;
    return {
      rxBytesPerSecond: perSecond(current.rx - previous.rx, elapsedSeconds),
      txBytesPerSecond: perSecond(current.tx - previous.tx, elapsedSeconds),
    };
  }

  async getCurrentTransferHumanReadable(useCache = true): Promise<[string, string] | null> {
    const rates = await this.getCurrentTransferRates(useCache);
    if (!rates) return null;
    return formatRates(rates);
  }

  reset() {
    this.latest = null;
  }

  // Snapshots are stamped with the time ifconfig ran, including when served from cache.
  private async readSnapshot(useCache: boolean): Promise<CounterSnapshot | null> {
    const now = this.now();
    if (useCache && this.cache?.isValid(now)) {
      return { ...this.cache.value, takenAt: this.cache.storedAt };
    }

    const lines = await this.transport.run(IFCONFIG_CMD);
    const [rx, tx] = extractCounters(lines);
    if (rx === undefined || tx === undefined) {
      log("counters_unparsed", { lines: lines.slice(0, 5) }, "warn");
      return null;
    }

    this.cache = new CacheEntry<ByteTotals>({ rx, tx }, now, this.windowMs);
    return { rx, tx, takenAt: now };
  }
}
