import type { RouterClient } from "./router/client.js";
import { sortDevices } from "./router/devices.js";
import { formatRates } from "./router/format.js";
import type { PollReport } from "./types.js";
import { errorMessage, log, sleep } from "./util.js";

export async function pollOnce(client: RouterClient): Promise<PollReport> {
  const startedAt = Date.now();
  const checkedAt = new Date(startedAt).toISOString();

  const devices = await client.getConnectedDevices();
  const totals = await client.getPacketsTotal();
  // Reuses the totals above while the cache window holds.
  const rates = await client.getCurrentTransferRates();

  return {
    checked_at: checkedAt,
    devices: sortDevices(devices),
    totals,
    rates,
    rates_human: rates ? formatRates(rates) : null,
    duration_ms: Date.now() - startedAt,
  };
}

export type PollLoopOptions = {
  intervalSeconds: number;
  once: boolean;
  shouldStop?: () => boolean;
};

export async function runPollLoop(client: RouterClient, opts: PollLoopOptions) {
  let cycle = 0;

  while (!opts.shouldStop?.()) {
    cycle += 1;
    try {
      const report = await pollOnce(client);
      log("poll_result", {
        cycle,
        device_count: report.devices.length,
        devices: report.devices,
        rx_bytes: report.totals?.rx ?? null,
        tx_bytes: report.totals?.tx ?? null,
        rx_bps: report.rates?.rxBytesPerSecond ?? null,
        tx_bps: report.rates?.txBytesPerSecond ?? null,
        rates_human: report.rates_human,
        duration_ms: report.duration_ms,
      });
    } catch (e) {
      // One bad cycle (router rebooting, auth hiccup) must not stop the agent.
      log("poll_failed", { cycle, error: errorMessage(e) }, "error");
    }

    if (opts.once) return;
    await sleep(opts.intervalSeconds * 1000);
  }
}
