#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import { loadAgentConfig } from "./config.js";
import { runPollLoop } from "./poller.js";
import { RouterClient } from "./router/client.js";
import { errorMessage, log } from "./util.js";

async function main() {
  const config = loadAgentConfig();
  const client = new RouterClient(config.router);
  let stopping = false;

  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log("agent_stop", { signal });
    client
      .close()
      .catch((e) => log("close_failed", { error: errorMessage(e) }, "warn"))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  log("agent_start", {
    host: config.router.host,
    port: config.router.port,
    protocol: config.router.protocol,
    mode: config.router.mode,
    require_ip: config.router.requireIp,
    cache_time_seconds: config.router.cacheTimeSeconds,
    poll_interval_seconds: config.pollIntervalSeconds,
    once: config.once,
  });

  await runPollLoop(client, {
    intervalSeconds: config.pollIntervalSeconds,
    once: config.once,
    shouldStop: () => stopping,
  });

  if (!stopping) {
    await client.close();
  }
}

main().catch((e) => {
  log("fatal", { error: errorMessage(e) }, "error");
  process.exit(1);
});
