import { parseRouterClientOptions, type RouterClientInput } from "../config.js";
import { createTransport, type SshConnector } from "../transport/index.js";
import type { Transport } from "../transport/types.js";
import type { ByteTotals, DeviceTable, RouterClientOptions, TransferRates } from "../types.js";
import { TransferCounters } from "./counters.js";
import { DeviceReconciler } from "./devices.js";

export type RouterClientDeps = {
  transport?: Transport;
  sshConnector?: SshConnector;
  now?: () => number;
};

export class RouterClient {
  readonly options: RouterClientOptions;

  private readonly transport: Transport;

  private readonly devices: DeviceReconciler;

  private readonly counters: TransferCounters;

  constructor(input: RouterClientInput, deps: RouterClientDeps = {}) {
    this.options = parseRouterClientOptions(input);
    this.transport = deps.transport ?? createTransport(this.options, { sshConnector: deps.sshConnector });
    this.devices = new DeviceReconciler(this.transport, {
      mode: this.options.mode,
      requireIp: this.options.requireIp,
    });
    this.counters = new TransferCounters(this.transport, {
      cacheTimeSeconds: this.options.cacheTimeSeconds,
      now: deps.now,
    });
  }

  get connected() {
    return this.transport.connected;
  }

  getConnectedDevices(): Promise<DeviceTable> {
    return this.devices.getConnectedDevices();
  }

  getWirelessDevices(): Promise<DeviceTable> {
    return this.devices.getWirelessDevices();
  }

  getArpDevices(): Promise<DeviceTable> {
    return this.devices.getArpDevices();
  }

  getNeighborDevices(current: DeviceTable = new Map()): Promise<DeviceTable> {
    return this.devices.getNeighborDevices(current);
  }

  getLeaseDevices(current: DeviceTable): Promise<DeviceTable> {
    return this.devices.getLeaseDevices(current);
  }

  getPacketsTotal(useCache = true): Promise<ByteTotals | null> {
    return this.counters.getPacketsTotal(useCache);
  }

  getRx(useCache = true): Promise<number | null> {
    return this.counters.getRx(useCache);
  }

  getTx(useCache = true): Promise<number | null> {
    return this.counters.getTx(useCache);
  }

  getCurrentTransferRates(useCache = true): Promise<TransferRates | null> {
    return this.counters.getCurrentTransferRates(useCache);
  }

  getCurrentTransferHumanReadable(useCache = true): Promise<[string, string] | null> {
    return this.counters.getCurrentTransferHumanReadable(useCache);
  }

  resetTransferRates() {
    this.counters.reset();
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}
