import type { Transport } from "../transport/types.js";
import type { Device, DeviceTable, RouterMode } from "../types.js";
import {
  ARP_CMD,
  ARP_PATTERN,
  IP_NEIGH_CMD,
  IP_NEIGH_PATTERN,
  LEASES_CMD,
  LEASES_PATTERN,
  WL_CMD,
  WL_PATTERN,
  normalizeMac,
  parseLines,
  stripLeaseDuids,
} from "./parsers.js";

export type DeviceReconcilerOptions = {
  mode: RouterMode;
  requireIp: boolean;
};

// dnsmasq writes "*" when the client offered no hostname.
const NO_HOSTNAME = "*";

function mergeInto(target: DeviceTable, source: DeviceTable) {
  for (const [mac, device] of source) {
    target.set(mac, device);
  }
}

/**
 * Builds the connected-device table from four router sources. Order encodes
 * trust: wireless association proves presence, ARP and neighbor tables give the
 * live IP, and DHCP leases only name devices that are already known.
 */
export class DeviceReconciler {
  private readonly transport: Transport;

  private readonly options: DeviceReconcilerOptions;

  constructor(transport: Transport, options: DeviceReconcilerOptions) {
    this.transport = transport;
    this.options = options;
  }

  async getWirelessDevices(): Promise<DeviceTable> {
    const devices: DeviceTable = new Map();
    const lines = await this.transport.run(WL_CMD);
    for (const record of parseLines(lines, WL_PATTERN)) {
      if (!record.mac) continue;
      const mac = normalizeMac(record.mac);
      devices.set(mac, { mac, ip: null, hostname: null });
    }
    return devices;
  }

  async getArpDevices(): Promise<DeviceTable> {
    const devices: DeviceTable = new Map();
    const lines = await this.transport.run(ARP_CMD);
    for (const record of parseLines(lines, ARP_PATTERN)) {
      if (!record.mac) continue;
      const mac = normalizeMac(record.mac);
      devices.set(mac, { mac, ip: record.ip ?? null, hostname: null });
    }
    return devices;
  }

  async getNeighborDevices(current: DeviceTable): Promise<DeviceTable> {
    const devices: DeviceTable = new Map();
    const lines = await this.transport.run(IP_NEIGH_CMD);
    for (const record of parseLines(lines, IP_NEIGH_PATTERN)) {
      // Anything but REACHABLE (STALE, FAILED, DELAY, ...) is dropped whole.
      if (record.status?.toUpperCase() !== "REACHABLE") continue;
      if (!record.mac) continue;
      const mac = normalizeMac(record.mac);
      const previousIp = current.get(mac)?.ip ?? null;
      devices.set(mac, { mac, ip: record.ip ?? previousIp, hostname: null });
    }
    return devices;
  }

  async getLeaseDevices(current: DeviceTable): Promise<DeviceTable> {
    const devices: DeviceTable = new Map();
    const lines = stripLeaseDuids(await this.transport.run(LEASES_CMD));
    for (const record of parseLines(lines, LEASES_PATTERN)) {
      if (!record.mac) continue;
      const mac = normalizeMac(record.mac);
      if (!current.has(mac)) continue;
      const host = record.host ?? null;
      devices.set(mac, {
        mac,
        ip: record.ip ?? null,
        hostname: host === NO_HOSTNAME ? "" : host,
      });
    }
    return devices;
  }

  async getConnectedDevices(): Promise<DeviceTable> {
    const devices: DeviceTable = new Map();
    mergeInto(devices, await this.getWirelessDevices());
    mergeInto(devices, await this.getArpDevices());
    mergeInto(devices, await this.getNeighborDevices(devices));
    if (this.options.mode !== "ap") {
      mergeInto(devices, await this.getLeaseDevices(devices));
    }

    if (!this.options.requireIp) return devices;

    const withIp: DeviceTable = new Map();
    for (const [mac, device] of devices) {
      if (device.ip !== null) withIp.set(mac, device);
    }
    return withIp;
  }
}

export function sortDevices(devices: DeviceTable): Device[] {
  return Array.from(devices.values()).sort((a, b) => a.mac.localeCompare(b.mac));
}
