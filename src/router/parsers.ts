import type { ParsedRecord } from "../types.js";
import { log } from "../util.js";

// Both 2.4GHz and 5GHz radios.
export const WL_CMD = "for dev in `nvram get wl_ifnames`; do wl -i $dev assoclist; done";
export const LEASES_CMD = "cat /var/lib/misc/dnsmasq.leases";
export const IP_NEIGH_CMD = "ip neigh";
export const ARP_CMD = "arp -n";
export const IFCONFIG_CMD = "ifconfig eth0 |grep bytes";

// assoclist AA:BB:CC:DD:EE:FF
export const WL_PATTERN = /\w+\s(?<mac>(([0-9A-F]{2}[:-]){5}([0-9A-F]{2})))/;

// 1700000000 aa:bb:cc:dd:ee:ff 192.168.1.20 laptop 01:aa:bb:cc:dd:ee:ff
export const LEASES_PATTERN =
  /\w+\s(?<mac>(([0-9a-f]{2}[:-]){5}([0-9a-f]{2})))\s(?<ip>([0-9]{1,3}[.]){3}[0-9]{1,3})\s(?<host>([^\s]+))/;

// 192.168.1.20 dev br0 lladdr aa:bb:cc:dd:ee:ff REACHABLE
// fe80::1 dev br0 lladdr aa:bb:cc:dd:ee:ff router STALE
export const IP_NEIGH_PATTERN = new RegExp(
  "(?<ip>([0-9]{1,3}[.]){3}[0-9]{1,3}|" +
    "([0-9a-fA-F]{1,4}:){1,7}[0-9a-fA-F]{0,4}(:[0-9a-fA-F]{1,4}){1,7})\\s" +
    "\\w+\\s" +
    "\\w+\\s" +
    "(\\w+\\s(?<mac>(([0-9a-f]{2}[:-]){5}([0-9a-f]{2}))))?\\s" +
    "\\s?(router)?" +
    "\\s?(nud)?" +
    "(?<status>(\\w+))",
);

// ? (192.168.1.20) at aa:bb:cc:dd:ee:ff [ether]  on br0
export const ARP_PATTERN = /.+\s\((?<ip>([0-9]{1,3}[.]){3}[0-9]{1,3})\)\s.+\s(?<mac>(([0-9a-f]{2}[:-]){5}([0-9a-f]{2})))\s.*/;

// RX bytes:1283745 (1.2 MiB)  TX bytes:938271 (916.2 KiB)
export const IFCONFIG_PATTERN = /(?<data>\d{4,})/g;

const MAC_CANONICAL = /^([0-9A-F]{2}:){5}[0-9A-F]{2}$/;

export function normalizeMac(raw: string) {
  return raw.trim().toUpperCase().replace(/-/g, ":");
}

export function isCanonicalMac(value: string) {
  return MAC_CANONICAL.test(value);
}

/**
 * Searches each line with `pattern` and returns the named groups of every hit.
 * Firmware output varies, so a line that does not match is skipped, never fatal.
 */
export function parseLines(lines: readonly string[], pattern: RegExp): ParsedRecord[] {
  const results: ParsedRecord[] = [];
  for (const line of lines) {
    const match = pattern.exec(line);
    if (!match) {
      log("parse_miss", { line }, "debug");
      continue;
    }
    results.push({ ...match.groups });
  }
  return results;
}

export function stripLeaseDuids(lines: readonly string[]) {
  return lines.filter((line) => !line.startsWith("duid "));
}

export function extractCounters(lines: readonly string[]): number[] {
  return Array.from(lines.join("\n").matchAll(IFCONFIG_PATTERN), (match) => Number(match[0]));
}
