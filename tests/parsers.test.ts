import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ARP_PATTERN,
  IP_NEIGH_PATTERN,
  LEASES_PATTERN,
  WL_PATTERN,
  extractCounters,
  isCanonicalMac,
  normalizeMac,
  parseLines,
  stripLeaseDuids,
} from "../src/router/parsers.js";

describe("parseLines", () => {
  afterEach(() => {
    delete process.env.LOG_LEVEL;
    vi.restoreAllMocks();
  });

  it("returns nothing for an empty command result", () => {
    expect(parseLines([], ARP_PATTERN)).toEqual([]);
  });

  it("skips lines that do not match and logs them at debug level", () => {
    process.env.LOG_LEVEL = "debug";
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const records = parseLines(["? (192.168.1.41) at <incomplete>  on br0"], ARP_PATTERN);

    expect(records).toEqual([]);
    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(entry.event).toBe("parse_miss");
    expect(entry.level).toBe("debug");
    expect(entry.line).toBe("? (192.168.1.41) at <incomplete>  on br0");
  });

  it("does not print debug misses at the default level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    parseLines(["garbage"], WL_PATTERN);
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("router output patterns", () => {
  it("reads wireless association lines", () => {
    expect(parseLines(["assoclist AA:BB:CC:DD:EE:01"], WL_PATTERN)).toEqual([{ mac: "AA:BB:CC:DD:EE:01" }]);
  });

  it("reads dnsmasq lease lines", () => {
    const line = "1700000000 aa:bb:cc:dd:ee:02 192.168.1.20 laptop 01:aa:bb:cc:dd:ee:02";
    expect(parseLines([line], LEASES_PATTERN)).toEqual([
      { mac: "aa:bb:cc:dd:ee:02", ip: "192.168.1.20", host: "laptop" },
    ]);
  });

  it("reads reachable IPv4 neighbors", () => {
    const [record] = parseLines(["192.168.1.30 dev br0 lladdr aa:bb:cc:dd:ee:03 REACHABLE"], IP_NEIGH_PATTERN);
    expect(record).toEqual({ ip: "192.168.1.30", mac: "aa:bb:cc:dd:ee:03", status: "REACHABLE" });
  });

  it("reads neighbors without a link-layer address", () => {
    const [record] = parseLines(["192.168.1.31 dev br0  FAILED"], IP_NEIGH_PATTERN);
    expect(record?.ip).toBe("192.168.1.31");
    expect(record?.mac).toBeUndefined();
    expect(record?.status).toBe("FAILED");
  });

  it("reads IPv6 router neighbors", () => {
    const [record] = parseLines(["fe80::1 dev br0 lladdr aa:bb:cc:dd:ee:04 router STALE"], IP_NEIGH_PATTERN);
    expect(record).toEqual({ ip: "fe80::1", mac: "aa:bb:cc:dd:ee:04", status: "STALE" });
  });

  it("reads arp -n lines", () => {
    const [record] = parseLines(["? (192.168.1.40) at aa:bb:cc:dd:ee:05 [ether]  on br0"], ARP_PATTERN);
    expect(record).toEqual({ ip: "192.168.1.40", mac: "aa:bb:cc:dd:ee:05" });
  });
});

describe("lease pre-filter", () => {
  it("drops duid lines", () => {
    const lines = ["duid 00:01:00:01:2a:2b:2c:2d", "1700000000 aa:bb:cc:dd:ee:02 192.168.1.20 laptop *"];
    expect(stripLeaseDuids(lines)).toEqual(["1700000000 aa:bb:cc:dd:ee:02 192.168.1.20 laptop *"]);
  });
});

describe("extractCounters", () => {
  it("takes 4+ digit tokens from busybox ifconfig", () => {
    expect(extractCounters(["          RX bytes:1283745 (1.2 MiB)  TX bytes:938271 (916.2 KiB)"])).toEqual([
      1283745, 938271,
    ]);
  });

  it("scans every output line", () => {
    expect(extractCounters(["RX packets 12 bytes 5000 (5.0 KB)", "TX packets 9 bytes 7000 (7.0 KB)"])).toEqual([
      5000, 7000,
    ]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(extractCounters([])).toEqual([]);
  });
});

describe("normalizeMac", () => {
  it("uppercases and uses colon separators", () => {
    expect(normalizeMac("aa-bb-cc-dd-ee-0f")).toBe("AA:BB:CC:DD:EE:0F");
    expect(isCanonicalMac(normalizeMac("aa:bb:cc:dd:ee:0f"))).toBe(true);
  });

  it("rejects non-canonical strings", () => {
    expect(isCanonicalMac("aa:bb:cc:dd:ee:0f")).toBe(false);
    expect(isCanonicalMac("AA-BB-CC-DD-EE-0F")).toBe(false);
  });
});
