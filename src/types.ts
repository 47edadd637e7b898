export type RouterProtocol = "ssh" | "telnet";

export type RouterMode = "router" | "ap";

export type RouterClientOptions = {
  host: string;
  port: number;
  protocol: RouterProtocol;
  username: string | null;
  password: string | null;
  // Private key material (PEM/OpenSSH text), SSH only.
  sshKey: string | null;
  mode: RouterMode;
  requireIp: boolean;
  cacheTimeSeconds: number;
  timeoutMs: number | null;
};

export type Device = {
  mac: string;
  ip: string | null;
  // "" means the router knows the device but no name was offered.
  hostname: string | null;
};

export type DeviceTable = Map<string, Device>;

export type ParsedRecord = Record<string, string | undefined>;

export type ByteTotals = {
  rx: number;
  tx: number;
};

export type CounterSnapshot = ByteTotals & {
  takenAt: number;
};

export type TransferRates = {
  rxBytesPerSecond: number;
  txBytesPerSecond: number;
};

export type PollReport = {
  checked_at: string;
  devices: Device[];
  totals: ByteTotals | null;
  rates: TransferRates | null;
  rates_human: [string, string] | null;
  duration_ms: number;
};
