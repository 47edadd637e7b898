import { ConfigError } from "../errors.js";
import type { RouterClientOptions } from "../types.js";
import { SshTransport, type SshConnector } from "./ssh.js";
import { TelnetTransport } from "./telnet.js";
import type { Transport } from "./types.js";

export { SshTransport, connectSsh } from "./ssh.js";
export type { SshConnection, SshConnector, SshTransportOptions } from "./ssh.js";
export { TelnetTransport } from "./telnet.js";
export type { TelnetTransportOptions } from "./telnet.js";
export { SerialQueue } from "./types.js";
export type { Transport } from "./types.js";

export function createTransport(
  options: Pick<RouterClientOptions, "host" | "port" | "protocol" | "username" | "password" | "sshKey" | "timeoutMs">,
  opts: { sshConnector?: SshConnector } = {},
): Transport {
  if (options.protocol === "telnet") {
    if (!options.username || !options.password) {
      throw new ConfigError(["telnet requires username and password"]);
    }
    return new TelnetTransport({
      host: options.host,
      port: options.port,
      username: options.username,
      password: options.password,
      timeoutMs: options.timeoutMs,
    });
  }

  return new SshTransport({
    host: options.host,
    port: options.port,
    username: options.username,
    password: options.password,
    sshKey: options.sshKey,
    timeoutMs: options.timeoutMs,
    connect: opts.sshConnector,
  });
}
