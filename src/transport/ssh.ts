import ssh2 from "ssh2";
import type { Client, ConnectConfig } from "ssh2";
import { TransportError } from "../errors.js";
import { errorMessage, log } from "../util.js";
import { SerialQueue, type Transport } from "./types.js";

export type SshTransportOptions = {
  host: string;
  port: number;
  username: string | null;
  password: string | null;
  sshKey: string | null;
  timeoutMs?: number | null;
  // Re-initializations allowed per command after an exec failure.
  maxRetries?: number;
  connect?: SshConnector;
};

export interface SshConnection {
  exec(command: string): Promise<string>;
  end(): void;
  onClose(listener: () => void): void;
}

export type SshConnector = (config: ConnectConfig) => Promise<SshConnection>;

function execOnce(client: Client, command: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    client.exec(command, (err, stream) => {
      if (err) {
        reject(err);
        return;
      }

      let stdout = "";
      let stderr = "";
      stream.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf8");
      });
      stream.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf8");
      });
      stream.once("error", reject);
      stream.once("close", () => {
        if (stderr) {
          log("ssh_stderr", { command, stderr: stderr.trim() }, "debug");
        }
        resolve(stdout);
      });
    });
  });
}

export function connectSsh(config: ConnectConfig): Promise<SshConnection> {
  return new Promise<SshConnection>((resolve, reject) => {
    const client = new ssh2.Client();
    const closeListeners: Array<() => void> = [];
    let ready = false;

    client.once("ready", () => {
      ready = true;
      resolve({
        exec: (command) => execOnce(client, command),
        end: () => {
          client.end();
        },
        onClose: (listener) => {
          closeListeners.push(listener);
        },
      });
    });

    client.on("error", (err) => {
      if (!ready) {
        reject(err);
        return;
      }
      log("ssh_error", { host: config.host, error: err.message }, "warn");
    });

    // A hang-up after the server banner (e.g. during auth) emits close without error.
    client.on("close", () => {
      if (!ready) {
        reject(new Error("connection closed before the session was ready"));
        return;
      }
      for (const listener of closeListeners) listener();
    });

    client.connect(config);
  });
}

export class SshTransport implements Transport {
  private readonly options: SshTransportOptions;

  private readonly maxRetries: number;

  private readonly connect: SshConnector;

  private readonly queue = new SerialQueue();

  private connection: SshConnection | null = null;

  constructor(options: SshTransportOptions) {
    this.options = options;
    this.maxRetries = Math.max(0, options.maxRetries ?? 1);
    this.connect = options.connect ?? connectSsh;
  }

  get connected() {
    return this.connection !== null;
  }

  run(commandLine: string): Promise<string[]> {
    return this.queue.push(() => this.runWithRetry(commandLine));
  }

  async close() {
    await this.queue.push(async () => {
      const current = this.connection;
      this.connection = null;
      current?.end();
    });
  }

  private async runWithRetry(commandLine: string): Promise<string[]> {
    let session = this.connection ?? (await this.initSession());

    for (let attempt = 0; ; attempt += 1) {
      try {
        const stdout = await session.exec(commandLine);
        return stdout.split("\n");
      } catch (error) {
        if (attempt >= this.maxRetries) {
          log(
            "ssh_no_connection",
            { host: this.options.host, command: commandLine, error: errorMessage(error) },
            "error",
          );
          return [];
        }
        log(
          "ssh_retry",
          { host: this.options.host, attempt: attempt + 1, error: errorMessage(error) },
          "warn",
        );
        session = await this.initSession();
      }
    }
  }

  private async initSession(): Promise<SshConnection> {
    const previous = this.connection;
    this.connection = null;
    previous?.end();

    const { host, port, username, password, sshKey, timeoutMs } = this.options;
    const config: ConnectConfig = {
      host,
      port,
      username: username ?? undefined,
      password: password ?? undefined,
      privateKey: sshKey ?? undefined,
      readyTimeout: timeoutMs ?? undefined,
    };

    let session: SshConnection;
    try {
      session = await this.connect(config);
    } catch (error) {
      throw new TransportError(`ssh connect to ${host}:${port} failed: ${errorMessage(error)}`, host, {
        cause: error,
      });
    }

    session.onClose(() => {
      if (this.connection === session) {
        this.connection = null;
      }
    });
    this.connection = session;
    log("ssh_connect", { host, port, auth: sshKey ? "key" : "password" });
    return session;
  }
}
