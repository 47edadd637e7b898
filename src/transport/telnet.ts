import net from "node:net";
import { TransportError } from "../errors.js";
import { errorMessage, log } from "../util.js";
import { SerialQueue, type Transport } from "./types.js";

export type TelnetTransportOptions = {
  host: string;
  port: number;
  username: string;
  password: string;
  timeoutMs?: number | null;
};

type TelnetSession = {
  socket: net.Socket;
  prompt: Buffer;
};

type PendingRead = {
  marker: Buffer;
  resolve: (chunk: Buffer) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
};

const LOGIN_PROMPT = Buffer.from("login: ");
const PASSWORD_PROMPT = Buffer.from("Password: ");
const SHELL_MARKER = Buffer.from("#");
const NEWLINE = 0x0a;

export class TelnetTransport implements Transport {
  private readonly options: TelnetTransportOptions;

  private readonly queue = new SerialQueue();

  private socket: net.Socket | null = null;

  private session: TelnetSession | null = null;

  private buffer: Buffer = Buffer.alloc(0);

  private pending: PendingRead | null = null;

  constructor(options: TelnetTransportOptions) {
    this.options = options;
  }

  get connected() {
    return this.session !== null;
  }

  run(commandLine: string): Promise<string[]> {
    return this.queue.push(() => this.runCommand(commandLine));
  }

  async close() {
    await this.queue.push(async () => {
      const socket = this.socket;
      this.reset();
      socket?.destroy();
    });
  }

  private async runCommand(commandLine: string): Promise<string[]> {
    const session = this.session ?? (await this.login());
    session.socket.write(`${commandLine}\n`);
    const chunk = await this.readUntil(session.prompt);

    // First line echoes the command, last line is the prompt again.
    return chunk
      .toString("utf8")
      .split("\n")
      .slice(1, -1)
      .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  }

  private async login(): Promise<TelnetSession> {
    const { host, port, username, password } = this.options;
    const socket = await this.open();

    await this.readUntil(LOGIN_PROMPT);
    socket.write(`${username}\n`);
    await this.readUntil(PASSWORD_PROMPT);
    socket.write(`${password}\n`);
    const banner = await this.readUntil(SHELL_MARKER);

    const prompt = banner.subarray(banner.lastIndexOf(NEWLINE) + 1);
    const session = { socket, prompt };
    this.session = session;
    log("telnet_login", { host, port, prompt: prompt.toString("utf8").trim() });
    return session;
  }

  private open(): Promise<net.Socket> {
    const { host, port } = this.options;
    this.reset();

    return new Promise<net.Socket>((resolve, reject) => {
      const socket = net.connect({ host, port });

      const onConnectError = (err: Error) => {
        socket.destroy();
        reject(new TransportError(`telnet connect to ${host}:${port} failed: ${err.message}`, host, { cause: err }));
      };

      socket.once("error", onConnectError);
      socket.once("connect", () => {
        socket.off("error", onConnectError);
        this.socket = socket;

        socket.on("data", (chunk: Buffer) => {
          this.buffer = Buffer.concat([this.buffer, chunk]);
          this.drain();
        });
        socket.on("error", (err) => {
          this.fail(socket, new TransportError(`telnet socket error: ${err.message}`, host, { cause: err }));
        });
        socket.on("close", () => {
          this.fail(socket, new TransportError("telnet connection closed", host));
        });

        resolve(socket);
      });
    });
  }

  private readUntil(marker: Buffer): Promise<Buffer> {
    const { host, timeoutMs } = this.options;

    return new Promise<Buffer>((resolve, reject) => {
      const socket = this.socket;
      if (!socket) {
        reject(new TransportError("telnet not connected", host));
        return;
      }

      const timer = timeoutMs
        ? setTimeout(() => {
            this.fail(socket, new TransportError(`telnet timeout after ${timeoutMs}ms`, host));
            socket.destroy();
          }, timeoutMs)
        : null;

      this.pending = { marker, resolve, reject, timer };
      this.drain();
    });
  }

  private drain() {
    const pending = this.pending;
    if (!pending) return;

    const index = this.buffer.indexOf(pending.marker);
    if (index === -1) return;

    const end = index + pending.marker.length;
    const chunk = this.buffer.subarray(0, end);
    this.buffer = this.buffer.subarray(end);
    this.pending = null;
    if (pending.timer) clearTimeout(pending.timer);
    pending.resolve(chunk);
  }

  private fail(socket: net.Socket, error: TransportError) {
    // Events from a socket that was already replaced are stale.
    if (socket !== this.socket) return;

    const pending = this.pending;
    this.reset();
    if (pending) {
      if (pending.timer) clearTimeout(pending.timer);
      pending.reject(error);
      return;
    }
    log("telnet_disconnected", { host: this.options.host, error: errorMessage(error) }, "warn");
  }

  private reset() {
    this.socket = null;
    this.session = null;
    this.pending = null;
    this.buffer = Buffer.alloc(0);
  }
}
