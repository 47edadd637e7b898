import { EventEmitter } from "node:events";
import type { ConnectConfig } from "ssh2";

export class FakeChannel extends EventEmitter {
  readonly stderr = new EventEmitter();
}

type ExecCallback = (err: Error | undefined, channel: FakeChannel) => void;

type Behaviour = {
  connect: (client: FakeSshClient) => void;
  // Error handed to the exec callback instead of a channel.
  openError: Error | null;
  exec: (command: string, channel: FakeChannel) => void;
};

function defaultBehaviour(): Behaviour {
  return {
    connect: (client) => client.emit("ready"),
    openError: null,
    exec: (_command, channel) => {
      channel.emit("close");
    },
  };
}

/** Stands in for `ssh2.Client`: emits the same ready/error/close and channel events. */
export class FakeSshClient extends EventEmitter {
  static instances: FakeSshClient[] = [];

  static behaviour: Behaviour = defaultBehaviour();

  config: ConnectConfig | null = null;

  readonly commands: string[] = [];

  ended = false;

  constructor() {
    super();
    FakeSshClient.instances.push(this);
  }

  static reset() {
    FakeSshClient.instances = [];
    FakeSshClient.behaviour = defaultBehaviour();
  }

  static last() {
    const client = FakeSshClient.instances.at(-1);
    if (!client) throw new Error("no ssh client was created");
    return client;
  }

  connect(config: ConnectConfig) {
    this.config = config;
    setImmediate(() => FakeSshClient.behaviour.connect(this));
    return this;
  }

  exec(command: string, callback: ExecCallback) {
    this.commands.push(command);
    const channel = new FakeChannel();
    setImmediate(() => {
      const { openError, exec } = FakeSshClient.behaviour;
      if (openError) {
        callback(openError, channel);
        return;
      }
      callback(undefined, channel);
      exec(command, channel);
    });
    return true;
  }

  end() {
    this.ended = true;
    setImmediate(() => this.emit("close"));
    return this;
  }
}
