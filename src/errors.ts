export class TransportError extends Error {
  readonly host: string;

  constructor(message: string, host: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.host = host;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
