import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { CACHE_TIME_SECONDS_DEFAULT } from "./router/counters.js";
import type { RouterClientOptions } from "./types.js";
import { getEnvBool, getEnvInt, getOptionalEnv } from "./util.js";

const DEFAULT_PORTS = { ssh: 22, telnet: 23 } as const;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.length > 0 ? value : null));

export const routerClientOptionsSchema = z
  .object({
    host: z.string().trim().min(1, "host is required"),
    port: z.number().int().min(1).max(65535).nullish(),
    protocol: z.enum(["ssh", "telnet"]).default("ssh"),
    username: optionalText,
    password: optionalText,
    sshKey: optionalText,
    mode: z.enum(["router", "ap"]).default("router"),
    requireIp: z.boolean().default(false),
    cacheTimeSeconds: z.number().min(0).default(CACHE_TIME_SECONDS_DEFAULT),
    timeoutMs: z.number().int().positive().nullish(),
  })
  .superRefine((data, ctx) => {
    if (data.protocol === "telnet") {
      if (!data.username || !data.password) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "telnet requires username and password",
          path: ["password"],
        });
      }
      if (data.sshKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "sshKey is only supported with protocol=ssh",
          path: ["sshKey"],
        });
      }
      return;
    }
    if (!data.password && !data.sshKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "ssh requires password or sshKey",
        path: ["password"],
      });
    }
  })
  .transform(
    (data): RouterClientOptions => ({
      ...data,
      port: data.port ?? DEFAULT_PORTS[data.protocol],
      timeoutMs: data.timeoutMs ?? null,
    }),
  );

export type RouterClientInput = z.input<typeof routerClientOptionsSchema>;

function formatIssues(error: z.ZodError) {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

export function parseRouterClientOptions(input: unknown): RouterClientOptions {
  const parsed = routerClientOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export type AgentConfig = {
  router: RouterClientOptions;
  pollIntervalSeconds: number;
  once: boolean;
};

function readLower(key: string, env: NodeJS.ProcessEnv) {
  return getOptionalEnv(key, env)?.toLowerCase();
}

export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const keyPath = getOptionalEnv("ROUTER_SSH_KEY_PATH", env);
  const portRaw = getEnvInt("ROUTER_PORT", 0, env);
  const timeoutRaw = getEnvInt("ROUTER_TIMEOUT_MS", 0, env);

  const router = parseRouterClientOptions({
    host: getOptionalEnv("ROUTER_HOST", env) ?? "",
    port: portRaw > 0 ? portRaw : null,
    protocol: readLower("ROUTER_PROTOCOL", env),
    username: getOptionalEnv("ROUTER_USERNAME", env),
    password: getOptionalEnv("ROUTER_PASSWORD", env),
    sshKey: keyPath ? readFileSync(keyPath, "utf8") : null,
    mode: readLower("ROUTER_MODE", env),
    requireIp: getEnvBool("ROUTER_REQUIRE_IP", false, env),
    cacheTimeSeconds: getEnvInt("ROUTER_CACHE_TIME_SECONDS", CACHE_TIME_SECONDS_DEFAULT, env),
    timeoutMs: timeoutRaw > 0 ? timeoutRaw : null,
  });

  return {
    router,
    pollIntervalSeconds: Math.max(1, getEnvInt("AGENT_POLL_INTERVAL_SECONDS", 30, env)),
    once: getEnvBool("AGENT_ONCE", false, env),
  };
}
