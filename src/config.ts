import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import { DEFAULT_TIMEOUT } from "./client.js";
import { UsageError } from "./errors.js";
import { DEFAULT_JOB_TIMEOUT, DEFAULT_POLL_INTERVAL, MAX_POLL_INTERVAL } from "./jobs.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

const seconds = z.coerce.number().positive();

export const fileConfigSchema = z
  .object({
    hostname: z.string().min(1),
    apiKey: z.string().min(1),
    target: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535),
    protocol: z.enum(["https", "http"]),
    timeout: seconds,
    insecure: z.boolean(),
    readOnly: z.boolean(),
    logLevel: z.enum(LOG_LEVELS),
    jobPollInterval: seconds.max(MAX_POLL_INTERVAL / 1000),
    jobTimeout: seconds,
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface Config {
  hostname?: string;
  apiKey?: string;
  target?: string;
  port?: number;
  protocol: "https" | "http";
  /** Seconds */
  timeout: number;
  insecure: boolean;
  readOnly: boolean;
  logLevel: LogLevel;
  /** Seconds */
  jobPollInterval: number;
  /** Seconds */
  jobTimeout: number;
}

/** Global CLI flags as commander hands them over */
export interface CliOptions {
  hostname?: string;
  apiKey?: string;
  target?: string;
  port?: string;
  protocol?: string;
  timeout?: string;
  insecure?: boolean;
  readOnly?: boolean;
  logLevel?: string;
  verbose?: boolean;
}

export function configPath(): string {
  return process.env.PANORAMA_CONFIG || join(homedir(), ".config", "panorama-cli", "config.json");
}

export function loadFileConfig(): FileConfig {
  const path = configPath();
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err: unknown) {
    throw new UsageError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new UsageError(`Invalid config file ${path}: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

export function saveConfig(config: FileConfig): string {
  const path = configPath();
  mkdirSync(dirname(path), { recursive: true });
  const merged = fileConfigSchema.parse({ ...loadFileConfig(), ...config });
  writeFileSync(path, JSON.stringify(merged, null, 2) + "\n", { mode: 0o600 });
  return path;
}

/** Flags win over PANORAMA_* environment variables, which win over the config file */
export function resolveConfig(cliOpts: CliOptions): Config {
  const env = process.env;
  const file = loadFileConfig();

  const merged = fileConfigSchema.safeParse(
    dropEmpty({
      hostname: cliOpts.hostname || env.PANORAMA_HOSTNAME || file.hostname,
      apiKey: cliOpts.apiKey || env.PANORAMA_API_KEY || file.apiKey,
      target: cliOpts.target || env.PANORAMA_TARGET || file.target,
      port: cliOpts.port || env.PANORAMA_PORT || file.port,
      protocol: cliOpts.protocol || env.PANORAMA_PROTOCOL || file.protocol,
      timeout: cliOpts.timeout || env.PANORAMA_TIMEOUT || file.timeout,
      logLevel: cliOpts.verbose ? "op" : cliOpts.logLevel || env.PANORAMA_LOG_LEVEL || file.logLevel,
      jobPollInterval: env.PANORAMA_JOB_POLL_INTERVAL || file.jobPollInterval,
      jobTimeout: env.PANORAMA_JOB_TIMEOUT || file.jobTimeout,
    }),
  );
  if (!merged.success) {
    const issues = merged.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new UsageError(`Invalid settings: ${issues.join("; ")}`, { issues });
  }
  const settings = merged.data;

  return {
    hostname: settings.hostname,
    apiKey: settings.apiKey,
    target: settings.target,
    port: settings.port,
    protocol: settings.protocol ?? "https",
    timeout: settings.timeout ?? DEFAULT_TIMEOUT / 1000,
    insecure: !!(cliOpts.insecure || env.PANORAMA_INSECURE === "1" || file.insecure),
    readOnly: !!(cliOpts.readOnly || env.PANORAMA_READ_ONLY === "1" || file.readOnly),
    logLevel: settings.logLevel ?? "info",
    jobPollInterval: settings.jobPollInterval ?? DEFAULT_POLL_INTERVAL / 1000,
    jobTimeout: settings.jobTimeout ?? DEFAULT_JOB_TIMEOUT / 1000,
  };
}

function dropEmpty(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined && v !== ""));
}

export function requireConfig(config: Config): asserts config is Config & { hostname: string; apiKey: string } {
  if (!config.hostname) {
    console.error(
      JSON.stringify({
        error: "Missing Panorama hostname. Set via --hostname, PANORAMA_HOSTNAME env var, or run: panorama-cli configure",
      }),
    );
    process.exit(1);
  }
  if (!config.apiKey) {
    console.error(
      JSON.stringify({
        error: "Missing API key. Set via --api-key, PANORAMA_API_KEY env var, or run: panorama-cli configure",
      }),
    );
    process.exit(1);
  }
}
