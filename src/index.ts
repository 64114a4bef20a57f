#!/usr/bin/env node

import { Command } from "commander";
import { createRequire } from "node:module";
import { z } from "zod";
import { readFileSync } from "node:fs";
import { resolveConfig, requireConfig, saveConfig, type CliOptions, type Config, type FileConfig } from "./config.js";
import { PanoramaClient } from "./client.js";
import { formatOutput, pickFields } from "./output.js";
import { COMMANDS, GROUP_DESCRIPTIONS, camelCase, commandName, type CmdDef, type CmdParams } from "./commands.js";
import { resolveRequest, executeCommand } from "./execute.js";
import { PanoramaError } from "./errors.js";
import type { JobSettings } from "./jobs.js";
import { createLogger } from "./logger.js";
import { op } from "./op.js";
import { tree } from "./xml.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

interface GlobalOptions extends CliOptions {
  format: string;
  dryRun?: boolean;
  fields?: string;
}

// ---------------------------------------------------------------------------
// CLI setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("panorama-cli")
  .version(pkg.version)
  .description(
    "CLI for operational commands on a Panorama management server (XML API)\n\n" +
    "All output is JSON by default, for scripting and LLM tool use.\n\n" +
    "Configuration (in priority order):\n" +
    "  1. CLI flags:      --hostname, --api-key, --target\n" +
    "  2. Env vars:       PANORAMA_HOSTNAME, PANORAMA_API_KEY, PANORAMA_TARGET\n" +
    "  3. Config file:    ~/.config/panorama-cli/config.json\n\n" +
    "Quick start:\n" +
    "  $ panorama-cli configure --hostname panorama.example.com --api-key YOUR_KEY\n" +
    "  $ panorama-cli device-groups hierarchy --format table\n" +
    "  $ panorama-cli auth-keys create --hours 24",
  )
  .option("--hostname <host>", "Panorama hostname or address")
  .option("--api-key <key>", "API key for authentication")
  .option("--target <serial>", "Serial of a managed device to proxy commands to")
  .option("--port <port>", "Port, when not the protocol default")
  .option("--protocol <proto>", "https or http")
  .option("--timeout <seconds>", "Per-request timeout")
  .option("--format <fmt>", "Output format: json, jsonl, table", "json")
  .option("--insecure", "Skip TLS certificate verification (for self-signed certs)")
  .option("--dry-run", "Print the API request instead of sending it")
  .option("--fields <list>", "Comma-separated list of fields to include in output")
  .option("--log-level <level>", "fatal, error, warn, info, op, debug, trace or silent")
  .option("-v, --verbose", "Log every operational command (same as --log-level op)");

// ── configure ─────────────────────────────────────────────────────────

program
  .command("configure")
  .description("Save connection settings to ~/.config/panorama-cli/config.json")
  .option("--hostname <host>", "Panorama hostname or address")
  .option("--api-key <key>", "API key")
  .option("--target <serial>", "Default managed device serial")
  .option("--insecure", "Skip TLS certificate verification")
  .action((opts: { hostname?: string; apiKey?: string; target?: string; insecure?: boolean }) => {
    const toSave: FileConfig = {};
    if (opts.hostname) toSave.hostname = opts.hostname;
    if (opts.apiKey) toSave.apiKey = opts.apiKey;
    if (opts.target) toSave.target = opts.target;
    if (opts.insecure) toSave.insecure = true;
    if (Object.keys(toSave).length === 0) {
      console.error(JSON.stringify({ error: "Provide at least one of --hostname, --api-key, --target, --insecure" }));
      process.exit(1);
    }
    const path = saveConfig(toSave);
    console.log(JSON.stringify({ ok: true, saved: Object.keys(toSave), path }));
  });

// ── operations ────────────────────────────────────────────────────────

program
  .command("operations")
  .description("List all available operations with the XML command each one sends")
  .action(() => {
    const ops = COMMANDS.map((cmd) => ({
      command: commandName(cmd),
      summary: cmd.summary,
      readOnly: cmd.readOnly,
      args: cmd.args.map((a) => a.name),
      options: cmd.options.map((o) => o.name),
      root: cmd.request(placeholderParams(cmd)).root,
    }));
    console.log(JSON.stringify(ops, null, 2));
  });

// ── op ────────────────────────────────────────────────────────────────

program
  .command("op <xml>")
  .description("Send a raw operational command (XML string, @file.xml, or - for stdin)\n" +
    "Prints <result> as JSON: attributes become keys, text next to attributes or children is under \"text\"")
  .action(async (input: string) => {
    const globalOpts = program.opts<GlobalOptions>();
    const config = loadConfig(globalOpts);
    const xml = await resolveXml(input);

    if (globalOpts.dryRun) {
      printDryRun(config, { type: "op", cmd: xml, target: config.target });
      return;
    }

    requireConfig(config);
    try {
      const { data } = await op(connect(config), xml, tree("result"));
      print(data, globalOpts);
    } catch (err: unknown) {
      fail(err);
    }
  });

// ── mcp ───────────────────────────────────────────────────────────────

program
  .command("mcp")
  .description("Start MCP server (stdio) exposing all operations as LLM tools")
  .action(async () => {
    const { startMcpServer } = await import("./mcp.js");
    await startMcpServer();
  });

// ---------------------------------------------------------------------------
// Register all registry commands
// ---------------------------------------------------------------------------

function registerCommands() {
  const groups = new Map<string, CmdDef[]>();

  for (const cmd of COMMANDS) {
    if (cmd.group) {
      groups.set(cmd.group, [...(groups.get(cmd.group) ?? []), cmd]);
    } else {
      registerAction(program, cmd);
    }
  }

  for (const [groupName, cmds] of groups) {
    const groupCmd = program
      .command(groupName)
      .description(GROUP_DESCRIPTIONS[groupName] ?? groupName);

    for (const cmd of cmds) {
      registerAction(groupCmd, cmd);
    }
  }
}

function registerAction(parent: Command, cmd: CmdDef) {
  // Build the Commander command string: "action <arg1> [arg2]"
  const argParts = cmd.args.map((a) => (a.required ? `<${a.name}>` : `[${a.name}]`)).join(" ");
  const sub = parent
    .command(argParts ? `${cmd.action} ${argParts}` : cmd.action)
    .description(cmd.summary);

  for (const opt of cmd.options) {
    sub.option(`--${opt.name} <value>`, opt.required ? `${opt.desc} (required)` : opt.desc);
  }

  sub.action(async (...actionArgs: unknown[]) => {
    // Commander passes positional args first, then options, then the Command
    const self = actionArgs.at(-1);
    if (!(self instanceof Command)) return;
    const opts = self.opts();
    const globalOpts = program.opts<GlobalOptions>();
    const config = loadConfig(globalOpts);

    const params: CmdParams = {};
    cmd.args.forEach((arg, i) => {
      const value = self.args[i];
      if (value !== undefined) params[arg.name] = value;
    });
    for (const opt of cmd.options) {
      const value: unknown = opts[camelCase(opt.name)];
      if (value !== undefined) params[opt.name] = String(value);
    }

    try {
      if (globalOpts.dryRun) {
        printDryRun(config, resolveRequest(cmd, params, config.target));
        return;
      }

      requireConfig(config);
      const jobs: JobSettings = { pollInterval: config.jobPollInterval * 1000, timeout: config.jobTimeout * 1000 };
      const result = await executeCommand(cmd, params, connect(config), jobs);
      print(result, globalOpts, cmd.mapColumns);
    } catch (err: unknown) {
      fail(err);
    }
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function loadConfig(globalOpts: GlobalOptions): Config {
  try {
    const config = resolveConfig(globalOpts);
    if (config.insecure) process.env.NODE_TLS_REJECT_UNAUTHORIZED = "0";
    return config;
  } catch (err: unknown) {
    fail(err);
  }
}

function connect(config: Config & { hostname: string; apiKey: string }): PanoramaClient {
  return new PanoramaClient({
    hostname: config.hostname,
    apiKey: config.apiKey,
    protocol: config.protocol,
    port: config.port,
    target: config.target,
    timeout: config.timeout * 1000,
    logger: createLogger(config.logLevel),
  });
}

async function resolveXml(input: string): Promise<string> {
  if (input === "-") {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf-8").trim();
  }
  if (input.startsWith("@")) {
    return readFileSync(input.slice(1), "utf-8").trim();
  }
  return input;
}

function placeholderParams(cmd: CmdDef): CmdParams {
  const params: CmdParams = {};
  for (const p of [...cmd.args, ...cmd.options]) params[p.name] = p.type === "string" ? `<${p.name}>` : "1";
  return params;
}

function printDryRun(config: Config, req: { type: string; cmd: string; target?: string }) {
  const host = config.hostname || "<no-hostname-configured>";
  console.log(JSON.stringify({
    dryRun: true,
    method: "POST",
    url: `${config.protocol}://${host}${config.port ? `:${config.port}` : ""}/api/`,
    params: req,
    headers: { "X-PAN-KEY": config.apiKey ? "***" : "(missing)" },
  }, null, 2));
}

function print(result: unknown, globalOpts: GlobalOptions, mapColumns?: [string, string]) {
  const fields = globalOpts.fields ? globalOpts.fields.split(",").map((f) => f.trim()) : [];
  const data = fields.length ? pickFields(result, fields) : result;
  console.log(formatOutput(data, globalOpts.format, mapColumns));
}

function fail(err: unknown): never {
  if (err instanceof PanoramaError) {
    console.error(JSON.stringify({ error: err.message, kind: err.name, detail: err.detail }, null, 2));
  } else {
    console.error(JSON.stringify({ error: err instanceof Error ? err.message : String(err) }));
  }
  process.exit(1);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

registerCommands();

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(JSON.stringify({ error: String(err) }));
  process.exit(1);
});
