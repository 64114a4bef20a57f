import { createRequire } from "node:module";
import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { clock } from "./clock.js";
import { PanoramaClient } from "./client.js";
import { COMMANDS, toolName, type CmdDef, type CmdParams, type ParamDef } from "./commands.js";
import { resolveConfig, type Config } from "./config.js";
import { deviceGroupHierarchy } from "./devicegroups.js";
import { PanoramaError } from "./errors.js";
import { executeCommand } from "./execute.js";
import type { JobSettings } from "./jobs.js";
import { createLogger } from "./logger.js";
import { systemInfo } from "./system.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

// ---------------------------------------------------------------------------
// Build JSON Schema input for each tool
// ---------------------------------------------------------------------------

function paramSchema(param: ParamDef): Record<string, unknown> {
  return { type: param.type, description: param.desc };
}

export function buildInputSchema(cmd: CmdDef) {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const param of [...cmd.args, ...cmd.options]) {
    properties[param.name] = paramSchema(param);
    if (param.required) required.push(param.name);
  }

  return {
    type: "object" as const,
    properties,
    required: required.length ? required : undefined,
  };
}

/** Tool arguments arrive as JSON values; commands take strings like the CLI does */
function toParams(args: Record<string, unknown> | undefined): CmdParams {
  const params: CmdParams = {};
  for (const [k, v] of Object.entries(args ?? {})) {
    if (v !== undefined && v !== null) params[k] = String(v);
  }
  return params;
}

const toolMap = new Map<string, CmdDef>(COMMANDS.map((cmd) => [toolName(cmd), cmd]));

function errorText(err: unknown): string {
  if (err instanceof PanoramaError) {
    return JSON.stringify({ error: err.message, kind: err.name, detail: err.detail }, null, 2);
  }
  return JSON.stringify({ error: err instanceof Error ? err.message : String(err) }, null, 2);
}

// ---------------------------------------------------------------------------
// MCP Server
// ---------------------------------------------------------------------------

export async function startMcpServer(customTransport?: Transport): Promise<Server> {
  const config: Config = resolveConfig({});
  // Management servers commonly run with self-signed certificates
  if (config.insecure) process.env.NODE_TLS_REJECT_UNAUTHORIZED = "0";
  const readOnly = config.readOnly;
  const logger = createLogger(config.logLevel);
  const jobs: JobSettings = { pollInterval: config.jobPollInterval * 1000, timeout: config.jobTimeout * 1000 };

  const server = new Server(
    { name: "panorama-cli", version: pkg.version },
    { capabilities: { tools: {}, resources: {} } },
  );

  // Helper: create an authenticated client or throw
  function getClient(): PanoramaClient {
    if (!config.hostname || !config.apiKey) {
      throw new Error(
        "Missing Panorama configuration. Set PANORAMA_HOSTNAME and PANORAMA_API_KEY environment variables, or run: panorama-cli configure",
      );
    }
    return new PanoramaClient({
      hostname: config.hostname,
      apiKey: config.apiKey,
      protocol: config.protocol,
      port: config.port,
      target: config.target,
      timeout: config.timeout * 1000,
      logger,
    });
  }

  // ── ListTools ─────────────────────────────────────────────────────
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const cmds = readOnly ? COMMANDS.filter((cmd) => cmd.readOnly) : COMMANDS;
    const tools = cmds.map((cmd) => ({
      name: toolName(cmd),
      description: cmd.summary,
      inputSchema: buildInputSchema(cmd),
    }));
    return { tools };
  });

  // ── CallTool ──────────────────────────────────────────────────────
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const cmd = toolMap.get(name);

    if (!cmd) {
      return {
        content: [{ type: "text", text: JSON.stringify({ error: `Unknown tool: ${name}` }) }],
        isError: true,
      };
    }

    if (readOnly && !cmd.readOnly) {
      return {
        content: [{
          type: "text",
          text: JSON.stringify({
            error: `Read-only mode: ${name} changes device state and is not allowed`,
            hint: "Unset PANORAMA_READ_ONLY to enable write operations",
          }),
        }],
        isError: true,
      };
    }

    try {
      const result = await executeCommand(cmd, toParams(args), getClient(), jobs);
      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
      };
    } catch (err: unknown) {
      return {
        content: [{ type: "text", text: errorText(err) }],
        isError: true,
      };
    }
  });

  // ── ListResources ─────────────────────────────────────────────────
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: "panorama://clock",
          name: "Device clock",
          description: "Current device time and the time zone it reports",
          mimeType: "application/json",
        },
        {
          uri: "panorama://system-info",
          name: "System info",
          description: "Hostname, model, serial and software version",
          mimeType: "application/json",
        },
        {
          uri: "panorama://device-groups",
          name: "Device group hierarchy",
          description: "Each device group mapped to its parent (\"\" = top level)",
          mimeType: "application/json",
        },
      ],
    };
  });

  // ── ReadResource ──────────────────────────────────────────────────
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    const client = getClient();

    let result: unknown;
    switch (uri) {
      case "panorama://clock": {
        const now = await clock(client);
        result = { time: now.toISO(), zone: now.zoneName };
        break;
      }
      case "panorama://system-info":
        result = await systemInfo(client);
        break;
      case "panorama://device-groups":
        result = await deviceGroupHierarchy(client);
        break;
      default:
        throw new Error(`Unknown resource URI: ${uri}`);
    }

    return {
      contents: [{ uri, mimeType: "application/json", text: JSON.stringify(result, null, 2) }],
    };
  });

  // ── Start ─────────────────────────────────────────────────────────
  const transport = customTransport ?? new StdioServerTransport();
  await server.connect(transport);
  return server;
}
