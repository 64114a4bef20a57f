// ---------------------------------------------------------------------------
// Command registry, shared by the CLI and the MCP server
// ---------------------------------------------------------------------------

import { createVmAuthKey, generateKeyRequest, getVmAuthKeys, LIST_KEYS_REQUEST } from "./authkeys.js";
import { clock, CLOCK_REQUEST } from "./clock.js";
import { assignDeviceGroupParent, deviceGroupHierarchy, HIERARCHY_REQUEST, moveGroupRequest } from "./devicegroups.js";
import { UsageError } from "./errors.js";
import { MAX_POLL_INTERVAL, showJob, showJobRequest, waitForJob, type JobSettings } from "./jobs.js";
import type { Session } from "./op.js";
import { systemInfo, SYSTEM_INFO_REQUEST } from "./system.js";
import type { CommandRequest } from "./xml.js";

export interface ParamDef {
  name: string;
  desc: string;
  required: boolean;
  type: "string" | "integer" | "number";
}

/** Argument values by name, as strings from the command line or tool call */
export type CmdParams = Record<string, string | undefined>;

export interface CmdDef {
  /** Command group (null = top-level command) */
  group: string | null;
  /** Action name (e.g. "list", "create") */
  action: string;
  summary: string;
  /** Positional CLI arguments */
  args: ParamDef[];
  /** --flag options */
  options: ParamDef[];
  /** Whether the command leaves device state untouched */
  readOnly: boolean;
  /** Column headers when the result is a flat name -> value map */
  mapColumns?: [string, string];
  /** The primary command this action sends, for --dry-run */
  request(params: CmdParams): CommandRequest;
  run(session: Session, params: CmdParams, jobs: JobSettings): Promise<unknown>;
}

export const COMMANDS: CmdDef[] = [
  // ── System ──────────────────────────────────────────────────────────
  {
    group: null, action: "clock",
    summary: "Show the device clock and the time zone it reports",
    args: [], options: [], readOnly: true,
    request: () => CLOCK_REQUEST,
    run: async (session) => {
      const now = await clock(session);
      return { time: now.toISO(), zone: now.zoneName };
    },
  },
  {
    group: null, action: "info",
    summary: "Show system info (hostname, model, serial, software version)",
    args: [], options: [], readOnly: true, mapColumns: ["field", "value"],
    request: () => SYSTEM_INFO_REQUEST,
    run: (session) => systemInfo(session),
  },

  // ── VM auth keys ────────────────────────────────────────────────────
  {
    group: "auth-keys", action: "create",
    summary: "Generate a VM auth key for bootstrapping a VM-Series firewall",
    args: [],
    options: [{ name: "hours", desc: "Lifetime of the key in hours", required: true, type: "integer" }],
    readOnly: false,
    request: (p) => generateKeyRequest(intParam(p, "hours")),
    run: (session, p) => createVmAuthKey(session, intParam(p, "hours")),
  },
  {
    group: "auth-keys", action: "list",
    summary: "List VM auth keys with their expiry",
    args: [], options: [], readOnly: true,
    request: () => LIST_KEYS_REQUEST,
    run: (session) => getVmAuthKeys(session),
  },

  // ── Device groups ───────────────────────────────────────────────────
  {
    group: "device-groups", action: "hierarchy",
    summary: "Show each device group's parent (\"\" = top level)",
    args: [], options: [], readOnly: true, mapColumns: ["group", "parent"],
    request: () => HIERARCHY_REQUEST,
    run: (session) => deviceGroupHierarchy(session),
  },
  {
    group: "device-groups", action: "assign-parent",
    summary: "Move a device group under a new parent and wait for the move job",
    args: [
      { name: "child", desc: "Device group to move", required: true, type: "string" },
      { name: "parent", desc: "New parent (omit to move to the top level)", required: false, type: "string" },
    ],
    options: [], readOnly: false,
    request: (p) => moveGroupRequest(p.child ?? "", p.parent ?? ""),
    run: async (session, p, jobs) => {
      const child = p.child ?? "";
      const parent = p.parent ?? "";
      await assignDeviceGroupParent(session, child, parent, jobs);
      return { ok: true, child, parent };
    },
  },

  // ── Jobs ────────────────────────────────────────────────────────────
  {
    group: "jobs", action: "get",
    summary: "Show the status of a job",
    args: [{ name: "id", desc: "Job ID", required: true, type: "string" }],
    options: [], readOnly: true,
    request: (p) => showJobRequest(p.id ?? ""),
    run: (session, p) => showJob(session, p.id ?? ""),
  },
  {
    group: "jobs", action: "wait",
    summary: "Wait for a job to finish and show its final status",
    args: [{ name: "id", desc: "Job ID", required: true, type: "string" }],
    options: [
      { name: "timeout", desc: "Seconds to wait before giving up", required: false, type: "number" },
      { name: "interval", desc: "Seconds between polls", required: false, type: "number" },
    ],
    readOnly: true,
    request: (p) => showJobRequest(p.id ?? ""),
    run: (session, p, jobs) =>
      waitForJob(session, p.id ?? "", {
        timeout: secondsParam(p, "timeout") ?? jobs.timeout,
        pollInterval: secondsParam(p, "interval", MAX_POLL_INTERVAL) ?? jobs.pollInterval,
      }),
  },
];

// ---------------------------------------------------------------------------
// Group descriptions
// ---------------------------------------------------------------------------

export const GROUP_DESCRIPTIONS: Record<string, string> = {
  "auth-keys": "Manage VM auth keys: bootstrap credentials for new VM-Series firewalls",
  "device-groups": "Inspect and rearrange the device group hierarchy",
  jobs: "Inspect and wait for asynchronous jobs",
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function camelCase(s: string): string {
  return s.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

/** Generate a tool name from a command definition: group_action or just action */
export function toolName(cmd: CmdDef): string {
  if (cmd.group) {
    return `${cmd.group.replace(/-/g, "_")}_${cmd.action.replace(/-/g, "_")}`;
  }
  return cmd.action.replace(/-/g, "_");
}

export function commandName(cmd: CmdDef): string {
  return cmd.group ? `${cmd.group} ${cmd.action}` : cmd.action;
}

export function intParam(params: CmdParams, name: string): number {
  const value = params[name];
  if (value === undefined || !/^\d+$/.test(value.trim()) || Number(value) < 1) {
    throw new UsageError(`--${name} must be a positive integer, got ${JSON.stringify(value ?? null)}`);
  }
  return Number(value);
}

/** Optional seconds value converted to milliseconds, at most `max` ms when given */
export function secondsParam(params: CmdParams, name: string, max?: number): number | undefined {
  const value = params[name];
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new UsageError(`--${name} must be a positive number of seconds, got ${JSON.stringify(value)}`);
  }
  if (max !== undefined && n * 1000 > max) {
    throw new UsageError(`--${name} must be at most ${max / 1000} seconds, got ${JSON.stringify(value)}`);
  }
  return n * 1000;
}
