import type { CmdDef, CmdParams } from "./commands.js";
import { UsageError } from "./errors.js";
import type { JobSettings } from "./jobs.js";
import type { Session } from "./op.js";
import { toXml } from "./xml.js";

export interface ResolvedRequest {
  type: "op";
  target?: string;
  cmd: string;
}

export function missingParams(cmd: CmdDef, params: CmdParams): string[] {
  return [...cmd.args, ...cmd.options]
    .filter((p) => p.required && (params[p.name] === undefined || params[p.name] === ""))
    .map((p) => p.name);
}

function checkParams(cmd: CmdDef, params: CmdParams): void {
  const missing = missingParams(cmd, params);
  if (missing.length) {
    throw new UsageError(`Missing required argument${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`);
  }
}

/** Build the API parameters a command would send, without sending them */
export function resolveRequest(cmd: CmdDef, params: CmdParams, target?: string): ResolvedRequest {
  checkParams(cmd, params);
  const resolved: ResolvedRequest = { type: "op", cmd: toXml(cmd.request(params)) };
  if (target) resolved.target = target;
  return resolved;
}

/** Validate arguments and run a single command */
export async function executeCommand(
  cmd: CmdDef,
  params: CmdParams,
  session: Session,
  jobs: JobSettings,
): Promise<unknown> {
  checkParams(cmd, params);
  return cmd.run(session, params, jobs);
}
