import { FormatError } from "./errors.js";
import { flattenHierarchy, hierarchyNode } from "./hierarchy.js";
import { DEFAULT_JOB_TIMEOUT, waitForJob, type WaitOptions } from "./jobs.js";
import { op, type Session } from "./op.js";
import { command, list, text } from "./xml.js";

export const HIERARCHY_REQUEST = command("show", { path: "dg-hierarchy", value: "" });

export function moveGroupRequest(child: string, parent: string) {
  return command(
    "request",
    { path: "move-dg>entry>@name", value: child },
    { path: "move-dg>entry>new-parent-dg", value: parent, omitEmpty: true },
  );
}

/** Device group name -> parent name; top-level groups map to "" */
export async function deviceGroupHierarchy(session: Session): Promise<Record<string, string>> {
  const { data } = await op(session, HIERARCHY_REQUEST, list("result>dg-hierarchy>dg", hierarchyNode), {
    description: "(op) retrieving device group hierarchy",
  });
  return flattenHierarchy(data);
}

/**
 * Move `child` under `parent`, or to the top level (shared) when parent is "".
 *
 * The device runs the move as a job; this resolves once the job completes.
 */
export async function assignDeviceGroupParent(
  session: Session,
  child: string,
  parent = "",
  wait: Partial<WaitOptions> = {},
): Promise<void> {
  const { raw, data: jobId } = await op(session, moveGroupRequest(child, parent), text("result>job"), {
    description: `(op) assigning device group "${child}" new parent: ${parent || "(shared)"}`,
  });
  if (!jobId) throw new FormatError("No job id in reply", raw);

  await waitForJob(session, jobId, { ...wait, timeout: wait.timeout ?? DEFAULT_JOB_TIMEOUT });
}
