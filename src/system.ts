import { op, type Session } from "./op.js";
import { command, fields } from "./xml.js";

export const SYSTEM_INFO_REQUEST = command("show", { path: "system>info", value: "" });

/** `show system info` as a flat map: hostname, model, serial, sw-version, ... */
export async function systemInfo(session: Session): Promise<Record<string, string>> {
  const { data } = await op(session, SYSTEM_INFO_REQUEST, fields("result>system"), {
    description: "(op) retrieving system info",
  });
  return data;
}
