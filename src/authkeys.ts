import { DateTime, FixedOffsetZone, type Zone } from "luxon";
import { clockZone } from "./clock.js";
import { FormatError } from "./errors.js";
import { op, type Session } from "./op.js";
import { command, list, text, type Decoder } from "./xml.js";

/**
 * A bootstrap key for enrolling a new VM-Series instance.
 *
 * `expiry` is the device's local wall-clock string; `expires` is that string
 * anchored on the device's zone, absent when it could not be parsed.
 */
export interface VmAuthKey {
  authKey: string;
  expiry: string;
  expires?: DateTime;
}

export const EXPIRY_FORMAT = "yyyy/MM/dd HH:mm:ss";
const GENERATED_PREFIX = "VM auth key ";
const GENERATED_TOKENS = 9;

export function parseExpires(expiry: string, zone: Zone = FixedOffsetZone.utcInstance): DateTime | undefined {
  const parsed = DateTime.fromFormat(expiry, EXPIRY_FORMAT, { zone });
  return parsed.isValid ? parsed : undefined;
}

function withExpires(key: VmAuthKey, zone: Zone | undefined): VmAuthKey {
  const expires = parseExpires(key.expiry, zone);
  return expires ? { ...key, expires } : { authKey: key.authKey, expiry: key.expiry };
}

export function generateKeyRequest(hours: number) {
  return command("request", { path: "bootstrap>vm-auth-key>generate>lifetime", value: hours });
}

export const LIST_KEYS_REQUEST = command("request", { path: "bootstrap>vm-auth-key>show", value: "" });

const vmAuthKeyEntry: Decoder<VmAuthKey> = (node) => ({
  authKey: text("vm-auth-key")(node),
  expiry: text("expiry-time")(node),
});

/**
 * Read "VM auth key 123456789 generated. Expires at: 2024/01/15 13:45:00".
 *
 * `raw` is quoted in errors instead of the message when given.
 */
export function parseGeneratedKey(message: string, raw = message): VmAuthKey {
  if (!message) throw new FormatError("No message in reply", raw);
  if (!message.startsWith(GENERATED_PREFIX)) throw new FormatError("Unexpected reply prefix", raw);

  const tokens = message.trim().split(/\s+/);
  if (tokens.length !== GENERATED_TOKENS) {
    throw new FormatError(`Got ${tokens.length} of ${GENERATED_TOKENS} fields`, message);
  }

  return { authKey: tokens[3], expiry: tokens.slice(7).join(" ") };
}

/** Generate a VM auth key valid for `hours` */
export async function createVmAuthKey(session: Session, hours: number): Promise<VmAuthKey> {
  const zone = await clockZone(session);

  const { raw, data } = await op(session, generateKeyRequest(hours), text("result"), {
    description: `(op) generating a vm auth key valid for ${hours}h`,
  });

  return withExpires(parseGeneratedKey(data, raw), zone);
}

export async function getVmAuthKeys(session: Session): Promise<VmAuthKey[]> {
  const zone = await clockZone(session);

  const { data } = await op(session, LIST_KEYS_REQUEST, list("result>bootstrap-vm-auth-keys>entry", vmAuthKeyEntry), {
    description: "(op) listing vm auth keys",
  });

  return data.map((key) => {
    const parsed = withExpires(key, zone);
    if (!parsed.expires) session.logger.debug({ authKey: key.authKey, expiry: key.expiry }, "unparseable expiry");
    return parsed;
  });
}
