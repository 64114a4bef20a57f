import { DateTime, FixedOffsetZone, IANAZone, type Zone } from "luxon";
import { FormatError } from "./errors.js";
import { op, type Session } from "./op.js";
import { command, text } from "./xml.js";

export const CLOCK_REQUEST = command("show", { path: "clock", value: "" });

// Offsets in minutes. CST/IST are read as North American / India.
const ZONE_ABBREVIATIONS: Record<string, number> = {
  UTC: 0, GMT: 0, Z: 0, WET: 0,
  HST: -600, AKST: -540, AKDT: -480,
  PST: -480, PDT: -420, MST: -420, MDT: -360,
  CST: -360, CDT: -300, EST: -300, EDT: -240,
  AST: -240, ADT: -180, NST: -210, NDT: -150,
  BST: 60, IST: 330, CET: 60, CEST: 120, WEST: 60,
  EET: 120, EEST: 180, MSK: 180,
  SGT: 480, HKT: 480, AWST: 480, JST: 540, KST: 540,
  ACST: 570, AEST: 600, AEDT: 660, NZST: 720, NZDT: 780,
};

/** Resolve the zone token of a device clock reading */
export function resolveZone(token: string): Zone | undefined {
  const offset = /^([+-])(\d{2}):?(\d{2})$/.exec(token);
  if (offset) {
    const minutes = Number(offset[2]) * 60 + Number(offset[3]);
    return FixedOffsetZone.instance(offset[1] === "-" ? -minutes : minutes);
  }

  const abbreviated = ZONE_ABBREVIATIONS[token.toUpperCase()];
  if (abbreviated !== undefined) return FixedOffsetZone.instance(abbreviated);

  if (IANAZone.isValidZone(token)) return IANAZone.create(token);
  return undefined;
}

/** Parse "Mon Jan 15 13:45:00 PST 2024" into a zoned DateTime */
export function parseClock(reading: string): DateTime {
  const tokens = reading.trim().split(/\s+/);
  if (tokens.length !== 6) {
    throw new FormatError("Unrecognized clock format", reading);
  }

  const [, month, day, time, zoneToken, year] = tokens;
  const zone = resolveZone(zoneToken);
  if (!zone) {
    throw new FormatError(`Unknown time zone "${zoneToken}"`, reading);
  }

  const parsed = DateTime.fromFormat(`${month} ${day} ${year} ${time}`, "MMM d yyyy HH:mm:ss", {
    zone,
    locale: "en-US",
  });
  if (!parsed.isValid) {
    throw new FormatError(`Unparseable clock (${parsed.invalidExplanation ?? parsed.invalidReason})`, reading);
  }
  return parsed;
}

/** Current device time, carrying the zone the device reports */
export async function clock(session: Session): Promise<DateTime> {
  const { data } = await op(session, CLOCK_REQUEST, text("result"), {
    description: "(op) getting system time",
  });
  return parseClock(data);
}

/**
 * The device's zone, or undefined when the clock cannot be read.
 *
 * Callers only use it to anchor device-local timestamps, so a failure is
 * logged and otherwise ignored.
 */
export async function clockZone(session: Session): Promise<Zone | undefined> {
  try {
    const now = await clock(session);
    return now.zone;
  } catch (err: unknown) {
    session.logger.warn({ err }, "(op) failed to get/parse system time; device timestamps will be read as UTC");
    return undefined;
  }
}
