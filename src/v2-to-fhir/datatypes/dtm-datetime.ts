/**
 * Converts HL7v2 DTM values to FHIR date / dateTime.
 *
 * HL7v2 format: YYYY[MM[DD[HH[MM[SS[.S[S[S[S]]]]]]]]][+/-ZZZZ]
 * FHIR requires a timezone when time is present. A DTM without an offset is
 * local time in `zoneId` (an IANA zone such as "Europe/Berlin"), or UTC when
 * no zone is given.
 */

const DTM_PATTERN = /^\d{4}(\d{2}(\d{2}(\d{2}(\d{2}(\d{2}(\.\d{1,4})?)?)?)?)?)?([+-]\d{4})?$/;

export function convertDTMToDateTime(dtm: string | undefined, zoneId?: string): string | undefined {
  if (!dtm) return undefined;
  if (!DTM_PATTERN.test(dtm)) return undefined;

  // Extract timezone if present (+/-ZZZZ at the end)
  const tzMatch = dtm.match(/([+-]\d{4})$/);
  const dtmWithoutTz = tzMatch ? dtm.slice(0, -5) : dtm;

  const year = dtmWithoutTz.substring(0, 4);
  const month = dtmWithoutTz.substring(4, 6);
  const day = dtmWithoutTz.substring(6, 8);
  const hour = dtmWithoutTz.substring(8, 10);
  const minute = dtmWithoutTz.substring(10, 12);
  const second = dtmWithoutTz.substring(12, 14);
  const fraction = dtmWithoutTz.substring(14);

  // Date-only formats don't need timezone
  if (dtmWithoutTz.length === 4) return year;
  if (dtmWithoutTz.length === 6) return `${year}-${month}`;
  if (dtmWithoutTz.length === 8) return `${year}-${month}-${day}`;

  let timezone = "Z";
  if (tzMatch?.[1]) {
    timezone = formatTimezone(tzMatch[1]);
  } else if (zoneId) {
    const wallClock = Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute || "0"),
      Number(second || "0"),
    );
    timezone = zoneOffset(zoneId, wallClock);
  }

  if (dtmWithoutTz.length === 10) return `${year}-${month}-${day}T${hour}:00:00${timezone}`;
  const base = `${year}-${month}-${day}T${hour}:${minute}`;
  if (dtmWithoutTz.length === 12) return `${base}:00${timezone}`;
  return `${base}:${second}${fraction}${timezone}`;
}

/** DTM truncated to its date part (FHIR `date`). */
export function convertDTMToDate(dtm: string | undefined): string | undefined {
  if (!dtm) return undefined;
  if (!DTM_PATTERN.test(dtm)) return undefined;

  const digits = dtm.replace(/[+-]\d{4}$/, "");
  if (digits.length < 6) return digits.substring(0, 4);
  if (digits.length < 8) return `${digits.substring(0, 4)}-${digits.substring(4, 6)}`;
  return `${digits.substring(0, 4)}-${digits.substring(4, 6)}-${digits.substring(6, 8)}`;
}

/**
 * Format HL7 timezone (+/-ZZZZ) to ISO format (+/-HH:MM)
 */
function formatTimezone(tz: string): string {
  const sign = tz[0];
  const hours = tz.substring(1, 3);
  const minutes = tz.substring(3, 5);
  return `${sign}${hours}:${minutes}`;
}

const offsetFormatters = new Map<string, Intl.DateTimeFormat>();

/** @throws RangeError for a zone the runtime does not know */
function offsetFormatter(zoneId: string): Intl.DateTimeFormat {
  let formatter = offsetFormatters.get(zoneId);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", { timeZone: zoneId, timeZoneName: "longOffset" });
    offsetFormatters.set(zoneId, formatter);
  }
  return formatter;
}

export function isKnownZone(zoneId: string): boolean {
  try {
    offsetFormatter(zoneId);
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

/** Minutes east of UTC at an instant; "GMT" alone is zero. */
function offsetMinutesAt(zoneId: string, instant: number): number {
  const name = offsetFormatter(zoneId)
    .formatToParts(new Date(instant))
    .find((part) => part.type === "timeZoneName")?.value;
  const match = name ? /^GMT([+-])(\d{2}):(\d{2})$/.exec(name) : null;
  if (!match) return 0;
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === "-" ? -minutes : minutes;
}

/**
 * Offset of a wall-clock time (given as if it were UTC) in the zone. The
 * first guess is corrected once, which settles times near a DST change.
 */
function zoneOffset(zoneId: string, wallClock: number): string {
  const guess = offsetMinutesAt(zoneId, wallClock);
  const offset = offsetMinutesAt(zoneId, wallClock - guess * 60_000);
  if (offset === 0) return "Z";

  const sign = offset < 0 ? "-" : "+";
  const absolute = Math.abs(offset);
  const hours = String(Math.floor(absolute / 60)).padStart(2, "0");
  const minutes = String(absolute % 60).padStart(2, "0");
  return `${sign}${hours}:${minutes}`;
}
