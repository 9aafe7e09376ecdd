import { randomUUID } from "node:crypto";

export const ICS_PRODUCT_ID = "-//Micro Adventure Planner//DE";
const MIN_EVENT_MINUTES = 15;

export type IcsEventInput = {
  date: string;
  summary: string;
  description: string;
  location: string;
  tzid?: string;
  start_time?: string | null;
  duration_minutes?: number;
  uid?: string;
  now?: Date;
};

export function escapeIcsText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r?\n/g, "\\n");
}

/**
 * Builds a single-event VCALENDAR. Without a start time the event is all-day;
 * otherwise it is a local-time event in `tzid` lasting at least 15 minutes.
 */
export function buildIcsEvent(input: IcsEventInput): string {
  const tzid = input.tzid ?? "Europe/Berlin";
  const uid = input.uid ?? `${randomUUID()}@micro-adventure-planner.local`;
  const now = input.now ?? new Date();
  const day = parseIsoDate(input.date);

  const lines = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${ICS_PRODUCT_ID}`,
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    "BEGIN:VEVENT",
    `UID:${uid}`,
    `DTSTAMP:${formatUtcStamp(now)}`,
    `SUMMARY:${escapeIcsText(input.summary)}`,
    `DESCRIPTION:${escapeIcsText(input.description)}`,
    `LOCATION:${escapeIcsText(input.location)}`,
  ];

  if (!input.start_time) {
    const nextDay = new Date(day.getTime() + 24 * 60 * 60 * 1000);
    lines.push(`DTSTART;VALUE=DATE:${formatDate(day)}`);
    lines.push(`DTEND;VALUE=DATE:${formatDate(nextDay)}`);
  } else {
    const [hours, minutes] = parseClock(input.start_time);
    const start = new Date(day.getTime() + (hours * 60 + minutes) * 60 * 1000);
    const duration = Math.max(MIN_EVENT_MINUTES, input.duration_minutes ?? 60);
    const end = new Date(start.getTime() + duration * 60 * 1000);
    lines.push(`DTSTART;TZID=${tzid}:${formatLocalStamp(start)}`);
    lines.push(`DTEND;TZID=${tzid}:${formatLocalStamp(end)}`);
  }

  lines.push("END:VEVENT", "END:VCALENDAR", "");
  return lines.join("\r\n");
}

// Local wall-clock values are carried in the UTC fields of a Date so no host
// timezone leaks into the output.
function parseIsoDate(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new RangeError(`Invalid ISO date '${value}'.`);
  }
  return new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
}

function parseClock(value: string): [number, number] {
  const match = /^(\d{2}):(\d{2})$/.exec(value);
  if (!match) {
    throw new RangeError(`Invalid start time '${value}'.`);
  }
  return [Number(match[1]), Number(match[2])];
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function formatDate(value: Date): string {
  return `${value.getUTCFullYear()}${pad(value.getUTCMonth() + 1)}${pad(value.getUTCDate())}`;
}

function formatLocalStamp(value: Date): string {
  return `${formatDate(value)}T${pad(value.getUTCHours())}${pad(value.getUTCMinutes())}${pad(value.getUTCSeconds())}`;
}

function formatUtcStamp(value: Date): string {
  return `${formatLocalStamp(value)}Z`;
}
