import type { PropertyBag } from "../parsing/property-bag.js";
import {
  PidLidAppointmentEndWhole,
  PidLidAppointmentStartWhole,
  PidLidCcAttendeesString,
  PidLidLocation,
  PidLidToAttendeesString,
} from "../parsing/properties.js";
import type { MeetingDetails } from "../types/index.js";

/**
 * Parses a semicolon-separated attendees string into individual entries.
 */
export function parseAttendeeString(attendeesStr: string | undefined): string[] {
  if (!attendeesStr) return [];
  return attendeesStr
    .split(";")
    .map((a) => a.trim())
    .filter((a) => a.length > 0);
}

/**
 * Appointments and meeting requests/responses carry appointment properties.
 */
export function isCalendarMessage(messageClass: string | undefined): boolean {
  if (!messageClass) return false;
  const normalized = messageClass.toLowerCase();
  return (
    normalized === "ipm.appointment" ||
    normalized.startsWith("ipm.appointment.") ||
    normalized.startsWith("ipm.schedule.meeting.")
  );
}

export function extractMeetingDetails(bag: PropertyBag, messageClass: string | undefined): MeetingDetails | undefined {
  if (!isCalendarMessage(messageClass)) return undefined;

  const startTime = bag.get(PidLidAppointmentStartWhole);
  const endTime = bag.get(PidLidAppointmentEndWhole);
  if (!startTime || !endTime) return undefined;

  return {
    startTime,
    endTime,
    location: bag.get(PidLidLocation) || undefined,
    attendees: [
      ...parseAttendeeString(bag.get(PidLidToAttendeesString)),
      ...parseAttendeeString(bag.get(PidLidCcAttendeesString)),
    ],
  };
}
